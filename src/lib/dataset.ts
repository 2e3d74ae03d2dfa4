import * as XLSX from "xlsx";
import { DatasetError } from "./batch/errors";
import type { CellValue, InputDataset, InputRecord, ReportKind, ResultTable } from "./types";

export const REQUIRED_COLUMNS = ["address", "city", "state"] as const;

// Tried in order; the first present column wins
export const ZIP_COLUMNS = ["zipcode", "zip"] as const;

const IDENTITY_COLUMNS = ["address", "city", "state", "zip"];

export function normalizeColumnName(raw: unknown): string {
  return String(raw ?? "").trim().toLowerCase();
}

// XLSX is a zip archive ("PK"), legacy XLS an OLE compound file
function isBinaryWorkbook(bytes: Uint8Array): boolean {
  if (bytes.length < 4) return false;
  const zip = bytes[0] === 0x50 && bytes[1] === 0x4b;
  const ole = bytes[0] === 0xd0 && bytes[1] === 0xcf && bytes[2] === 0x11 && bytes[3] === 0xe0;
  return zip || ole;
}

function readWorkbook(input: ArrayBuffer | Uint8Array | string): XLSX.WorkBook {
  try {
    // raw: keep text cells as text so "02134" is not read as 2134
    if (typeof input === "string") {
      return XLSX.read(input, { type: "string", raw: true });
    }
    const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
    if (!isBinaryWorkbook(bytes)) {
      // Delimited text is UTF-8; SheetJS would read BOM-less bytes as Latin-1
      return XLSX.read(new TextDecoder().decode(bytes), { type: "string", raw: true });
    }
    return XLSX.read(bytes, { type: "array", raw: true });
  } catch (err) {
    throw new DatasetError(
      `Could not read file: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/**
 * Parse the first sheet of a CSV/XLSX upload into address records.
 * Header names are trimmed and lower-cased; blank rows are skipped and the
 * remaining rows are indexed from 0 in file order.
 */
export function parseDataset(input: ArrayBuffer | Uint8Array | string): InputDataset {
  const workbook = readWorkbook(input);
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new DatasetError("File contains no sheets");
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: "",
    blankrows: false,
  });

  if (grid.length === 0) {
    return { columns: [], rows: [], records: [] };
  }

  const columns = grid[0].map(normalizeColumnName);
  const missing = REQUIRED_COLUMNS.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new DatasetError(
      `Missing required column(s): ${missing.join(", ")}. Expected address, city, state and zipcode (or zip).`
    );
  }

  const zipColumn = ZIP_COLUMNS.find((c) => columns.includes(c));

  const rows = grid.slice(1).map((cells) => {
    const row: Record<string, string> = {};
    columns.forEach((column, i) => {
      if (column && !(column in row)) {
        row[column] = String(cells[i] ?? "");
      }
    });
    return row;
  });

  const records = rows.map(
    (row, index): InputRecord => ({
      index,
      address: row.address.trim(),
      city: row.city.trim(),
      state: row.state.trim(),
      zip: zipColumn ? row[zipColumn].trim() : "",
    })
  );

  return { columns: columns.filter((c) => c !== ""), rows, records };
}

/**
 * Delimited-text export: the dataset's own columns (or the four identity
 * columns when no dataset is given) followed by the report columns.
 * Absent values are blank.
 */
export function toCsv(table: ResultTable, dataset?: InputDataset): string {
  const baseColumns = dataset ? dataset.columns : IDENTITY_COLUMNS;

  const body = table.rows.map((row): CellValue[] => {
    const source = dataset?.rows[row.record.index];
    const base = source
      ? baseColumns.map((c) => source[c] ?? "")
      : [row.record.address, row.record.city, row.record.state, row.record.zip];
    // Numbers go out as written; the sheet's General format would round them
    const cells = row.cells.map((cell) => (typeof cell === "number" ? String(cell) : cell));
    return [...base, ...cells];
  });

  const sheet = XLSX.utils.aoa_to_sheet([[...baseColumns, ...table.columns], ...body]);
  return XLSX.utils.sheet_to_csv(sheet);
}

export function exportFileName(kind: ReportKind): string {
  return `enriched_property_data_${kind}_report.csv`;
}
