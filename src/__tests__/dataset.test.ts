import { describe, it, expect } from "vitest";
import { exportFileName, normalizeColumnName, parseDataset, toCsv } from "../lib/dataset";
import { assembleTable } from "../lib/batch/assemble";
import { DatasetError } from "../lib/batch/errors";
import { normalizeSimpleReport } from "../lib/valuation/normalize";
import { getReportColumns } from "../lib/valuation/reports";
import { ReportKind, type FetchOutcome, type ResultTable } from "../lib/types";

function csvLines(csv: string): string[] {
  return csv.split(/\r?\n/).filter((line) => line !== "");
}

describe("normalizeColumnName", () => {
  it("trims and lower-cases headers", () => {
    expect(normalizeColumnName("  ZipCode ")).toBe("zipcode");
    expect(normalizeColumnName(undefined)).toBe("");
  });
});

describe("parseDataset", () => {
  it("reads address records from CSV text", () => {
    const dataset = parseDataset("Address,City,State,Zipcode\n12 Oak Ln,Salem,OR,97301\n");

    expect(dataset.columns).toEqual(["address", "city", "state", "zipcode"]);
    expect(dataset.records).toEqual([
      { index: 0, address: "12 Oak Ln", city: "Salem", state: "OR", zip: "97301" },
    ]);
  });

  it("keeps leading zeros in zip codes", () => {
    const dataset = parseDataset("address,city,state,zip\n1 Elm St,Boston,MA,02134\n");
    expect(dataset.records[0].zip).toBe("02134");
  });

  it("prefers zipcode over zip when both are present", () => {
    const dataset = parseDataset("address,city,state,zip,zipcode\n1 Elm St,Boston,MA,11111,02134\n");
    expect(dataset.records[0].zip).toBe("02134");
  });

  it("sends an empty zip when no zip column exists", () => {
    const dataset = parseDataset("address,city,state\n1 Elm St,Boston,MA\n");
    expect(dataset.records[0].zip).toBe("");
  });

  it("trims values and keeps extra columns", () => {
    const dataset = parseDataset("address,city,state,zip,owner\n  1 Elm St ,Boston,MA,02134,Lee\n");

    expect(dataset.records[0].address).toBe("1 Elm St");
    expect(dataset.rows[0].owner).toBe("Lee");
    expect(dataset.columns).toContain("owner");
  });

  it("indexes rows in file order", () => {
    const dataset = parseDataset(
      "address,city,state,zip\n1 A St,X,CA,90001\n2 B St,Y,CA,90002\n3 C St,Z,CA,90003\n"
    );
    expect(dataset.records.map((r) => [r.index, r.address])).toEqual([
      [0, "1 A St"],
      [1, "2 B St"],
      [2, "3 C St"],
    ]);
  });

  it("decodes uploaded CSV bytes as UTF-8", () => {
    const bytes = new TextEncoder().encode(
      "address,city,state,zip\n12 Calle Peña,Española,NM,87532\n"
    );

    expect(parseDataset(bytes).records[0]).toEqual({
      index: 0,
      address: "12 Calle Peña",
      city: "Española",
      state: "NM",
      zip: "87532",
    });
  });

  it("drops a UTF-8 byte order mark from the first header", () => {
    const bytes = new TextEncoder().encode("\uFEFFaddress,city,state,zip\n1 Elm St,Boston,MA,02134\n");

    const dataset = parseDataset(bytes);

    expect(dataset.columns[0]).toBe("address");
    expect(dataset.records[0].zip).toBe("02134");
  });

  it("returns no records for a header-only file", () => {
    expect(parseDataset("address,city,state,zip\n").records).toEqual([]);
  });

  it("names every missing required column", () => {
    expect(() => parseDataset("address,zip\n1 Elm St,02134\n")).toThrow(DatasetError);
    expect(() => parseDataset("address,zip\n1 Elm St,02134\n")).toThrow(
      "Missing required column(s): city, state."
    );
  });
});

describe("toCsv", () => {
  const dataset = parseDataset("address,city,state,zip,owner\n1 Elm St,Boston,MA,02134,Lee\n9 Ash Rd,Provo,UT,84601,Kim\n");

  const outcomes = new Map<number, FetchOutcome>([
    [
      0,
      {
        status: "success",
        index: 0,
        record: {
          kind: ReportKind.SIMPLE,
          fields: normalizeSimpleReport({
            subjectParcel: { structures: [{ bedrooms: 3, bathrooms: 2, gla: 1500 }] },
            prediction: { priceLow: 500000, priceHigh: 560000, predictedPrice: 530000 },
          }),
        },
      },
    ],
    [1, { status: "failure", index: 1, error: "API returned status 500" }],
  ]);
  const table = assembleTable(dataset.records, outcomes, ReportKind.SIMPLE);

  it("writes dataset columns followed by report columns", () => {
    expect(csvLines(toCsv(table, dataset))).toEqual([
      "address,city,state,zip,owner,Bedrooms,Bathrooms,HomeSize,PriceLow,PriceHigh,ConfidenceScore,PredictedPrice,PDFReportLink",
      "1 Elm St,Boston,MA,02134,Lee,3,2,1500,500000,560000,,530000,",
      "9 Ash Rd,Provo,UT,84601,Kim,Error,Error,Error,Error,Error,Error,Error,Error",
    ]);
  });

  it("falls back to the identity columns without a dataset", () => {
    const lines = csvLines(toCsv(table));
    expect(lines[0]).toBe(
      "address,city,state,zip,Bedrooms,Bathrooms,HomeSize,PriceLow,PriceHigh,ConfidenceScore,PredictedPrice,PDFReportLink"
    );
    expect(lines[1]).toBe("1 Elm St,Boston,MA,02134,3,2,1500,500000,560000,,530000,");
  });
});

describe("toCsv number precision", () => {
  it("writes numbers exactly as normalized", () => {
    const table: ResultTable = {
      kind: ReportKind.SIMPLE,
      columns: getReportColumns(ReportKind.SIMPLE),
      rows: [
        {
          record: { index: 0, address: "1 Elm St", city: "Boston", state: "MA", zip: "02134" },
          status: "ok",
          cells: [3, 2.5, 1500, 123456789012, 0.123456789012, 1234.56789, null, null],
        },
      ],
    };

    expect(csvLines(toCsv(table))[1]).toBe(
      "1 Elm St,Boston,MA,02134,3,2.5,1500,123456789012,0.123456789012,1234.56789,,"
    );
  });
});

describe("exportFileName", () => {
  it("names the export after the report kind", () => {
    expect(exportFileName(ReportKind.RANGED)).toBe("enriched_property_data_ranged_report.csv");
  });
});
