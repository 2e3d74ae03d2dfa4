// Long enough for the browser to start reading the blob
export const REVOKE_DELAY_MS = 1000;

/** Save text as a file through a temporary object URL */
export function downloadText(text: string, fileName: string, type = "text/csv;charset=utf-8"): void {
  const blob = new Blob([text], { type });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = fileName;
  link.click();
  // Revoking right away can cancel the download in some browsers
  setTimeout(() => URL.revokeObjectURL(url), REVOKE_DELAY_MS);
}
