const LEADING_NUMBER = /^\d+(?:\.\d+)?/;

function leadingNumber(line: string): number {
  const match = line.match(LEADING_NUMBER);
  return match ? Number(match[0]) : 0;
}

/**
 * `sort -n` ordering: numeric prefix first, whole-line byte order on ties.
 */
export function compareRecordLines(a: string, b: string): number {
  const diff = leadingNumber(a) - leadingNumber(b);
  if (diff !== 0) return diff;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Turns a long-format dump into record lines only: header dropped, summary and
 * blank lines dropped, records sorted.
 */
export function normalizeFlowDump(dump: string): string {
  const lines = dump.split("\n").map((line) => line.replace(/\r$/, ""));
  const records = lines
    .slice(1)
    .filter((line) => /^\d/.test(line))
    .filter((line) => line.trim().length > 0);
  records.sort(compareRecordLines);
  return records.length ? records.join("\n") + "\n" : "";
}
