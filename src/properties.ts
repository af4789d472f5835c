/**
 * Parsing helpers for the `.properties` configuration format:
 *
 * ```properties
 * # comment
 * ! alternate comment
 * root=WARN
 * app.database=DEBUG
 * app.ui.*=TRACE
 * scan=true
 * scan.period=30 seconds
 * ```
 */

export interface PropertyEntry {
  key: string;
  value: string;
}

/** Scan period used when `scan.period` is missing or malformed */
export const DEFAULT_SCAN_PERIOD_MS = 60_000;

/** Lower bound for any scan period */
export const MIN_SCAN_PERIOD_MS = 1_000;

const UNIT_MS: Record<string, number> = {
  ms: 1,
  millisecond: 1,
  milliseconds: 1,
  s: 1_000,
  second: 1_000,
  seconds: 1_000,
  m: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  days: 86_400_000,
};

/** Split text into lines the way the file was written (LF, CRLF or CR) */
export function splitLines(content: string): string[] {
  return content.split(/\r\n|\n|\r/);
}

/**
 * Parse one line into a key/value pair.
 * Returns undefined for blank lines, comments, lines without `=`, and lines
 * whose key or value is empty after trimming.
 */
export function parsePropertiesLine(line: string): PropertyEntry | undefined {
  const trimmed = line.trim();
  if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith("!")) return undefined;

  const eq = trimmed.indexOf("=");
  if (eq < 0) return undefined;

  const key = trimmed.slice(0, eq).trim();
  const value = trimmed.slice(eq + 1).trim();
  if (key === "" || value === "") return undefined;

  return { key, value };
}

/**
 * Parse a period such as `30 seconds`, `500 ms` or `1.5 h` into milliseconds.
 * Anything that is not exactly `<number> <unit>` yields the 60s default;
 * results are never below one second.
 */
export function parseScanPeriod(value: string): number {
  const parts = value.trim().split(/\s+/).filter((p) => p !== "");
  let period = DEFAULT_SCAN_PERIOD_MS;

  if (parts.length === 2) {
    const [amountText, unitText] = parts;
    const amount = Number(amountText);
    const unit = UNIT_MS[unitText.toLowerCase()];
    if (amountText !== "" && Number.isFinite(amount) && unit !== undefined) {
      period = Math.trunc(amount * unit);
    }
  }

  return Math.max(period, MIN_SCAN_PERIOD_MS);
}
