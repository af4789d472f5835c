/**
 * Fitting dotted logger names into a fixed-width column.
 */

export const DEFAULT_NAME_WIDTH = 40;

const ELLIPSIS = "...";

/**
 * Logback-style abbreviation: every package segment becomes its first letter
 * and the last segment is kept whole, `App.Database.Repository.Orders` ->
 * `A.D.R.Orders`. When even that is too wide the last segment is cut and
 * ends in `...`. A single-segment name is only truncated.
 */
export function abbreviateName(name: string, width: number = DEFAULT_NAME_WIDTH): string {
  if (name === "") return "";

  const segments = name.split(".");
  if (segments.length === 1) return truncateName(name, width);

  const last = segments[segments.length - 1];
  const packages = segments.slice(0, -1).map((s) => `${s.charAt(0)}.`).join("");

  if (packages.length + last.length <= width) return packages + last;

  const room = width - packages.length;
  return room > ELLIPSIS.length ? packages + last.slice(0, room - ELLIPSIS.length) + ELLIPSIS : packages + ELLIPSIS;
}

/** Cut a name to `width` characters, the last three being `...` */
export function truncateName(name: string, width: number = DEFAULT_NAME_WIDTH): string {
  if (name.length <= width) return name;
  return name.slice(0, Math.max(width - ELLIPSIS.length, 0)) + ELLIPSIS;
}

/** The name as shown in a column of `width`: unchanged when it fits, abbreviated otherwise */
export function fitName(name: string, width: number = DEFAULT_NAME_WIDTH): string {
  return name.length > width ? abbreviateName(name, width) : name;
}
