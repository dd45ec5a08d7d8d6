/**
 * UTC date formatting for index name suffixes
 *
 * Supported tokens: yyyy, yy, MM, dd, HH. Anything else is copied verbatim,
 * so an unusual layout yields an unusual index name rather than an error.
 */

const TOKEN_PATTERN = /yyyy|yy|MM|dd|HH/g;

/**
 * Default layout, one index per calendar day
 */
export const DEFAULT_DATE_LAYOUT = "yyyy-MM-dd";

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a timestamp under a layout, in UTC
 *
 * @example formatDate(new Date("2024-03-07T23:10:00Z"), "yyyy-MM-dd") // "2024-03-07"
 */
export function formatDate(date: Date, layout: string): string {
  return layout.replace(TOKEN_PATTERN, (token) => {
    switch (token) {
      case "yyyy":
        return pad(date.getUTCFullYear(), 4);
      case "yy":
        return pad(date.getUTCFullYear() % 100, 2);
      case "MM":
        return pad(date.getUTCMonth() + 1, 2);
      case "dd":
        return pad(date.getUTCDate(), 2);
      default:
        return pad(date.getUTCHours(), 2);
    }
  });
}
