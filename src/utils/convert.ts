import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";
import utc from "dayjs/plugin/utc";
// active plugins dayjs
dayjs.extend(customParseFormat);
dayjs.extend(utc);

// SQLite CURRENT_TIMESTAMP is UTC, formatted "YYYY-MM-DD HH:MM:SS"
export function convertSqliteTimestamp(value: string): string {
  const parsed = dayjs.utc(value, "YYYY-MM-DD HH:mm:ss", true);

  return parsed.isValid() ? parsed.toISOString() : value;
}

// length in code points, not UTF-16 units
export function truncateText(text: string, maxLength: number): string {
  const chars = Array.from(text);
  return chars.length > maxLength ? `${chars.slice(0, maxLength).join("")}...` : text;
}
