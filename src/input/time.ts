/**
 * Parses a 12-hour clock string such as `"9AM"` or `"7pm"` into an hour of
 * day (0-23). `12AM` is midnight (0), `12PM` is noon (12).
 *
 * @throws Error for anything other than `1`-`12` followed by `AM`/`PM`
 *
 * @example
 * ```ts
 * parseHour("9AM");  // 9
 * parseHour("12PM"); // 12
 * parseHour("7PM");  // 19
 * ```
 */
export function parseHour(value: string): number {
  const text = value.trim().toUpperCase();
  if (!text) {
    throw new Error("Empty time string");
  }

  const match = /^(.*)(AM|PM)$/.exec(text);
  if (!match) {
    throw new Error(`Invalid time format: ${text}. Expected format like '9AM' or '7PM'`);
  }
  const [, digits = "", period] = match;

  if (!/^\d+$/.test(digits.trim())) {
    throw new Error(`Invalid hour in time: ${text}`);
  }
  const hour = Number.parseInt(digits, 10);
  if (hour < 1 || hour > 12) {
    throw new Error(`Hour must be 1-12, got: ${hour}`);
  }

  if (period === "AM") {
    return hour === 12 ? 0 : hour;
  }
  return hour === 12 ? 12 : hour + 12;
}

/**
 * Parses the exclusive end of a window. Midnight (`12AM`) closes the day,
 * so it maps to `hoursPerDay` rather than 0.
 */
export function parseEndHour(value: string, hoursPerDay: number): number {
  const hour = parseHour(value);
  return hour === 0 ? hoursPerDay : hour;
}
