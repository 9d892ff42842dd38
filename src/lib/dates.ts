const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

const MIN_YEAR = 1901;
const MAX_YEAR = 2099;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function isPlausibleDate(year: number, month: number, day: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR && isCalendarDate(year, month, day);
}

function parseOffsetMinutes(offset: string | undefined): number {
  if (!offset || offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

function parseIsoDate(text: string): Date | null {
  const match = ISO_PATTERN.exec(text);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, frac, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  if (!isCalendarDate(year, month, day)) return null;

  const hour = Number(h ?? 0);
  const minute = Number(mi ?? 0);
  const second = Number(s ?? 0);
  if (hour > 23 || minute > 59 || second > 59) return null;
  const millis = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;

  const date = new Date(0);
  // setUTCFullYear keeps years below 100 as written
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute - parseOffsetMinutes(offset), second, millis);
  return date;
}

function toWholeNumber(part: string): number | null {
  const trimmed = part.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Reads a receipt date typed by a person. Tries ISO-8601 first, then
 * `d/m/y` and `y/m/d` with `/`, `-` or `.` separators. Dates without an
 * offset are taken as UTC. Returns null when nothing plausible matches.
 */
export function parseReceiptDate(value: string | null | undefined): Date | null {
  const text = (value ?? '').trim();
  if (!text) return null;

  const iso = parseIsoDate(text);
  if (iso) return iso;

  const parts = text.split(/[/\-.]/);
  if (parts.length < 3) return null;
  const [first, second, third] = parts.slice(0, 3).map(toWholeNumber);
  if (first === null || second === null || third === null) return null;

  if (isPlausibleDate(third, second, first)) {
    return new Date(Date.UTC(third, second - 1, first));
  }
  if (isPlausibleDate(first, second, third)) {
    return new Date(Date.UTC(first, second - 1, third));
  }
  return null;
}
