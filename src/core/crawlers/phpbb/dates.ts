import monthNames from "./month-names.json";

const MONTH_KEYS: Array<[string, number]> = Object.entries(monthNames).sort(
  (a, b) => b[0].length - a[0].length
);

// 01.05.2023 10:20
const NUMERIC_RE = /(\d{1,2})\.\s*(\d{1,2})\.\s*(\d{4}),?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?/;
// 01 May 2023, 10:20 | 01. kvě 2023 10:20:00
const DAY_FIRST_RE =
  /(\d{1,2})\.?\s+([^\s\d.,]+)\.?\s+(\d{4}),?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(am|pm)?/i;
// Mon May 01, 2023 10:20 am
const MONTH_FIRST_RE =
  /([^\s\d.,]+)\.?\s+(\d{1,2}),\s*(\d{4}),?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(am|pm)?/i;

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/** "+01:00" -> 60 */
export function parseUtcOffset(offset: string): number {
  const m = /^([+-])(\d{2}):?(\d{2})$/.exec(offset.trim());
  if (!m) throw new Error(`Invalid UTC offset "${offset}"`);
  const minutes = Number(m[2]) * 60 + Number(m[3]);
  return m[1] === "-" ? -minutes : minutes;
}

/** Formats as `YYYY-MM-DDTHH:mm:ss+00:00`. */
export function toIsoWithOffset(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "+00:00");
}

export function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  for (const [key, month] of MONTH_KEYS) {
    if (lower.startsWith(key)) return month;
  }
  return null;
}

/**
 * Normalises a post date. The machine-readable `datetime` attribute wins;
 * otherwise the display text is read in the forum's display offset.
 */
export function normalizePostDate(
  datetimeAttr: string | undefined,
  displayText: string,
  displayOffsetMinutes: number
): string | null {
  if (datetimeAttr) {
    const d = new Date(datetimeAttr);
    if (!Number.isNaN(d.getTime())) return toIsoWithOffset(d);
  }

  const parts = parseDisplayDate(displayText);
  if (!parts) return null;
  const ms =
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second) -
    displayOffsetMinutes * 60_000;
  return toIsoWithOffset(new Date(ms));
}

function parseDisplayDate(txt: string): DateParts | null {
  const numeric = NUMERIC_RE.exec(txt);
  if (numeric) {
    return validate({
      day: Number(numeric[1]),
      month: Number(numeric[2]),
      year: Number(numeric[3]),
      hour: Number(numeric[4]),
      minute: Number(numeric[5]),
      second: Number(numeric[6] ?? 0),
    });
  }

  const dayFirst = DAY_FIRST_RE.exec(txt);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2]);
    if (month !== null) {
      return validate({
        day: Number(dayFirst[1]),
        month,
        year: Number(dayFirst[3]),
        hour: to24h(Number(dayFirst[4]), dayFirst[7]),
        minute: Number(dayFirst[5]),
        second: Number(dayFirst[6] ?? 0),
      });
    }
  }

  const monthFirst = MONTH_FIRST_RE.exec(txt);
  if (monthFirst) {
    const month = monthFromName(monthFirst[1]);
    if (month !== null) {
      return validate({
        day: Number(monthFirst[2]),
        month,
        year: Number(monthFirst[3]),
        hour: to24h(Number(monthFirst[4]), monthFirst[7]),
        minute: Number(monthFirst[5]),
        second: Number(monthFirst[6] ?? 0),
      });
    }
  }

  return null;
}

function to24h(hour: number, meridiem: string | undefined): number {
  if (!meridiem) return hour;
  const pm = meridiem.toLowerCase() === "pm";
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
}

function validate(p: DateParts): DateParts | null {
  if (p.month < 1 || p.month > 12) return null;
  if (p.day < 1 || p.day > 31) return null;
  if (p.hour > 23 || p.minute > 59 || p.second > 59) return null;
  // Date.UTC rolls 31.02. over into March
  const d = new Date(Date.UTC(p.year, p.month - 1, p.day));
  if (d.getUTCFullYear() !== p.year || d.getUTCMonth() !== p.month - 1 || d.getUTCDate() !== p.day) {
    return null;
  }
  return p;
}
