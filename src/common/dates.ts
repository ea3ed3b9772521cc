// Invoice timestamps carry no zone. They are read and formatted as UTC so the
// calendar date never shifts with the host's local time.

const ISO_REGEX = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?Z?$/;
const US_REGEX = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/** Parses "2010-12-01 08:26:00", "2010-12-01T08:26" or "12/1/2010 8:26" */
export function parseInvoiceDate(text: string | undefined): Date | null {
  const value = (text ?? '').trim();
  if (!value) return null;

  const iso = ISO_REGEX.exec(value);
  if (iso) {
    return buildUtcDate(iso[1], iso[2], iso[3], iso[4], iso[5], iso[6]);
  }

  const us = US_REGEX.exec(value);
  if (us) {
    return buildUtcDate(us[3], us[1], us[2], us[4], us[5], us[6]);
  }

  return null;
}

function buildUtcDate(
  year: string,
  month: string,
  day: string,
  hour = '0',
  minute = '0',
  second = '0',
): Date | null {
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);

  // Date.UTC reads years 0-99 as 1900-1999
  if (y < 1000 || mo < 1 || mo > 12 || d < 1 || h > 23 || mi > 59 || s > 59) return null;

  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  // Rejects 2010-02-30 and friends, which Date.UTC silently rolls over
  if (date.getUTCMonth() !== mo - 1 || date.getUTCDate() !== d) return null;
  return date;
}

/** YYYY-MM-DD */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** YYYY-MM-DD HH:mm:ss */
export function toIsoDateTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/** ISO weekday, 1 = Monday … 7 = Sunday */
export function isoWeekday(date: Date): number {
  return ((date.getUTCDay() + 6) % 7) + 1;
}
