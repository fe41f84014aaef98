/**
 * Library date handling
 *
 * The libraries store dates as short US date/time strings
 * ("3/14/2012 10:15 AM"), in local time and to the minute.
 */

const SHORT_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AaPp][Mm])?)?$/;

/**
 * Parse a library `Date` attribute
 *
 * Accepts `M/D/YYYY [h:mm[:ss] [AM|PM]]` and anything `Date.parse` takes
 * (ISO 8601 in particular).
 *
 * @returns the date, or null when unparseable
 */
export function parseLibraryDate(value: string): Date | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;

  const match = SHORT_DATE.exec(trimmed);
  if (match) {
    const [, month, day, year, hourText, minute, second, meridiem] = match;
    let hour = hourText ? Number(hourText) : 0;
    if (meridiem) {
      const pm = meridiem.toUpperCase() === 'PM';
      if (hour > 12) return null;
      if (pm && hour < 12) hour += 12;
      if (!pm && hour === 12) hour = 0;
    }
    const date = new Date(
      Number(year),
      Number(month) - 1,
      Number(day),
      hour,
      minute ? Number(minute) : 0,
      second ? Number(second) : 0
    );
    // Reject rollover such as 2/31
    if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) return null;
    return date;
  }

  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

/**
 * Drop seconds and milliseconds, as the library does
 */
export function truncateToMinute(date: Date): Date {
  const copy = new Date(date.getTime());
  copy.setSeconds(0, 0);
  return copy;
}

/**
 * Render a date the way the library writes it
 *
 * @example
 * formatLibraryDate(new Date(2012, 2, 14, 22, 5)) // '3/14/2012 10:05 PM'
 */
export function formatLibraryDate(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const meridiem = hours < 12 ? 'AM' : 'PM';
  return `${date.getMonth() + 1}/${date.getDate()}/${date.getFullYear()} ${hour12}:${minutes} ${meridiem}`;
}
