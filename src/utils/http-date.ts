/**
 * HTTP-date and integer header parsing (RFC 9110 §5.6.7).
 *
 * Accepts the three formats a recipient must understand:
 *
 * - IMF-fixdate: `Sun, 06 Nov 1994 08:49:37 GMT`
 * - RFC 850:     `Sunday, 06-Nov-94 08:49:37 GMT`
 * - asctime:     `Sun Nov  6 08:49:37 1994`
 *
 * Anything else yields `undefined`. `Date.parse` is not used on raw input
 * because it accepts strings such as `"1"` or `"tomorrow 0"`.
 */

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const IMF_FIXDATE = /^[A-Za-z]{3}, (\d{2}) ([A-Za-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;
const RFC_850 = /^[A-Za-z]{6,9}, (\d{2})-([A-Za-z]{3})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) GMT$/;
const ASCTIME = /^[A-Za-z]{3} ([A-Za-z]{3}) ([ \d]\d) (\d{2}):(\d{2}):(\d{2}) (\d{4})$/;

const INTEGER = /^[+-]?\d+$/;

function toDate(
  year: number,
  monthName: string,
  day: number,
  hours: number,
  minutes: number,
  seconds: number
): Date | undefined {
  const month = MONTHS[monthName.toLowerCase()];
  if (month === undefined) return undefined;
  if (hours > 23 || minutes > 59 || seconds > 60) return undefined;

  const date = new Date(Date.UTC(year, month, day, hours, minutes, seconds));
  // Reject overflowed days such as 31 Feb
  if (date.getUTCMonth() !== month || date.getUTCDate() !== day) return undefined;
  return date;
}

export function parseHttpDate(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const input = value.trim();

  let match = IMF_FIXDATE.exec(input);
  if (match) {
    return toDate(Number(match[3]), match[2], Number(match[1]), Number(match[4]), Number(match[5]), Number(match[6]));
  }

  match = RFC_850.exec(input);
  if (match) {
    // Two-digit years: 69-99 → 19xx, 00-68 → 20xx
    const yy = Number(match[3]);
    const year = yy >= 69 ? 1900 + yy : 2000 + yy;
    return toDate(year, match[2], Number(match[1]), Number(match[4]), Number(match[5]), Number(match[6]));
  }

  match = ASCTIME.exec(input);
  if (match) {
    return toDate(Number(match[6]), match[1], Number(match[2].trim()), Number(match[3]), Number(match[4]), Number(match[5]));
  }

  return undefined;
}

/**
 * Format a date as IMF-fixdate, the form HTTP senders must generate
 */
export function formatHttpDate(date: Date): string {
  return date.toUTCString();
}

/**
 * Parse an optionally signed decimal integer. Rejects fractions, hex,
 * exponents and surrounding garbage.
 */
export function parseInteger(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  const input = value.trim();
  if (!INTEGER.test(input)) return undefined;
  const parsed = Number(input);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}
