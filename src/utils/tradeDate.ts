const DASHED = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})$/;

export const KRX_TIME_ZONE = 'Asia/Seoul';

/**
 * Parses `YYYY-MM-DD` or `YYYYMMDD` into canonical `YYYY-MM-DD`.
 * Returns undefined for malformed strings and impossible dates.
 */
export function parseTradeDate(raw: string): string | undefined {
  const match = DASHED.exec(raw.trim()) ?? COMPACT.exec(raw.trim());
  if (!match) {
    return undefined;
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return undefined;
  }

  return `${year}-${month}-${day}`;
}

/** `2024-08-01` -> `20240801` */
export function toCompactDate(tradeDate: string): string {
  return tradeDate.replace(/-/g, '');
}

function calendarDateIn(timeZone: string, now: Date): Date {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((part) => part.type === type)?.value);

  return new Date(Date.UTC(pick('year'), pick('month') - 1, pick('day')));
}

/**
 * Most recent weekday (Mon-Fri) on the calendar of `timeZone`, as
 * `YYYY-MM-DD`. Exchange holidays are not known here; crawling one yields no
 * rows.
 */
export function latestWeekday(now: Date = new Date(), timeZone = KRX_TIME_ZONE): string {
  const date = calendarDateIn(timeZone, now);
  while (date.getUTCDay() === 0 || date.getUTCDay() === 6) {
    date.setUTCDate(date.getUTCDate() - 1);
  }
  return date.toISOString().slice(0, 10);
}
