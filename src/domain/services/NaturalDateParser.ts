import dayjs from 'dayjs';

export type RelativeUnit = 'day' | 'week' | 'month' | 'year';

export interface DateVocabulary {
  relative: Record<string, readonly [number, RelativeUnit]>;
  months: Record<string, number>;
}

export type ParsedDateKind = 'relative' | 'day_month' | 'iso' | 'year';

export interface ParsedDate {
  date: string; // YYYY-MM-DD
  kind: ParsedDateKind;
}

const isoPattern = /^(\d{4})-(\d{2})-(\d{2})$/;
const dayMonthPattern = /^(\d{1,2})\s+([a-z]+)\.?(?:\s+(\d{4}))?$/;
const yearPattern = /^\d{4}$/;

const pad = (value: number): string => String(value).padStart(2, '0');

/** Calendar date of `epochMs` in `timeZone`, as YYYY-MM-DD. */
export const calendarDateIn = (epochMs: number, timeZone: string): string =>
  new Intl.DateTimeFormat('en-CA', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' }).format(
    new Date(epochMs),
  );

// dayjs rolls 2025-02-30 over to March; a round trip catches that.
const isCalendarDate = (value: string): boolean => dayjs(value).isValid() && dayjs(value).format('YYYY-MM-DD') === value;

const parseDayMonth = (input: string, today: string, months: Record<string, number>): string | null => {
  const match = dayMonthPattern.exec(input);
  if (!match) {
    return null;
  }

  const [, dayText = '', monthName = '', yearText] = match;
  const month = months[monthName];
  if (month === undefined) {
    return null;
  }

  const day = Number(dayText);
  const year = yearText ? Number(yearText) : Number(today.slice(0, 4));
  let candidate = `${year}-${pad(month)}-${pad(day)}`;

  if (!isCalendarDate(candidate)) {
    return null;
  }

  if (!yearText && candidate < today) {
    candidate = `${year + 1}-${pad(month)}-${pad(day)}`;
    // 29 February may not exist next year.
    if (!isCalendarDate(candidate)) {
      return null;
    }
  }

  return candidate;
};

/**
 * Reads relative terms, "<day> <month> [year]", strict YYYY-MM-DD and bare
 * years, in that order. `today` anchors every relative computation.
 */
export const parseNaturalDate = (raw: string, today: string, vocabulary: DateVocabulary): ParsedDate | null => {
  const input = raw.trim().toLowerCase().replace(/\s+/g, ' ');
  if (!input) {
    return null;
  }

  const relative = vocabulary.relative[input];
  if (relative) {
    const [amount, unit] = relative;
    return { date: dayjs(today).add(amount, unit).format('YYYY-MM-DD'), kind: 'relative' };
  }

  const dayMonth = parseDayMonth(input, today, vocabulary.months);
  if (dayMonth) {
    return { date: dayMonth, kind: 'day_month' };
  }

  if (isoPattern.test(input) && isCalendarDate(input)) {
    return { date: input, kind: 'iso' };
  }

  if (yearPattern.test(input)) {
    return { date: `${input}-12-31`, kind: 'year' };
  }

  return null;
};
