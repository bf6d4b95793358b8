export type AmountParseMethod = 'shorthand' | 'numeric' | 'words';

export interface ParsedAmount {
  value: number;
  method: AmountParseMethod;
}

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  rb: 1_000,
  ribu: 1_000,
  jt: 1_000_000,
  juta: 1_000_000,
  m: 1_000_000,
  million: 1_000_000,
  b: 1_000_000_000,
  miliar: 1_000_000_000,
  milyar: 1_000_000_000,
  billion: 1_000_000_000,
};

// Longer suffixes first so "million" is not read as "m".
const shorthandPattern = /(\d+(?:[.,]\d+)*)\s*(million|miliar|milyar|billion|ribu|juta|rb|jt|k|m|b)\b/i;
const numericPattern = /\d(?:[\d.,]*\d)?/;
const currencyPrefix = /^(?:rp\.?|idr)\s*/i;

const DIGIT_WORDS: Record<string, number> = {
  nol: 0,
  kosong: 0,
  satu: 1,
  dua: 2,
  tiga: 3,
  empat: 4,
  lima: 5,
  enam: 6,
  tujuh: 7,
  delapan: 8,
  sembilan: 9,
};

const SCALE_WORDS: Record<string, number> = {
  ribu: 1_000,
  juta: 1_000_000,
  miliar: 1_000_000_000,
  milyar: 1_000_000_000,
};

const PREFIXED_SCALE_WORDS: Record<string, number> = {
  seribu: 1_000,
  sejuta: 1_000_000,
  semiliar: 1_000_000_000,
};

const roundCents = (value: number): number => Math.round(value * 100) / 100;

const isThousandsGrouped = (token: string, separator: '.' | ','): boolean =>
  new RegExp(`^\\d{1,3}(\\${separator}\\d{3})+$`).test(token);

/**
 * Reads "1.000,50", "1,000.50", "50.000", "12,5" and "12.5". When both
 * separators appear the later one is the decimal mark.
 */
export const parseSeparatedNumber = (token: string): number | null => {
  const lastDot = token.lastIndexOf('.');
  const lastComma = token.lastIndexOf(',');
  let normalized: string;

  if (lastDot >= 0 && lastComma >= 0) {
    normalized =
      lastComma > lastDot ? token.replace(/\./g, '').replace(',', '.') : token.replace(/,/g, '');
  } else if (lastComma >= 0) {
    normalized = isThousandsGrouped(token, ',') ? token.replace(/,/g, '') : token.replace(',', '.');
  } else if (lastDot >= 0) {
    normalized = isThousandsGrouped(token, '.') ? token.replace(/\./g, '') : token;
  } else {
    normalized = token;
  }

  const value = Number(normalized);
  return Number.isFinite(value) ? value : null;
};

const parseShorthand = (input: string): number | null => {
  const match = shorthandPattern.exec(input);
  if (!match) {
    return null;
  }

  const [, numberPart = '', suffix = ''] = match;
  const multiplier = SUFFIX_MULTIPLIERS[suffix.toLowerCase()];
  if (multiplier === undefined) {
    return null;
  }

  // "1.500rb" groups thousands; "1.5jt" and "1,5jt" are decimals.
  const base = isThousandsGrouped(numberPart, '.')
    ? Number(numberPart.replace(/\./g, ''))
    : Number(numberPart.replace(',', '.'));

  return Number.isFinite(base) ? base * multiplier : null;
};

const parseNumeric = (input: string): number | null => {
  const match = numericPattern.exec(input);
  return match ? parseSeparatedNumber(match[0]) : null;
};

/**
 * Running-total reading of Indonesian number words. Scale words (ribu, juta,
 * miliar) multiply the pending group and flush it into the total; ratus,
 * puluh and belas shape the pending group.
 */
export const parseNumberWords = (input: string): number | null => {
  const words = input.toLowerCase().split(/[\s-]+/).filter(Boolean);
  let total = 0;
  let hundreds = 0;
  let small = 0;
  let matched = false;

  for (const word of words) {
    const digit = DIGIT_WORDS[word];
    const scale = SCALE_WORDS[word];
    const prefixedScale = PREFIXED_SCALE_WORDS[word];

    if (digit !== undefined) {
      small += digit;
    } else if (word === 'sepuluh') {
      small += 10;
    } else if (word === 'sebelas') {
      small += 11;
    } else if (word === 'seratus') {
      hundreds += 100;
    } else if (word === 'belas') {
      small += 10;
    } else if (word === 'puluh') {
      small *= 10;
    } else if (word === 'ratus') {
      hundreds += (small || 1) * 100;
      small = 0;
    } else if (scale !== undefined) {
      total += (hundreds + small || 1) * scale;
      hundreds = 0;
      small = 0;
    } else if (prefixedScale !== undefined) {
      total += hundreds + small + prefixedScale;
      hundreds = 0;
      small = 0;
    } else {
      continue;
    }

    matched = true;
  }

  if (!matched) {
    return null;
  }

  return total + hundreds + small;
};

export const parseAmountDetailed = (raw: string | number): ParsedAmount | null => {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) && raw > 0 ? { value: roundCents(raw), method: 'numeric' } : null;
  }

  const input = raw.trim().replace(currencyPrefix, '');
  if (!input) {
    return null;
  }

  const attempts: Array<[AmountParseMethod, (text: string) => number | null]> = [
    ['shorthand', parseShorthand],
    ['numeric', parseNumeric],
    ['words', parseNumberWords],
  ];

  for (const [method, parse] of attempts) {
    const value = parse(input);
    if (value !== null) {
      return value > 0 ? { value: roundCents(value), method } : null;
    }
  }

  return null;
};

export const parseAmount = (raw: string | number): number | null => parseAmountDetailed(raw)?.value ?? null;
