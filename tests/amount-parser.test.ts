import { describe, it, expect } from 'vitest';
import { parseAmount, parseAmountDetailed, parseNumberWords, parseSeparatedNumber } from '../src/domain/services/AmountParser.js';
import { formatAmount } from '../src/domain/services/MoneyFormatter.js';

describe('parseAmount', () => {
  it('reads shorthand suffixes', () => {
    expect(parseAmount('50rb')).toBe(50_000);
    expect(parseAmount('50k')).toBe(50_000);
    expect(parseAmount('1.5jt')).toBe(1_500_000);
    expect(parseAmount('1,5jt')).toBe(1_500_000);
    expect(parseAmount('2 juta')).toBe(2_000_000);
    expect(parseAmount('1.500rb')).toBe(1_500_000);
  });

  it('prefers the longest suffix', () => {
    expect(parseAmount('2 million')).toBe(2_000_000);
    expect(parseAmount('3 miliar')).toBe(3_000_000_000);
  });

  it('reads grouped and decimal numbers', () => {
    expect(parseAmount('Rp 25.000')).toBe(25_000);
    expect(parseAmount('IDR 1.000.000')).toBe(1_000_000);
    expect(parseAmount('1,000,000')).toBe(1_000_000);
    expect(parseAmount('1.000,50')).toBe(1000.5);
    expect(parseAmount('12,5')).toBe(12.5);
  });

  it('reads Indonesian number words', () => {
    expect(parseAmount('lima puluh ribu')).toBe(50_000);
    expect(parseAmount('dua puluh lima ribu')).toBe(25_000);
    expect(parseAmount('lima belas ribu')).toBe(15_000);
    expect(parseAmount('seratus ribu')).toBe(100_000);
    expect(parseAmount('dua juta lima ratus ribu')).toBe(2_500_000);
    expect(parseAmount('sejuta')).toBe(1_000_000);
  });

  it('accepts positive numbers as they are', () => {
    expect(parseAmount(75000)).toBe(75_000);
    expect(parseAmount(10.256)).toBe(10.26);
  });

  it('rejects zero, negatives and text without a number', () => {
    expect(parseAmount('0')).toBeNull();
    expect(parseAmount(-5)).toBeNull();
    expect(parseAmount('')).toBeNull();
    expect(parseAmount('abc')).toBeNull();
  });

  it('reports how the amount was read', () => {
    expect(parseAmountDetailed('50rb')?.method).toBe('shorthand');
    expect(parseAmountDetailed('50000')?.method).toBe('numeric');
    expect(parseAmountDetailed('lima puluh ribu')?.method).toBe('words');
  });
});

describe('parseSeparatedNumber', () => {
  it('treats the later separator as the decimal mark', () => {
    expect(parseSeparatedNumber('1.234,56')).toBe(1234.56);
    expect(parseSeparatedNumber('1,234.56')).toBe(1234.56);
  });

  it('keeps a lone dot as a decimal point when it is not a thousands group', () => {
    expect(parseSeparatedNumber('12.5')).toBe(12.5);
    expect(parseSeparatedNumber('50.000')).toBe(50_000);
  });
});

describe('parseNumberWords', () => {
  it('returns null when no number word is present', () => {
    expect(parseNumberWords('makan siang')).toBeNull();
  });

  it('ignores filler words between number words', () => {
    expect(parseNumberWords('tiga ratus ribu rupiah')).toBe(300_000);
  });
});

describe('formatAmount', () => {
  it('prefixes the currency symbol and groups digits', () => {
    expect(formatAmount(1_500_000, { locale: 'en-US', currency: 'USD' })).toBe('$ 1,500,000');
    expect(formatAmount(-2500.5, { locale: 'en-US', currency: 'usd' })).toBe('-$ 2,500.5');
  });

  it('falls back to the currency code', () => {
    expect(formatAmount(10, { locale: 'en-US', currency: 'SGD' })).toBe('SGD 10');
  });
});
