import { vi } from 'vitest';
import type { ClockPort } from '../src/application/ports/ClockPort.js';
import type { LoggerPort } from '../src/application/ports/LoggerPort.js';
import { loadFinanceVocabulary, loadIntentCorpus } from '../src/infrastructure/config/VocabularyLoader.js';

// 12:00 in Asia/Jakarta on 2025-06-15.
export const FIXED_NOW = Date.parse('2025-06-15T05:00:00Z');

export const TEST_TIMEZONE = 'Asia/Jakarta';

export class FixedClock implements ClockPort {
  constructor(private current: number = FIXED_NOW) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export const createLogger = () => ({
  debug: vi.fn<LoggerPort['debug']>(),
  info: vi.fn<LoggerPort['info']>(),
  warn: vi.fn<LoggerPort['warn']>(),
  error: vi.fn<LoggerPort['error']>(),
});

export const vocabulary = loadFinanceVocabulary();

export const intentCorpus = loadIntentCorpus();
