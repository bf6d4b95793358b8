import { afterEach, describe, it, expect, vi } from 'vitest';
import { AppContainer } from '../src/infrastructure/bootstrap/AppContainer.js';
import { loadConfig } from '../src/infrastructure/config/Config.js';
import { ConsoleLogger } from '../src/infrastructure/logging/ConsoleLogger.js';
import { createLogger, FixedClock } from './fixtures.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.database.path).toBe('data/finance.db');
    expect(config.app).toEqual({ timeZone: 'Asia/Jakarta', baseCurrency: 'IDR', locale: 'id-ID', defaultAccount: 'Cash' });
    expect(config.conversation.ttlMinutes).toBe(60);
    expect(config.limits).toEqual({ largeAmountThreshold: 10_000_000, maxTransactionAmount: 100_000_000_000, duplicateWindowSeconds: 5 });
    expect(config.embeddings.apiKey).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('reads overrides and ignores unusable numbers', () => {
    const config = loadConfig({
      DATABASE_PATH: '/tmp/test.db',
      OPENAI_API_KEY: 'test-secret',
      CONVERSATION_TTL_MINUTES: '15',
      LARGE_AMOUNT_THRESHOLD: 'lots',
      DUPLICATE_WINDOW_SECONDS: '-1',
      LOG_LEVEL: ' WARN ',
    });

    expect(config.database.path).toBe('/tmp/test.db');
    expect(config.embeddings.apiKey).toBe('test-secret');
    expect(config.conversation.ttlMinutes).toBe(15);
    expect(config.limits.largeAmountThreshold).toBe(10_000_000);
    expect(config.limits.duplicateWindowSeconds).toBe(5);
    expect(config.logLevel).toBe('warn');
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops events below the threshold and routes the rest by level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('warn');

    logger.info('ignored_event', { id: 1 });
    logger.warn('slow_backend', { backend: 'remote' });
    logger.error('save_failed', {});

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('⚠️ slow_backend', { backend: 'remote' });
    expect(error).toHaveBeenCalledWith('❌ save_failed');
  });

  it('stays quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new ConsoleLogger('silent').error('save_failed');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('AppContainer', () => {
  it('wires the services against one SQLite database', async () => {
    const logger = createLogger();
    const config = loadConfig({ DATABASE_PATH: ':memory:' });
    const container = new AppContainer({ config, logger, clock: new FixedClock(), remoteEmbeddings: null });

    const route = await container.chatFlow.routeMessage('user-1', 'session-1', 'catat pengeluaran 50000 untuk makan');
    expect(route).toMatchObject({ kind: 'flow', intent: 'add_transaction', state: 'AWAITING_AMOUNT' });

    const stored = await container.stateStore.findBySession('session-1');
    expect(stored?.intent).toBe('add_transaction');

    const result = await container.actionExecutor.executeAction('user-1', 'add_transaction', {
      type: 'expense',
      amount: 20000,
      category: 'Transport',
    });
    expect(result.code).toBe('TRANSACTION_ADDED');

    container.close();
    expect(logger.info).toHaveBeenCalledWith('database_initialized', { path: ':memory:' });
    expect(logger.info).toHaveBeenCalledWith('database_closed');
  });
});
