import type { LogLevel } from '../../application/ports/LoggerPort.js';

export type LogThreshold = LogLevel | 'silent';

export interface AppConfig {
  database: {
    path: string;
  };
  embeddings: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
  };
  app: {
    timeZone: string;
    baseCurrency: string;
    locale: string;
    defaultAccount: string;
  };
  conversation: {
    ttlMinutes: number;
  };
  limits: {
    largeAmountThreshold: number;
    maxTransactionAmount: number;
    duplicateWindowSeconds: number;
  };
  logLevel: LogThreshold;
}

const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

const numberFrom = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
};

const logLevelFrom = (raw: string | undefined): LogThreshold =>
  LOG_THRESHOLDS.find((level) => level === raw?.trim().toLowerCase()) ?? 'info';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  database: {
    path: env.DATABASE_PATH ?? 'data/finance.db',
  },
  embeddings: {
    apiKey: env.EMBEDDINGS_API_KEY ?? env.OPENAI_API_KEY,
    baseUrl: env.EMBEDDINGS_BASE_URL,
    model: env.EMBEDDINGS_MODEL ?? 'text-embedding-3-small',
  },
  app: {
    timeZone: env.APP_TIMEZONE ?? 'Asia/Jakarta',
    baseCurrency: env.APP_BASE_CURRENCY ?? 'IDR',
    locale: env.APP_LOCALE ?? 'id-ID',
    defaultAccount: env.DEFAULT_ACCOUNT ?? 'Cash',
  },
  conversation: {
    ttlMinutes: numberFrom(env.CONVERSATION_TTL_MINUTES, 60),
  },
  limits: {
    largeAmountThreshold: numberFrom(env.LARGE_AMOUNT_THRESHOLD, 10_000_000),
    maxTransactionAmount: numberFrom(env.MAX_TRANSACTION_AMOUNT, 100_000_000_000),
    duplicateWindowSeconds: numberFrom(env.DUPLICATE_WINDOW_SECONDS, 5),
  },
  logLevel: logLevelFrom(env.LOG_LEVEL),
});
