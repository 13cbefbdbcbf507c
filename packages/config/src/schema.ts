import { z } from 'zod';

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

/**
 * Report format enumeration
 */
export const reportFormatSchema = z.enum(['plain', 'markdown']);

/**
 * Chat bot configuration (report and log destinations)
 */
export const telegramConfigSchema = z.object({
  /** Bot API base URL */
  apiUrl: z.string().url().default('https://api.telegram.org'),

  /** Bot token */
  botToken: z.string().default(''),

  /** Chat that receives the signal report */
  recipientId: z.coerce.string().default(''),

  /** Chat that receives errors and diagnostics */
  logId: z.coerce.string().default(''),

  /** Request timeout in milliseconds */
  timeoutMs: z.coerce.number().int().min(1000).max(60000).default(10000),

  /** Retry attempts (one-shot retry at most) */
  maxRetries: z.coerce.number().int().min(0).max(1).default(0),

  /** Delay before the retry in ms */
  retryDelayMs: z.coerce.number().int().min(100).max(10000).default(1000),
});
export type TelegramConfig = z.infer<typeof telegramConfigSchema>;

/**
 * Transaction feed configuration
 */
export const feedConfigSchema = z.object({
  /** Transactions endpoint */
  url: z.string().url().default('https://api.whale-alert.io/v1/transactions'),

  apiKey: z.string().default(''),

  /** Minimum USD value of a reported transaction */
  minValue: z.coerce.number().int().min(0).default(500000),

  /** Page size */
  limit: z.coerce.number().int().min(1).max(1000).default(100),

  /** Per-request timeout in milliseconds */
  timeoutMs: z.coerce.number().int().min(1000).max(120000).default(15000),
});
export type FeedConfig = z.infer<typeof feedConfigSchema>;

/**
 * Report configuration
 */
export const reportConfigSchema = z.object({
  /** Aggregates with an absolute value below this are left out */
  significanceFloorUsd: z.coerce.number().min(0).default(1_000_000),

  format: reportFormatSchema.default('markdown'),

  /** Post a run summary (count, window, feed URL) to the log chat */
  sendRunSummary: z.boolean().default(false),
});
export type ReportConfig = z.infer<typeof reportConfigSchema>;

/**
 * Address book (observed wallet metadata) configuration
 */
export const addressBookConfigSchema = z.object({
  enabled: z.boolean().default(false),

  /** SQLite database file */
  dbPath: z.string().min(1).default('./data/address-book.db'),
});
export type AddressBookConfig = z.infer<typeof addressBookConfigSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Complete configuration
 */
export const appConfigSchema = z.object({
  telegram: telegramConfigSchema.default({}),
  feed: feedConfigSchema.default({}),
  report: reportConfigSchema.default({}),

  /** Stablecoin tickers, compared case-insensitively */
  stablecoins: z.array(z.string().min(1)).default([]),

  /** Raw symbol -> canonical symbol */
  remap: z.record(z.string(), z.string().min(1)).default({}),

  addressBook: addressBookConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});
export type AppConfig = z.infer<typeof appConfigSchema>;
