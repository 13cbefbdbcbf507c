export {
  appConfigSchema,
  telegramConfigSchema,
  feedConfigSchema,
  reportConfigSchema,
  reportFormatSchema,
  addressBookConfigSchema,
  loggingConfigSchema,
  logLevelSchema,
  logFormatSchema,
} from './schema.js';
export type {
  AppConfig,
  TelegramConfig,
  FeedConfig,
  ReportConfig,
  AddressBookConfig,
  LoggingConfig,
  LogLevel,
  LogFormat,
} from './schema.js';
export { loadConfig, parseConfig, maskSecret, ConfigError } from './load.js';
