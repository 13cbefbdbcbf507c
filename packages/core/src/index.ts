// Model
export { EXCHANGE_OWNER_TYPE, TransactionKind } from './transaction.js';
export type { Transaction, Wallet } from './transaction.js';
export { Effect, Ledger, emptyEffectCounts } from './classification.js';
export type {
  Classification,
  AggregatedClassification,
  IgnoredClassification,
  UnhandledClassification,
} from './classification.js';

// Classification rules
export {
  RuleRegistry,
  createDefaultRegistry,
  MintRule,
  BurnRule,
  UnhandledKindRule,
  InternalTransferRule,
  ExchangeOutflowRule,
  ExchangeInflowRule,
  PeerToPeerRule,
  describeUnhandled,
} from './rules/index.js';
export type { ClassificationRule, RuleMetadata } from './rules/index.js';

// Aggregation
export { summarizeTransactions, createSymbolResolver, countAggregated } from './summarize.js';
export type { AggregateMap, RemapTable, Summary } from './summarize.js';

// Signals
export {
  analyzeSummary,
  isStablecoin,
  directionFor,
  DEFAULT_SIGNIFICANCE_FLOOR_USD,
  SECTION_ORDER,
} from './analyze.js';
export type {
  AnalyzeOptions,
  Direction,
  ReportSection,
  SectionTitle,
  SignalLine,
  SignalReport,
} from './analyze.js';
export {
  formatUsd,
  formatSignalLine,
  renderReport,
  renderSignalReport,
  renderDiagnostics,
  renderUnhandled,
  renderRunSummary,
} from './render.js';
export type { ReportFormat } from './render.js';
