export { FeedClient, createFeedClient, fetchTransactions, redactApiKey } from './client.js';
export type { FeedClientConfig, FetchOptions, FetchResult, TimeWindow } from './client.js';
export { FeedError } from './errors.js';
export type { FeedErrorKind } from './errors.js';
export {
  FeedResponseSchema,
  FeedTransactionSchema,
  FeedWalletSchema,
  parseFeedItem,
  toTransaction,
} from './schema.js';
export type { FeedItemOutcome, FeedResponse, FeedTransaction } from './schema.js';
