/**
 * Owner category the feed assigns to exchange wallets
 */
export const EXCHANGE_OWNER_TYPE = 'exchange';

/**
 * Transaction kinds the classifier understands. Anything else is reported as unhandled.
 */
export const TransactionKind = {
  MINT: 'mint',
  BURN: 'burn',
  TRANSFER: 'transfer',
} as const;
export type TransactionKind = (typeof TransactionKind)[keyof typeof TransactionKind];

/**
 * One side of a transaction
 */
export interface Wallet {
  address: string;

  /** Owner label (e.g. an exchange name), empty when the feed does not know it */
  owner: string;

  /** Owner category: "exchange", "unknown", "other", or any other feed-supplied string */
  ownerType: string;
}

/**
 * A transaction as reported by the feed. Never mutated after fetching.
 */
export interface Transaction {
  blockchain: string;
  symbol: string;
  id: string;

  /** Free-text kind tag ("mint", "burn", "transfer", ...) */
  transactionType: string;

  hash: string;
  from: Wallet;
  to: Wallet;

  /** Unix seconds */
  timestamp: number;

  /** Amount in the asset's native units */
  amount: number;

  /** USD value at the time of the transaction */
  amountUsd: number;

  /** Number of transfers batched into this entry */
  transactionCount: number;
}
