import { z } from 'zod';
import type { Transaction } from '@whale-signal/core';

export const FeedWalletSchema = z.object({
  address: z.string().default(''),
  owner: z.string().default(''),
  owner_type: z.string().default('unknown'),
});

/**
 * One feed item. Fields the classifier does not key on are zero-filled when absent.
 */
export const FeedTransactionSchema = z.object({
  blockchain: z.string(),
  symbol: z.string(),
  id: z.union([z.string(), z.number()]).transform(String).default(''),
  transaction_type: z.string(),
  hash: z.string().default(''),
  from: FeedWalletSchema.default({}),
  to: FeedWalletSchema.default({}),
  timestamp: z.number().int().default(0),
  amount: z.number().default(0),
  amount_usd: z.number(),
  transaction_count: z.number().int().default(1),
});

/**
 * One page of the transaction feed. Failure responses usually carry only result and message.
 * Items are validated one by one with FeedTransactionSchema so a bad item does not sink the page.
 */
export const FeedResponseSchema = z.object({
  result: z.string(),
  message: z.string().optional(),
  cursor: z.string().optional(),
  count: z.number().int().nonnegative().optional(),
  transactions: z.array(z.unknown()).default([]),
});

export type FeedTransaction = z.infer<typeof FeedTransactionSchema>;
export type FeedResponse = z.infer<typeof FeedResponseSchema>;

export function toTransaction(raw: FeedTransaction): Transaction {
  return {
    blockchain: raw.blockchain,
    symbol: raw.symbol,
    id: raw.id,
    transactionType: raw.transaction_type,
    hash: raw.hash,
    from: { address: raw.from.address, owner: raw.from.owner, ownerType: raw.from.owner_type },
    to: { address: raw.to.address, owner: raw.to.owner, ownerType: raw.to.owner_type },
    timestamp: raw.timestamp,
    amount: raw.amount,
    amountUsd: raw.amount_usd,
    transactionCount: raw.transaction_count,
  };
}

export type FeedItemOutcome = { ok: true; transaction: Transaction } | { ok: false; reason: string };

/**
 * Validate and map one raw feed item
 */
export function parseFeedItem(raw: unknown): FeedItemOutcome {
  const result = FeedTransactionSchema.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues.map((i) => `${i.path.join('.') || '(item)'}: ${i.message}`).join('; ');
    return { ok: false, reason };
  }
  return { ok: true, transaction: toTransaction(result.data) };
}
