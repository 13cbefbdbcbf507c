import type { Transaction, Wallet } from '../src/index.js';

export function makeWallet(ownerType: string, owner = ''): Wallet {
  return { address: `addr-${ownerType}-${owner || 'anon'}`, owner, ownerType };
}

/**
 * Build a transaction with sensible defaults for tests
 */
export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    blockchain: 'ethereum',
    symbol: 'xyz',
    id: '1',
    transactionType: 'transfer',
    hash: '0xhash',
    from: makeWallet('unknown'),
    to: makeWallet('unknown'),
    timestamp: 1700000000,
    amount: 1,
    amountUsd: 1_000_000,
    transactionCount: 1,
    ...overrides,
  };
}
