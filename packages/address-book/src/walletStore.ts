import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Transaction, Wallet } from '@whale-signal/core';

/**
 * A wallet as stored in the address book
 */
export interface WalletRecord {
  blockchain: string;
  address: string;
  /** null when the feed had no owner label */
  owner: string | null;
  ownerType: string;
  firstSeen: number;
  lastSeen: number;
}

const WalletRowSchema = z.object({
  blockchain: z.string(),
  address: z.string(),
  owner: z.string().nullable(),
  owner_type: z.string(),
  first_seen: z.number(),
  last_seen: z.number(),
});

function toRecord(row: unknown): WalletRecord {
  const parsed = WalletRowSchema.parse(row);
  return {
    blockchain: parsed.blockchain,
    address: parsed.address,
    owner: parsed.owner,
    ownerType: parsed.owner_type,
    firstSeen: parsed.first_seen,
    lastSeen: parsed.last_seen,
  };
}

/**
 * Record both sides of every transaction.
 *
 * Keyed by (blockchain, address); a later sighting overwrites the owner label
 * and category. Wallets without an address are skipped.
 *
 * @returns Number of wallet rows written
 */
export function upsertWallets(db: Database.Database, transactions: readonly Transaction[]): number {
  const stmt = db.prepare(
    `INSERT INTO wallets (blockchain, address, owner, owner_type, first_seen, last_seen)
     VALUES (?, ?, NULLIF(?, ''), ?, ?, ?)
     ON CONFLICT(blockchain, address) DO UPDATE SET
       owner = excluded.owner,
       owner_type = excluded.owner_type,
       last_seen = MAX(wallets.last_seen, excluded.last_seen)`,
  );

  const write = db.transaction((txs: readonly Transaction[]) => {
    let written = 0;
    for (const tx of txs) {
      for (const wallet of [tx.from, tx.to]) {
        if (wallet.address === '') continue;
        stmt.run(tx.blockchain, wallet.address, wallet.owner, wallet.ownerType, tx.timestamp, tx.timestamp);
        written++;
      }
    }
    return written;
  });

  return write(transactions);
}

export function getWallet(db: Database.Database, blockchain: string, address: string): WalletRecord | undefined {
  const row: unknown = db
    .prepare('SELECT * FROM wallets WHERE blockchain = ? AND address = ?')
    .get(blockchain, address);

  return row === undefined ? undefined : toRecord(row);
}

export function listWallets(db: Database.Database, ownerType?: Wallet['ownerType']): WalletRecord[] {
  const rows =
    ownerType === undefined
      ? db.prepare('SELECT * FROM wallets ORDER BY blockchain, address').all()
      : db.prepare('SELECT * FROM wallets WHERE owner_type = ? ORDER BY blockchain, address').all(ownerType);

  return rows.map(toRecord);
}
