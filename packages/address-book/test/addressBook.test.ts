import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type Database from 'better-sqlite3';
import type { Transaction, Wallet } from '@whale-signal/core';
import { openAddressBook, upsertWallets, getWallet, listWallets } from '../src/index.js';

let db: Database.Database;
let tmpDir: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'ws-book-'));
  db = openAddressBook(join(tmpDir, 'nested', 'book.db'));
});

afterEach(() => {
  db.close();
  rmSync(tmpDir, { recursive: true, force: true });
});

function wallet(address: string, ownerType: string, owner = ''): Wallet {
  return { address, owner, ownerType };
}

function transfer(from: Wallet, to: Wallet, timestamp = 1700000000): Transaction {
  return {
    blockchain: 'ethereum',
    symbol: 'xyz',
    id: '1',
    transactionType: 'transfer',
    hash: '0xhash',
    from,
    to,
    timestamp,
    amount: 1,
    amountUsd: 1_000_000,
    transactionCount: 1,
  };
}

describe('openAddressBook', () => {
  it('creates the wallets table and tracks the migration', () => {
    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .pluck()
      .all();
    expect(tables).toEqual(['_migrations', 'wallets']);

    const migrations = db.prepare('SELECT name FROM _migrations').pluck().all();
    expect(migrations).toEqual(['001_wallets.sql']);
  });

  it('does not re-apply migrations when reopened', () => {
    const path = join(tmpDir, 'nested', 'book.db');
    db.close();
    db = openAddressBook(path);

    const migrations = db.prepare('SELECT name FROM _migrations').pluck().all();
    expect(migrations).toEqual(['001_wallets.sql']);
  });
});

describe('walletStore', () => {
  it('records both sides of a transaction', () => {
    const written = upsertWallets(db, [transfer(wallet('0xaaa', 'exchange', 'binance'), wallet('0xbbb', 'unknown'))]);

    expect(written).toBe(2);
    expect(getWallet(db, 'ethereum', '0xaaa')).toEqual({
      blockchain: 'ethereum',
      address: '0xaaa',
      owner: 'binance',
      ownerType: 'exchange',
      firstSeen: 1700000000,
      lastSeen: 1700000000,
    });
  });

  it('stores an empty owner as null', () => {
    upsertWallets(db, [transfer(wallet('0xaaa', 'unknown'), wallet('0xbbb', 'unknown'))]);

    expect(getWallet(db, 'ethereum', '0xaaa')?.owner).toBeNull();
  });

  it('skips wallets without an address', () => {
    const written = upsertWallets(db, [transfer(wallet('', 'unknown'), wallet('0xbbb', 'exchange', 'kraken'))]);

    expect(written).toBe(1);
    expect(listWallets(db)).toHaveLength(1);
  });

  it('updates the label and last sighting on conflict', () => {
    upsertWallets(db, [transfer(wallet('0xaaa', 'unknown'), wallet('0xbbb', 'unknown'), 100)]);
    upsertWallets(db, [transfer(wallet('0xaaa', 'exchange', 'okx'), wallet('0xbbb', 'unknown'), 200)]);

    const read = getWallet(db, 'ethereum', '0xaaa');
    expect(read?.owner).toBe('okx');
    expect(read?.ownerType).toBe('exchange');
    expect(read?.firstSeen).toBe(100);
    expect(read?.lastSeen).toBe(200);
  });

  it('returns undefined for an unknown wallet', () => {
    expect(getWallet(db, 'ethereum', '0xnone')).toBeUndefined();
  });

  it('filters the listing by owner category', () => {
    upsertWallets(db, [
      transfer(wallet('0xccc', 'exchange', 'kraken'), wallet('0xbbb', 'unknown')),
      transfer(wallet('0xaaa', 'exchange', 'binance'), wallet('0xddd', 'other')),
    ]);

    expect(listWallets(db, 'exchange').map((w) => w.address)).toEqual(['0xaaa', '0xccc']);
    expect(listWallets(db)).toHaveLength(4);
  });
});
