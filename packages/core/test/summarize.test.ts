import { describe, it, expect } from 'vitest';
import {
  summarizeTransactions,
  createSymbolResolver,
  countAggregated,
  Effect,
} from '../src/index.js';
import { makeTransaction, makeWallet } from './fixtures.js';

describe('createSymbolResolver', () => {
  it('uppercases symbols without a remap entry', () => {
    expect(createSymbolResolver()('eth')).toBe('ETH');
  });

  it('remaps case-insensitively', () => {
    const resolve = createSymbolResolver({ PAX: 'usdp' });
    expect(resolve('pax')).toBe('USDP');
    expect(resolve('Pax')).toBe('USDP');
  });

  it('applies the table once, not transitively', () => {
    const resolve = createSymbolResolver({ a: 'b', b: 'c' });
    expect(resolve('a')).toBe('B');
  });
});

describe('summarizeTransactions', () => {
  it('adds mints to supply and subtracts burns', () => {
    const summary = summarizeTransactions([
      makeTransaction({ transactionType: 'mint', symbol: 'usdt', amountUsd: 5_000_000 }),
      makeTransaction({ transactionType: 'burn', symbol: 'usdt', amountUsd: 2_000_000 }),
      makeTransaction({ transactionType: 'burn', symbol: 'btc', amountUsd: 1_500_000 }),
    ]);

    expect(summary.supply.get('USDT')).toBe(3_000_000);
    expect(summary.supply.get('BTC')).toBe(-1_500_000);
    expect(summary.flow.size).toBe(0);
    expect(summary.unhandled).toEqual([]);
  });

  it('records exchange outflow as negative and inflow as positive', () => {
    const summary = summarizeTransactions([
      makeTransaction({ symbol: 'eth', from: makeWallet('exchange'), to: makeWallet('unknown'), amountUsd: 4 }),
      makeTransaction({ symbol: 'eth', from: makeWallet('unknown'), to: makeWallet('exchange'), amountUsd: 10 }),
      makeTransaction({ symbol: 'btc', from: makeWallet('exchange'), to: makeWallet('other'), amountUsd: 3 }),
    ]);

    expect(summary.flow.get('ETH')).toBe(6);
    expect(summary.flow.get('BTC')).toBe(-3);
    expect(summary.supply.size).toBe(0);
  });

  it('leaves aggregates untouched for internal transfers', () => {
    const summary = summarizeTransactions([
      makeTransaction({ from: makeWallet('exchange', 'a'), to: makeWallet('exchange', 'b') }),
      makeTransaction({ from: makeWallet('unknown'), to: makeWallet('unknown') }),
    ]);

    expect(summary.supply.size).toBe(0);
    expect(summary.flow.size).toBe(0);
    expect(summary.unhandled).toEqual([]);
    expect(summary.counts[Effect.INTERNAL]).toBe(2);
  });

  it('drops peer-to-peer transfers without a diagnostic line', () => {
    const summary = summarizeTransactions([
      makeTransaction({ from: makeWallet('unknown'), to: makeWallet('other') }),
    ]);

    expect(summary.flow.size).toBe(0);
    expect(summary.unhandled).toEqual([]);
    expect(summary.counts[Effect.PEER_TO_PEER]).toBe(1);
  });

  it('logs unknown kinds in input order without aggregating them', () => {
    const summary = summarizeTransactions([
      makeTransaction({ transactionType: 'lock', from: makeWallet('unknown'), to: makeWallet('exchange', 'kraken') }),
      makeTransaction({ transactionType: 'freeze', from: makeWallet('other', 'tether'), to: makeWallet('unknown') }),
    ]);

    expect(summary.unhandled).toEqual([
      'lock: unknown () -> exchange (kraken)',
      'freeze: other (tether) -> unknown ()',
    ]);
    expect(summary.supply.size).toBe(0);
    expect(summary.flow.size).toBe(0);
  });

  it('merges remapped symbols into one bucket', () => {
    const separate = summarizeTransactions([
      makeTransaction({ transactionType: 'mint', symbol: 'pax', amountUsd: 1_250_000 }),
      makeTransaction({ transactionType: 'mint', symbol: 'usdp', amountUsd: 750_000 }),
    ]);
    expect(separate.supply.get('PAX')).toBe(1_250_000);
    expect(separate.supply.get('USDP')).toBe(750_000);

    const merged = summarizeTransactions(
      [
        makeTransaction({ transactionType: 'mint', symbol: 'pax', amountUsd: 1_250_000 }),
        makeTransaction({ transactionType: 'mint', symbol: 'usdp', amountUsd: 750_000 }),
      ],
      { pax: 'usdp' }
    );
    expect([...merged.supply.entries()]).toEqual([['USDP', 2_000_000]]);
  });

  it('produces the same aggregates regardless of order', () => {
    const txs = [
      makeTransaction({ transactionType: 'mint', symbol: 'a', amountUsd: 3 }),
      makeTransaction({ transactionType: 'burn', symbol: 'a', amountUsd: 1 }),
      makeTransaction({ symbol: 'b', from: makeWallet('unknown'), to: makeWallet('exchange'), amountUsd: 8 }),
    ];
    const forward = summarizeTransactions(txs);
    const reversed = summarizeTransactions([...txs].reverse());

    expect(reversed.supply.get('A')).toBe(forward.supply.get('A'));
    expect(reversed.flow.get('B')).toBe(forward.flow.get('B'));
  });

  it('builds fresh maps on every call', () => {
    const tx = makeTransaction({ transactionType: 'mint', amountUsd: 10 });
    summarizeTransactions([tx]);
    const second = summarizeTransactions([tx]);
    expect(second.supply.get('XYZ')).toBe(10);
  });

  it('counts every effect', () => {
    const summary = summarizeTransactions([
      makeTransaction({ transactionType: 'mint' }),
      makeTransaction({ transactionType: 'burn' }),
      makeTransaction({ from: makeWallet('exchange'), to: makeWallet('unknown') }),
      makeTransaction({ transactionType: 'lock' }),
    ]);

    expect(summary.counts).toEqual({
      [Effect.MINT]: 1,
      [Effect.BURN]: 1,
      [Effect.EXCHANGE_INFLOW]: 0,
      [Effect.EXCHANGE_OUTFLOW]: 1,
      [Effect.INTERNAL]: 0,
      [Effect.PEER_TO_PEER]: 0,
      [Effect.UNHANDLED]: 1,
    });
    expect(countAggregated(summary)).toBe(3);
  });
});
