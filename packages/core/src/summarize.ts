import { Effect, Ledger, emptyEffectCounts } from './classification.js';
import { type RuleRegistry, createDefaultRegistry } from './rules/index.js';
import type { Transaction } from './transaction.js';

/**
 * Signed USD total per canonical (uppercase) symbol
 */
export type AggregateMap = Map<string, number>;

/**
 * Raw symbol -> canonical symbol, e.g. { pax: 'usdp' }
 */
export type RemapTable = Record<string, string>;

/**
 * Result of one classification pass
 */
export interface Summary {
  /** Net minted (+) / burned (-) USD per symbol */
  supply: AggregateMap;

  /** Net exchange inflow (+) / outflow (-) USD per symbol */
  flow: AggregateMap;

  /** Diagnostic lines for transactions no rule could place, in input order */
  unhandled: string[];

  /** How many transactions received each effect */
  counts: Record<Effect, number>;
}

/**
 * Build a symbol resolver for a remap table.
 *
 * Lookup is case-insensitive and applied once; the result is uppercased.
 */
export function createSymbolResolver(remap: RemapTable = {}): (symbol: string) => string {
  const lookup = new Map<string, string>();
  for (const [raw, canonical] of Object.entries(remap)) {
    lookup.set(raw.toLowerCase(), canonical);
  }
  return (symbol) => (lookup.get(symbol.toLowerCase()) ?? symbol).toUpperCase();
}

function accumulate(map: AggregateMap, symbol: string, deltaUsd: number): void {
  map.set(symbol, (map.get(symbol) ?? 0) + deltaUsd);
}

/**
 * Classify every transaction and sum the amounts per symbol.
 *
 * Both maps are built from scratch on every call; input order only affects the
 * order of the unhandled lines.
 */
export function summarizeTransactions(
  transactions: readonly Transaction[],
  remap: RemapTable = {},
  registry: RuleRegistry = createDefaultRegistry()
): Summary {
  const resolveSymbol = createSymbolResolver(remap);
  const supply: AggregateMap = new Map();
  const flow: AggregateMap = new Map();
  const unhandled: string[] = [];
  const counts = emptyEffectCounts();

  for (const transaction of transactions) {
    const symbol = resolveSymbol(transaction.symbol);
    const classification = registry.classify(transaction);
    counts[classification.effect] += 1;

    switch (classification.kind) {
      case 'aggregate':
        accumulate(classification.ledger === Ledger.SUPPLY ? supply : flow, symbol, classification.deltaUsd);
        break;
      case 'unhandled':
        unhandled.push(classification.note);
        break;
      case 'ignored':
        break;
    }
  }

  return { supply, flow, unhandled, counts };
}

/**
 * Total number of transactions that moved an aggregate
 */
export function countAggregated(summary: Summary): number {
  return (
    summary.counts[Effect.MINT] +
    summary.counts[Effect.BURN] +
    summary.counts[Effect.EXCHANGE_INFLOW] +
    summary.counts[Effect.EXCHANGE_OUTFLOW]
  );
}
