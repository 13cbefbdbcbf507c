/**
 * Economic effect of a single transaction
 */
export enum Effect {
  /** New supply created */
  MINT = 'MINT',
  /** Supply destroyed */
  BURN = 'BURN',
  /** Funds moved into an exchange */
  EXCHANGE_INFLOW = 'EXCHANGE_INFLOW',
  /** Funds moved out of an exchange */
  EXCHANGE_OUTFLOW = 'EXCHANGE_OUTFLOW',
  /** Transfer between wallets of the same owner category */
  INTERNAL = 'INTERNAL',
  /** Transfer between different non-exchange categories */
  PEER_TO_PEER = 'PEER_TO_PEER',
  /** Kind the classifier does not recognize */
  UNHANDLED = 'UNHANDLED',
}

/**
 * Aggregate a classified amount is applied to
 */
export enum Ledger {
  /** Net minted (+) or burned (-) */
  SUPPLY = 'SUPPLY',
  /** Net exchange inflow (+) or outflow (-) */
  FLOW = 'FLOW',
}

/**
 * Transaction that changes one of the aggregates
 */
export interface AggregatedClassification {
  kind: 'aggregate';
  ruleId: string;
  effect: Effect.MINT | Effect.BURN | Effect.EXCHANGE_INFLOW | Effect.EXCHANGE_OUTFLOW;
  ledger: Ledger;
  /** Signed USD delta */
  deltaUsd: number;
}

/**
 * Transaction that is deliberately left out of the aggregates
 */
export interface IgnoredClassification {
  kind: 'ignored';
  ruleId: string;
  effect: Effect.INTERNAL | Effect.PEER_TO_PEER;
}

/**
 * Transaction that could not be placed, with a diagnostic line
 */
export interface UnhandledClassification {
  kind: 'unhandled';
  ruleId: string;
  effect: Effect.UNHANDLED;
  note: string;
}

export type Classification =
  | AggregatedClassification
  | IgnoredClassification
  | UnhandledClassification;

/**
 * Zeroed counter for every effect
 */
export function emptyEffectCounts(): Record<Effect, number> {
  return {
    [Effect.MINT]: 0,
    [Effect.BURN]: 0,
    [Effect.EXCHANGE_INFLOW]: 0,
    [Effect.EXCHANGE_OUTFLOW]: 0,
    [Effect.INTERNAL]: 0,
    [Effect.PEER_TO_PEER]: 0,
    [Effect.UNHANDLED]: 0,
  };
}
