import { Ledger } from './classification.js';
import type { AggregateMap, Summary } from './summarize.js';

/**
 * Default significance floor in USD
 */
export const DEFAULT_SIGNIFICANCE_FLOOR_USD = 1_000_000;

export type Direction = 'bull' | 'bear';

export type SectionTitle = 'Mints' | 'Burns' | 'Exchange Inflow' | 'Exchange Outflow';

/**
 * Section order in the rendered report
 */
export const SECTION_ORDER: readonly SectionTitle[] = [
  'Mints',
  'Burns',
  'Exchange Inflow',
  'Exchange Outflow',
];

/**
 * One significant aggregate with its directional tag
 */
export interface SignalLine {
  /** Uppercase ticker */
  symbol: string;

  /** Absolute USD value */
  amountUsd: number;

  direction: Direction;
  stablecoin: boolean;
}

export interface ReportSection {
  title: SectionTitle;
  lines: SignalLine[];
}

/**
 * Non-empty sections in fixed order
 */
export interface SignalReport {
  sections: ReportSection[];
}

export interface AnalyzeOptions {
  /** Stablecoin tickers, compared case-insensitively */
  stablecoins: readonly string[];

  /** Assets whose absolute aggregate is below this are omitted */
  significanceFloorUsd?: number;
}

type Sign = 'positive' | 'negative';
type AssetClass = 'stablecoin' | 'crypto';

/**
 * Directional heuristic.
 *
 * supply +: stablecoin mint = fiat coming in (bull), crypto mint = dilution (bear)
 * supply -: stablecoin burn = fiat going out (bear), crypto burn = less supply (bull)
 * flow +:   stablecoin to exchange = buying intent (bull), crypto to exchange = selling intent (bear)
 * flow -:   stablecoin leaving = buying stopped (bear), crypto leaving = selling stopped (bull)
 */
const DIRECTIONS: Record<Ledger, Record<Sign, Record<AssetClass, Direction>>> = {
  [Ledger.SUPPLY]: {
    positive: { stablecoin: 'bull', crypto: 'bear' },
    negative: { stablecoin: 'bear', crypto: 'bull' },
  },
  [Ledger.FLOW]: {
    positive: { stablecoin: 'bull', crypto: 'bear' },
    negative: { stablecoin: 'bear', crypto: 'bull' },
  },
};

const SECTIONS: Record<Ledger, Record<Sign, SectionTitle>> = {
  [Ledger.SUPPLY]: { positive: 'Mints', negative: 'Burns' },
  [Ledger.FLOW]: { positive: 'Exchange Inflow', negative: 'Exchange Outflow' },
};

/**
 * Case-insensitive exact match against the configured stablecoin list
 */
export function isStablecoin(symbol: string, stablecoins: readonly string[]): boolean {
  const lower = symbol.toLowerCase();
  return stablecoins.some((ticker) => ticker.toLowerCase() === lower);
}

/**
 * Direction tag for a signed aggregate value
 */
export function directionFor(ledger: Ledger, value: number, stablecoin: boolean): Direction {
  const sign: Sign = value < 0 ? 'negative' : 'positive';
  return DIRECTIONS[ledger][sign][stablecoin ? 'stablecoin' : 'crypto'];
}

function collect(
  ledger: Ledger,
  map: AggregateMap,
  options: Required<AnalyzeOptions>,
  into: Map<SectionTitle, SignalLine[]>
): void {
  for (const [key, value] of map) {
    const amountUsd = Math.abs(value);
    if (value === 0 || amountUsd < options.significanceFloorUsd) {
      continue;
    }
    const stablecoin = isStablecoin(key, options.stablecoins);
    const title = SECTIONS[ledger][value < 0 ? 'negative' : 'positive'];
    const lines = into.get(title) ?? [];
    lines.push({
      symbol: key.toUpperCase(),
      amountUsd,
      direction: directionFor(ledger, value, stablecoin),
      stablecoin,
    });
    into.set(title, lines);
  }
}

/**
 * Turn the supply and flow aggregates into directional report sections
 */
export function analyzeSummary(
  summary: Pick<Summary, 'supply' | 'flow'>,
  options: AnalyzeOptions
): SignalReport {
  const resolved: Required<AnalyzeOptions> = {
    stablecoins: options.stablecoins,
    significanceFloorUsd: options.significanceFloorUsd ?? DEFAULT_SIGNIFICANCE_FLOOR_USD,
  };

  const bySection = new Map<SectionTitle, SignalLine[]>();
  collect(Ledger.SUPPLY, summary.supply, resolved, bySection);
  collect(Ledger.FLOW, summary.flow, resolved, bySection);

  const sections: ReportSection[] = [];
  for (const title of SECTION_ORDER) {
    const lines = bySection.get(title);
    if (lines && lines.length > 0) {
      sections.push({ title, lines });
    }
  }
  return { sections };
}
