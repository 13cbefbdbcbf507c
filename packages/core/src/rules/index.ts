import { Effect, type Classification } from '../classification.js';
import type { Transaction } from '../transaction.js';
import type { ClassificationRule } from './rule.js';
import { BurnRule, MintRule, UnhandledKindRule, describeUnhandled } from './supplyRules.js';
import {
  ExchangeInflowRule,
  ExchangeOutflowRule,
  InternalTransferRule,
  PeerToPeerRule,
} from './transferRules.js';

export type { ClassificationRule, RuleMetadata } from './rule.js';
export { MintRule, BurnRule, UnhandledKindRule, describeUnhandled } from './supplyRules.js';
export {
  InternalTransferRule,
  ExchangeOutflowRule,
  ExchangeInflowRule,
  PeerToPeerRule,
} from './transferRules.js';

/**
 * Rule registry - ordered list of classification rules, evaluated first match wins
 */
export class RuleRegistry {
  private rules: Map<string, ClassificationRule> = new Map();

  /**
   * Register a rule after the ones already registered
   */
  register(rule: ClassificationRule): void {
    if (this.rules.has(rule.metadata.id)) {
      throw new Error(`Rule with ID ${rule.metadata.id} is already registered`);
    }
    this.rules.set(rule.metadata.id, rule);
  }

  /**
   * Get a rule by ID
   */
  get(id: string): ClassificationRule | undefined {
    return this.rules.get(id);
  }

  /**
   * Get all rules in evaluation order
   */
  getAll(): ClassificationRule[] {
    return Array.from(this.rules.values());
  }

  /**
   * Get rule IDs in evaluation order
   */
  getIds(): string[] {
    return Array.from(this.rules.keys());
  }

  /**
   * Classify a transaction with the first rule that applies.
   * A transaction no rule matches is reported as unhandled.
   */
  classify(transaction: Transaction): Classification {
    for (const rule of this.rules.values()) {
      const classification = rule.classify(transaction);
      if (classification) {
        return classification;
      }
    }
    return {
      kind: 'unhandled',
      ruleId: 'no-match',
      effect: Effect.UNHANDLED,
      note: describeUnhandled(transaction),
    };
  }
}

/**
 * Create a registry with the default decision list:
 * mint, burn, unhandled kind, internal transfer, exchange outflow, exchange inflow, peer-to-peer
 */
export function createDefaultRegistry(): RuleRegistry {
  const registry = new RuleRegistry();

  registry.register(new MintRule());
  registry.register(new BurnRule());
  registry.register(new UnhandledKindRule());
  registry.register(new InternalTransferRule());
  registry.register(new ExchangeOutflowRule());
  registry.register(new ExchangeInflowRule());
  registry.register(new PeerToPeerRule());

  return registry;
}
