import type { Classification } from '../classification.js';
import type { Transaction } from '../transaction.js';

/**
 * Rule metadata
 */
export interface RuleMetadata {
  /** Unique rule identifier */
  id: string;

  /** Human-readable name */
  name: string;

  /** What the rule matches and what it does with the amount */
  description: string;
}

/**
 * Classification rule - one step of the ordered decision list
 */
export interface ClassificationRule {
  metadata: RuleMetadata;

  /**
   * Classify a transaction, or return null when the rule does not apply.
   *
   * Rules must be pure: the same transaction always yields the same result.
   */
  classify(transaction: Transaction): Classification | null;
}
