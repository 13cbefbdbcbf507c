import { Effect, Ledger, type Classification } from '../classification.js';
import { TransactionKind, type Transaction } from '../transaction.js';
import type { ClassificationRule, RuleMetadata } from './rule.js';

/**
 * Mints add their USD value to the asset's supply
 */
export class MintRule implements ClassificationRule {
  metadata: RuleMetadata = {
    id: 'supply-mint',
    name: 'Supply Mint',
    description: 'Adds the USD amount of a mint to net supply.',
  };

  classify(transaction: Transaction): Classification | null {
    if (transaction.transactionType !== TransactionKind.MINT) {
      return null;
    }
    return {
      kind: 'aggregate',
      ruleId: this.metadata.id,
      effect: Effect.MINT,
      ledger: Ledger.SUPPLY,
      deltaUsd: transaction.amountUsd,
    };
  }
}

/**
 * Burns subtract their USD value from the asset's supply
 */
export class BurnRule implements ClassificationRule {
  metadata: RuleMetadata = {
    id: 'supply-burn',
    name: 'Supply Burn',
    description: 'Subtracts the USD amount of a burn from net supply.',
  };

  classify(transaction: Transaction): Classification | null {
    if (transaction.transactionType !== TransactionKind.BURN) {
      return null;
    }
    return {
      kind: 'aggregate',
      ruleId: this.metadata.id,
      effect: Effect.BURN,
      ledger: Ledger.SUPPLY,
      deltaUsd: -transaction.amountUsd,
    };
  }
}

/**
 * Format the diagnostic line for a transaction the classifier cannot place
 */
export function describeUnhandled(transaction: Transaction): string {
  const { from, to } = transaction;
  return `${transaction.transactionType}: ${from.ownerType} (${from.owner}) -> ${to.ownerType} (${to.owner})`;
}

/**
 * Any kind other than mint, burn or transfer is logged as unhandled
 */
export class UnhandledKindRule implements ClassificationRule {
  metadata: RuleMetadata = {
    id: 'unhandled-kind',
    name: 'Unhandled Kind',
    description: 'Records a diagnostic line for transaction kinds other than mint, burn and transfer.',
  };

  classify(transaction: Transaction): Classification | null {
    const kind = transaction.transactionType;
    if (
      kind === TransactionKind.MINT ||
      kind === TransactionKind.BURN ||
      kind === TransactionKind.TRANSFER
    ) {
      return null;
    }
    return {
      kind: 'unhandled',
      ruleId: this.metadata.id,
      effect: Effect.UNHANDLED,
      note: describeUnhandled(transaction),
    };
  }
}
