import { Effect, Ledger, type Classification } from '../classification.js';
import { EXCHANGE_OWNER_TYPE, TransactionKind, type Transaction } from '../transaction.js';
import type { ClassificationRule, RuleMetadata } from './rule.js';

function isTransfer(transaction: Transaction): boolean {
  return transaction.transactionType === TransactionKind.TRANSFER;
}

/**
 * Transfers between wallets of the same owner category move nothing in or out of exchanges.
 * This includes exchange-to-exchange transfers.
 */
export class InternalTransferRule implements ClassificationRule {
  metadata: RuleMetadata = {
    id: 'internal-transfer',
    name: 'Internal Transfer',
    description: 'Ignores transfers whose origin and destination share an owner category.',
  };

  classify(transaction: Transaction): Classification | null {
    if (!isTransfer(transaction) || transaction.from.ownerType !== transaction.to.ownerType) {
      return null;
    }
    return { kind: 'ignored', ruleId: this.metadata.id, effect: Effect.INTERNAL };
  }
}

/**
 * Transfers leaving an exchange reduce net flow
 */
export class ExchangeOutflowRule implements ClassificationRule {
  metadata: RuleMetadata = {
    id: 'exchange-outflow',
    name: 'Exchange Outflow',
    description: 'Subtracts transfers whose origin is an exchange from net exchange flow.',
  };

  classify(transaction: Transaction): Classification | null {
    if (!isTransfer(transaction) || transaction.from.ownerType !== EXCHANGE_OWNER_TYPE) {
      return null;
    }
    return {
      kind: 'aggregate',
      ruleId: this.metadata.id,
      effect: Effect.EXCHANGE_OUTFLOW,
      ledger: Ledger.FLOW,
      deltaUsd: -transaction.amountUsd,
    };
  }
}

/**
 * Transfers arriving at an exchange increase net flow
 */
export class ExchangeInflowRule implements ClassificationRule {
  metadata: RuleMetadata = {
    id: 'exchange-inflow',
    name: 'Exchange Inflow',
    description: 'Adds transfers whose destination is an exchange to net exchange flow.',
  };

  classify(transaction: Transaction): Classification | null {
    if (!isTransfer(transaction) || transaction.to.ownerType !== EXCHANGE_OWNER_TYPE) {
      return null;
    }
    return {
      kind: 'aggregate',
      ruleId: this.metadata.id,
      effect: Effect.EXCHANGE_INFLOW,
      ledger: Ledger.FLOW,
      deltaUsd: transaction.amountUsd,
    };
  }
}

/**
 * Remaining transfers (different categories, neither an exchange) are outside the
 * exchange-flow scope. They are dropped without a diagnostic line.
 */
export class PeerToPeerRule implements ClassificationRule {
  metadata: RuleMetadata = {
    id: 'peer-to-peer',
    name: 'Peer-to-Peer Transfer',
    description: 'Ignores transfers between different non-exchange owner categories.',
  };

  classify(transaction: Transaction): Classification | null {
    if (!isTransfer(transaction)) {
      return null;
    }
    return { kind: 'ignored', ruleId: this.metadata.id, effect: Effect.PEER_TO_PEER };
  }
}
