/**
 * Decision Engine
 *
 * decide() is a pure function of (verdict, thresholds). apply() carries out a
 * `reconcile` decision as one guarded status update; no retry.
 */

import { RecordGateway } from 'tally-storage';
import { ReconciliationConfig } from './config';
import { RECONCILED_STATUS, Receipt, SYSTEM_ACTOR } from './receipt';
import { Decision, RecordAction, ResultBucket, Verdict } from './types';

type DecisionConfig = Pick<ReconciliationConfig, 'minConfidence' | 'autoReconcileThreshold' | 'autoReconcile'>;

export function decide(verdict: Pick<Verdict, 'status' | 'confidence'>, config: DecisionConfig): Decision {
  if (verdict.status === 'VALID' && verdict.confidence >= config.minConfidence) {
    if (verdict.confidence >= config.autoReconcileThreshold && config.autoReconcile) {
      return { kind: 'reconcile' };
    }
    return { kind: 'needs_review' };
  }

  if (verdict.status === 'INVALID') {
    return { kind: 'invalid' };
  }

  return { kind: 'needs_review' };
}

export function bucketFor(action: RecordAction): ResultBucket {
  switch (action) {
    case 'reconciled':
      return 'reconciled';
    case 'update_failed':
    case 'invalid':
      return 'failed';
    case 'needs_review':
      return 'needsReview';
    default: {
      const _exhaustive: never = action;
      throw new Error(`Unknown action: ${_exhaustive}`);
    }
  }
}

/**
 * Status update statement. Re-applying it leaves the row in the same state.
 */
export function reconcileStatusSql(table: string, now: string): string {
  return `
    UPDATE ${table}
    SET STATUS = :new_status,
        UPDATED_AT = ${now},
        RECONCILED_AT = ${now},
        RECONCILED_BY = '${SYSTEM_ACTOR}'
    WHERE ID = :receipt_id
  `;
}

export class DecisionEngine {
  private gateway: RecordGateway;
  private config: DecisionConfig & Pick<ReconciliationConfig, 'receiptsTable'>;

  constructor(gateway: RecordGateway, config: DecisionConfig & Pick<ReconciliationConfig, 'receiptsTable'>) {
    this.gateway = gateway;
    this.config = config;
  }

  async apply(receipt: Receipt, verdict: Verdict): Promise<RecordAction> {
    const decision = decide(verdict, this.config);

    switch (decision.kind) {
      case 'reconcile': {
        if (await this.updateReceiptStatus(receipt.id, RECONCILED_STATUS)) {
          console.log(`✓ Auto-reconciled receipt ${receipt.id} (confidence: ${verdict.confidence}%)`);
          return 'reconciled';
        }
        console.error(`✗ Failed to update receipt ${receipt.id}`);
        return 'update_failed';
      }
      case 'invalid':
        console.log(`✗ Receipt ${receipt.id} is invalid`);
        return 'invalid';
      case 'needs_review':
        if (verdict.status === 'VALID') {
          console.log(`⚠ Receipt ${receipt.id} validated but needs review (confidence: ${verdict.confidence}%)`);
        } else {
          console.log(`⚠ Receipt ${receipt.id} needs manual review`);
        }
        return 'needs_review';
    }
  }

  /**
   * Guarded write: skipped (false) when the gateway is not connected
   */
  async updateReceiptStatus(receiptId: number, newStatus: string): Promise<boolean> {
    if (!(await this.gateway.isConnected())) {
      console.error('✗ Database connection not available');
      return false;
    }

    return this.gateway.update(reconcileStatusSql(this.config.receiptsTable, this.gateway.nowExpression()), {
      new_status: newStatus,
      receipt_id: receiptId,
    });
  }
}
