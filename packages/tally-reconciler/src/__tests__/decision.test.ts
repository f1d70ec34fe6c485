/**
 * Decision engine: threshold gating and the guarded status update
 */

import { SQLiteGateway } from 'tally-storage';
import { DecisionEngine, bucketFor, decide, reconcileStatusSql } from '../decision';
import { DEFAULT_RECONCILIATION_CONFIG } from '../config';
import { Verdict, VerdictStatus } from '../types';
import { FakeGateway, createReceiptStore, insertReceipt, makeReceipt, makeRow, silenceConsole } from './helpers';

const thresholds = { minConfidence: 80, autoReconcileThreshold: 90, autoReconcile: true };

function verdict(status: VerdictStatus, confidence: number): Verdict {
  return {
    status,
    confidence,
    reasoning: `${status} at ${confidence}`,
    issues: [],
    receiptId: 1,
    receiptNumber: 'RCP-1001',
    iterations: 1,
    toolCalls: [],
  };
}

describe('decide', () => {
  it.each([
    ['VALID', 95, 'reconcile'],
    ['VALID', 90, 'reconcile'],
    ['VALID', 85, 'needs_review'],
    ['VALID', 80, 'needs_review'],
    ['VALID', 79, 'needs_review'],
    ['INVALID', 99, 'invalid'],
    ['INVALID', 10, 'invalid'],
    ['NEEDS_REVIEW', 99, 'needs_review'],
    ['ERROR', 0, 'needs_review'],
  ] as const)('%s at %d -> %s', (status, confidence, kind) => {
    expect(decide({ status, confidence }, thresholds)).toEqual({ kind });
  });

  it('never auto-reconciles when auto-reconcile is off', () => {
    expect(decide({ status: 'VALID', confidence: 100 }, { ...thresholds, autoReconcile: false })).toEqual({
      kind: 'needs_review',
    });
  });

  it('is monotone in confidence for VALID verdicts', () => {
    let reconciledAt: number | null = null;
    for (let confidence = 0; confidence <= 100; confidence++) {
      const { kind } = decide({ status: 'VALID', confidence }, thresholds);
      if (kind === 'reconcile' && reconciledAt === null) {
        reconciledAt = confidence;
      }
      if (reconciledAt !== null) {
        expect(kind).toBe('reconcile');
      }
    }
    expect(reconciledAt).toBe(90);
  });
});

describe('bucketFor', () => {
  it('counts update failures and invalid receipts as failed', () => {
    expect(bucketFor('reconciled')).toBe('reconciled');
    expect(bucketFor('update_failed')).toBe('failed');
    expect(bucketFor('invalid')).toBe('failed');
    expect(bucketFor('needs_review')).toBe('needsReview');
  });
});

describe('reconcileStatusSql', () => {
  it('stamps every timestamp column with the dialect expression', () => {
    const sql = reconcileStatusSql('CFMSPRO.RECEIPT_DETAILS', 'SYSDATE');

    expect(sql).toContain('UPDATE CFMSPRO.RECEIPT_DETAILS');
    expect(sql).toContain('UPDATED_AT = SYSDATE');
    expect(sql).toContain('RECONCILED_AT = SYSDATE');
    expect(sql).toContain("RECONCILED_BY = 'SYSTEM'");
    expect(sql).toContain('WHERE ID = :receipt_id');
  });
});

describe('DecisionEngine', () => {
  const config = { ...thresholds, receiptsTable: 'RECEIPT_DETAILS' };

  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes the reconciled status for a confident VALID verdict', async () => {
    const gateway = new FakeGateway();
    await gateway.connect();

    const action = await new DecisionEngine(gateway, config).apply(makeReceipt(), verdict('VALID', 95));

    expect(action).toBe('reconciled');
    expect(gateway.updates).toHaveLength(1);
    expect(gateway.updates[0].params).toEqual({ new_status: 'R', receipt_id: 1 });
    expect(console.log).toHaveBeenCalledWith('✓ Auto-reconciled receipt 1 (confidence: 95%)');
  });

  it('reports a rejected update as update_failed', async () => {
    const gateway = new FakeGateway();
    gateway.updateResult = false;
    await gateway.connect();

    const action = await new DecisionEngine(gateway, config).apply(makeReceipt(), verdict('VALID', 95));

    expect(action).toBe('update_failed');
    expect(console.error).toHaveBeenCalledWith('✗ Failed to update receipt 1');
  });

  it('skips the write when the gateway is not connected', async () => {
    const gateway = new FakeGateway();

    const action = await new DecisionEngine(gateway, config).apply(makeReceipt(), verdict('VALID', 95));

    expect(action).toBe('update_failed');
    expect(gateway.updates).toEqual([]);
  });

  it('never writes for review or invalid outcomes', async () => {
    const gateway = new FakeGateway();
    await gateway.connect();
    const engine = new DecisionEngine(gateway, config);

    expect(await engine.apply(makeReceipt(), verdict('VALID', 85))).toBe('needs_review');
    expect(await engine.apply(makeReceipt(), verdict('INVALID', 99))).toBe('invalid');
    expect(await engine.apply(makeReceipt(), verdict('ERROR', 0))).toBe('needs_review');
    expect(gateway.updates).toEqual([]);
  });

  describe('against SQLite', () => {
    let store: SQLiteGateway;

    beforeEach(async () => {
      store = await createReceiptStore();
      await insertReceipt(store, makeRow({ ID: 1 }));
      await insertReceipt(store, makeRow({ ID: 2, RECEIPT_NUMBER: 'RCP-1002' }));
    });

    afterEach(async () => {
      await store.disconnect();
    });

    it('marks only the target row reconciled, and re-applying changes nothing', async () => {
      const engine = new DecisionEngine(store, config);

      expect(await engine.updateReceiptStatus(1, 'R')).toBe(true);
      expect(await engine.updateReceiptStatus(1, 'R')).toBe(true);

      const rows = await store.query('SELECT ID, STATUS, RECONCILED_BY FROM RECEIPT_DETAILS ORDER BY ID');
      expect(rows).toEqual([
        { ID: 1, STATUS: 'R', RECONCILED_BY: 'SYSTEM' },
        { ID: 2, STATUS: 'U', RECONCILED_BY: null },
      ]);

      const stamped = await store.query('SELECT COUNT(*) AS N FROM RECEIPT_DETAILS WHERE RECONCILED_AT IS NOT NULL');
      expect(stamped).toEqual([{ N: 1 }]);
    });
  });
});
