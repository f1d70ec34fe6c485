/**
 * ReceiptReconciler: run outcomes over a fake gateway and scripted verdicts
 */

import { ReceiptReconciler } from '../reconciler';
import { DEFAULT_RECONCILIATION_CONFIG, createReconciliationConfig } from '../config';
import { ConfigError } from '../errors';
import { FakeGateway, ScriptedValidator, makeRow, silenceConsole } from './helpers';

const config = createReconciliationConfig();

function threeReceipts(): FakeGateway {
  const gateway = new FakeGateway();
  gateway.rows = [
    makeRow({ ID: 1 }),
    makeRow({ ID: 2, RECEIPT_NUMBER: 'RCP-1002' }),
    makeRow({ ID: 3, RECEIPT_NUMBER: 'RCP-1003' }),
  ];
  return gateway;
}

describe('ReceiptReconciler', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('construction', () => {
    it('refuses thresholds out of order', () => {
      const build = () =>
        new ReceiptReconciler({
          gateway: new FakeGateway(),
          config: { ...DEFAULT_RECONCILIATION_CONFIG, minConfidence: 95, autoReconcileThreshold: 90 },
          validator: new ScriptedValidator([]),
        });

      expect(build).toThrow(ConfigError);
      expect(build).toThrow('MIN_CONFIDENCE_SCORE (95) must not exceed AUTO_RECONCILE_THRESHOLD (90)');
    });

    it('needs either an adapter or a validator', () => {
      expect(() => new ReceiptReconciler({ gateway: new FakeGateway(), config })).toThrow(
        'ReceiptReconciler needs a reasoning adapter or a validator'
      );
    });
  });

  describe('reconcileReceipts', () => {
    it('sorts each record into exactly one bucket', async () => {
      const gateway = threeReceipts();
      const validator = new ScriptedValidator([
        [1, { status: 'VALID', confidence: 95 }],
        [2, { status: 'VALID', confidence: 75 }],
        [3, { status: 'INVALID', confidence: 90 }],
      ]);

      const result = await new ReceiptReconciler({ gateway, config, validator }).reconcileReceipts();

      expect(result.success).toBe(true);
      expect(result.processed).toBe(3);
      expect(result.reconciled).toBe(1);
      expect(result.needsReview).toBe(1);
      expect(result.failed).toBe(1);
      expect(result.details.map((detail) => detail.action)).toEqual(['reconciled', 'needs_review', 'invalid']);
      expect(result.details[0]).toEqual({
        receiptId: 1,
        receiptNumber: 'RCP-1001',
        status: 'VALID',
        confidence: 95,
        reasoning: 'scripted VALID at 95',
        issues: [],
        action: 'reconciled',
      });
    });

    it('reads unreconciled receipts and writes back only the auto-reconciled one', async () => {
      const gateway = threeReceipts();
      const validator = new ScriptedValidator([[2, { status: 'VALID', confidence: 99 }]]);

      await new ReceiptReconciler({ gateway, config, validator }).reconcileReceipts();

      expect(gateway.queries[0].params).toEqual({ status: 'U' });
      expect(gateway.updates).toHaveLength(1);
      expect(gateway.updates[0].params).toEqual({ new_status: 'R', receipt_id: 2 });
    });

    it('returns a frozen result', async () => {
      const result = await new ReceiptReconciler({
        gateway: threeReceipts(),
        config,
        validator: new ScriptedValidator([]),
      }).reconcileReceipts();

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.details)).toBe(true);
      expect(Object.isFrozen(result.details[0])).toBe(true);
      expect(result.finishedAt.getTime()).toBeGreaterThanOrEqual(result.startedAt.getTime());
    });

    it('succeeds with nothing to do when there are no unreconciled receipts', async () => {
      const validator = new ScriptedValidator([]);

      const result = await new ReceiptReconciler({ gateway: new FakeGateway(), config, validator }).reconcileReceipts();

      expect(result.success).toBe(true);
      expect(result.message).toBe('no unreconciled receipts');
      expect(result.processed).toBe(0);
      expect(result.details).toEqual([]);
      expect(validator.calls).toEqual([]);
    });

    it('treats a failed extraction query as no receipts', async () => {
      const gateway = new FakeGateway();
      gateway.rows = null;

      const result = await new ReceiptReconciler({
        gateway,
        config,
        validator: new ScriptedValidator([]),
      }).reconcileReceipts();

      expect(result.success).toBe(true);
      expect(result.message).toBe('no unreconciled receipts');
      expect(console.error).toHaveBeenCalledWith('✗ Error extracting receipts: query failed');
    });

    it('stops before extraction when the connection fails', async () => {
      const gateway = threeReceipts();
      gateway.connectResult = false;

      const result = await new ReceiptReconciler({
        gateway,
        config,
        validator: new ScriptedValidator([]),
      }).reconcileReceipts();

      expect(result.success).toBe(false);
      expect(result.error).toBe('Failed to connect to database');
      expect(result.processed).toBe(0);
      expect(gateway.queries).toEqual([]);
    });

    it.each([0, -3, 2.5, Number.NaN])('rejects limit %p without touching the store', async (limit) => {
      const gateway = threeReceipts();

      const result = await new ReceiptReconciler({
        gateway,
        config,
        validator: new ScriptedValidator([]),
      }).reconcileReceipts(limit);

      expect(result.success).toBe(false);
      expect(result.error).toBe(`Invalid limit: ${limit} (expected a positive integer)`);
      expect(gateway.connectCalls).toBe(0);
    });

    it('processes only the first N receipts in ID order', async () => {
      const validator = new ScriptedValidator([]);

      const result = await new ReceiptReconciler({ gateway: threeReceipts(), config, validator }).reconcileReceipts(2);

      expect(validator.calls).toEqual([1, 2]);
      expect(result.processed).toBe(2);
    });

    it('counts a rejected status update as failed', async () => {
      const gateway = threeReceipts();
      gateway.updateResult = false;
      const validator = new ScriptedValidator([[1, { status: 'VALID', confidence: 95 }]]);

      const result = await new ReceiptReconciler({ gateway, config, validator }).reconcileReceipts(1);

      expect(result.details[0].action).toBe('update_failed');
      expect(result.failed).toBe(1);
      expect(result.reconciled).toBe(0);
    });

    it('records a failing receipt and carries on with the rest', async () => {
      const validator = new ScriptedValidator([
        [2, new Error('model quota exhausted')],
        [3, { status: 'VALID', confidence: 92 }],
      ]);

      const result = await new ReceiptReconciler({ gateway: threeReceipts(), config, validator }).reconcileReceipts();

      expect(result.success).toBe(true);
      expect(result.processed).toBe(3);
      expect(result.details[1]).toEqual({
        receiptId: 2,
        receiptNumber: 'RCP-1002',
        status: 'ERROR',
        confidence: 0,
        reasoning: 'Processing error: model quota exhausted',
        issues: ['Processing failed: model quota exhausted'],
        action: 'needs_review',
      });
      expect(result.details[2].action).toBe('reconciled');
      expect(result.reconciled).toBe(1);
      expect(result.needsReview).toBe(2);
    });

    it('holds VALID verdicts for review when auto-reconcile is off', async () => {
      const gateway = threeReceipts();
      const validator = new ScriptedValidator([[1, { status: 'VALID', confidence: 100 }]]);
      const manual = createReconciliationConfig({ autoReconcile: false });

      const result = await new ReceiptReconciler({ gateway, config: manual, validator }).reconcileReceipts(1);

      expect(result.details[0].action).toBe('needs_review');
      expect(gateway.updates).toEqual([]);
    });

    it('skips rows it cannot read', async () => {
      const gateway = new FakeGateway();
      gateway.rows = [makeRow({ ID: null }), makeRow({ ID: 4 })];
      const validator = new ScriptedValidator([]);

      const result = await new ReceiptReconciler({ gateway, config, validator }).reconcileReceipts();

      expect(validator.calls).toEqual([4]);
      expect(result.processed).toBe(1);
      expect(console.warn).toHaveBeenCalledWith('⚠ Skipping unreadable receipt row: Row has no usable ID: null');
    });

    it('skips a row whose ID cannot be held exactly', async () => {
      const gateway = new FakeGateway();
      gateway.rows = [makeRow({ ID: '9007199254740993' }), makeRow({ ID: 4 })];
      const validator = new ScriptedValidator([]);

      const result = await new ReceiptReconciler({ gateway, config, validator }).reconcileReceipts();

      expect(validator.calls).toEqual([4]);
      expect(result.processed).toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        '⚠ Skipping unreadable receipt row: Row has no usable ID: 9007199254740993'
      );
    });

    it('returns a failed result instead of throwing when the store errors out', async () => {
      const gateway = threeReceipts();
      gateway.query = async () => {
        throw new Error('socket closed');
      };

      const result = await new ReceiptReconciler({
        gateway,
        config,
        validator: new ScriptedValidator([]),
      }).reconcileReceipts();

      expect(result.success).toBe(false);
      expect(result.error).toBe('Reconciliation run failed: socket closed');
    });

    it('checks the connection on every run', async () => {
      const gateway = threeReceipts();
      const reconciler = new ReceiptReconciler({ gateway, config, validator: new ScriptedValidator([]) });

      await reconciler.reconcileReceipts(1);
      await reconciler.reconcileReceipts(1);

      expect(gateway.connectCalls).toBe(2);
    });

    it('reports a connection failure when the store drops between runs', async () => {
      const gateway = threeReceipts();
      const reconciler = new ReceiptReconciler({ gateway, config, validator: new ScriptedValidator([]) });

      const first = await reconciler.reconcileReceipts(1);
      await gateway.disconnect();
      gateway.connectResult = false;
      const second = await reconciler.reconcileReceipts(1);

      expect(first.success).toBe(true);
      expect(second.success).toBe(false);
      expect(second.error).toBe('Failed to connect to database');
      expect(second.message).toBeUndefined();
      expect(gateway.queries).toHaveLength(1);
    });

    it('prints a summary after the run', async () => {
      await new ReceiptReconciler({
        gateway: threeReceipts(),
        config,
        validator: new ScriptedValidator([]),
      }).reconcileReceipts();

      expect(console.log).toHaveBeenCalledWith('Reconciliation Summary');
      expect(console.log).toHaveBeenCalledWith('Needs Review: 3');
    });
  });
});
