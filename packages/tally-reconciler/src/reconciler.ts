/**
 * ReceiptReconciler - pipeline orchestrator
 *
 * CONNECT -> EXTRACT -> (none: DONE) -> VALIDATE[i] -> DECIDE[i] -> ... -> SUMMARIZE
 *
 * INVARIANT: reconcileReceipts() never throws; it always returns a frozen RunResult.
 * INVARIANT: Only a connection failure ends a run early. A failing record is
 * recorded and the run moves on.
 * INVARIANT: Records are processed one at a time over one shared gateway.
 */

import { v4 as uuidv4 } from 'uuid';
import { ModelBusAdapter } from 'tally-model-bus';
import { RecordGateway } from 'tally-storage';
import { ReconciliationConfig, validateThresholds } from './config';
import { ConfigError } from './errors';
import { DecisionEngine, bucketFor } from './decision';
import { ReceiptExtractor } from './extractor';
import { Receipt } from './receipt';
import { createToolRegistry } from './tools';
import { ReceiptValidator, Validator } from './agent';
import { RecordDetail, ResultBucket, RunResult } from './types';

export interface ReceiptReconcilerOptions {
  gateway: RecordGateway;
  config: Readonly<ReconciliationConfig>;
  /** Reasoning backend; required unless a validator is supplied */
  adapter?: ModelBusAdapter;
  validator?: Validator;
}

type Counts = Record<ResultBucket, number>;

export class ReceiptReconciler {
  private gateway: RecordGateway;
  private config: Readonly<ReconciliationConfig>;
  private extractor: ReceiptExtractor;
  private validator: Validator;
  private decisionEngine: DecisionEngine;

  constructor(options: ReceiptReconcilerOptions) {
    validateThresholds(options.config.minConfidence, options.config.autoReconcileThreshold);

    this.gateway = options.gateway;
    this.config = options.config;
    this.extractor = new ReceiptExtractor(this.gateway, this.config.receiptsTable);
    this.decisionEngine = new DecisionEngine(this.gateway, this.config);

    if (options.validator) {
      this.validator = options.validator;
    } else if (options.adapter) {
      this.validator = new ReceiptValidator({
        adapter: options.adapter,
        tools: createToolRegistry({ config: this.config, gateway: this.gateway }),
        config: this.config,
      });
    } else {
      throw new ConfigError('ReceiptReconciler needs a reasoning adapter or a validator');
    }
  }

  /**
   * Ask the gateway every run; it reuses a live handle and reopens a dropped one
   */
  async connect(): Promise<boolean> {
    return this.gateway.connect();
  }

  async disconnect(): Promise<void> {
    await this.gateway.disconnect();
  }

  /**
   * Run the full pipeline over the unreconciled receipts.
   *
   * @param limit - process only the first N receipts in ID order
   */
  async reconcileReceipts(limit?: number): Promise<RunResult> {
    const runId = uuidv4();
    const startedAt = new Date();
    const counts: Counts = { reconciled: 0, failed: 0, needsReview: 0 };
    const details: RecordDetail[] = [];

    const finish = (outcome: { success: boolean; message?: string; error?: string }): RunResult =>
      Object.freeze({
        ...outcome,
        runId,
        startedAt,
        finishedAt: new Date(),
        processed: details.length,
        ...counts,
        details: Object.freeze(details.map((detail) => Object.freeze(detail))),
      });

    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      return finish({ success: false, error: `Invalid limit: ${limit} (expected a positive integer)` });
    }

    try {
      // ------------------------------------------------------------------------
      // Connect
      // ------------------------------------------------------------------------
      if (!(await this.connect())) {
        return finish({ success: false, error: 'Failed to connect to database' });
      }

      // ------------------------------------------------------------------------
      // Extract
      // ------------------------------------------------------------------------
      console.log('\n[Step 1] Extracting unreconciled receipts...');
      let receipts = await this.extractor.getUnreconciledReceipts();

      if (receipts.length === 0) {
        return finish({ success: true, message: 'no unreconciled receipts' });
      }

      if (limit !== undefined) {
        receipts = receipts.slice(0, limit);
      }
      console.log(`Found ${receipts.length} receipts to process`);

      // ------------------------------------------------------------------------
      // Validate + decide, one record at a time
      // ------------------------------------------------------------------------
      console.log('\n[Step 2] Validating receipts...');
      for (const [index, receipt] of receipts.entries()) {
        console.log(
          `\nProcessing receipt ${index + 1}/${receipts.length}: ID=${receipt.id}, Number=${receipt.receiptNumber ?? 'None'}`
        );
        const detail = await this.processReceipt(receipt);
        details.push(detail);
        counts[bucketFor(detail.action)]++;
      }

      const result = finish({ success: true });
      this.printSummary(result);
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`✗ Reconciliation run failed: ${message}`);
      return finish({ success: false, error: `Reconciliation run failed: ${message}` });
    }
  }

  /**
   * Validate and decide one receipt. Failures are contained here.
   */
  private async processReceipt(receipt: Receipt): Promise<RecordDetail> {
    try {
      const verdict = await this.validator.validate(receipt);
      const action = await this.decisionEngine.apply(receipt, verdict);
      return {
        receiptId: receipt.id,
        receiptNumber: receipt.receiptNumber,
        status: verdict.status,
        confidence: verdict.confidence,
        reasoning: verdict.reasoning,
        issues: verdict.issues,
        action,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`✗ Error processing receipt ${receipt.id}: ${message}`);
      return {
        receiptId: receipt.id,
        receiptNumber: receipt.receiptNumber,
        status: 'ERROR',
        confidence: 0,
        reasoning: `Processing error: ${message}`,
        issues: [`Processing failed: ${message}`],
        action: 'needs_review',
      };
    }
  }

  private printSummary(result: RunResult): void {
    const rule = '='.repeat(60);
    console.log(`\n${rule}`);
    console.log('Reconciliation Summary');
    console.log(rule);
    console.log(`Processed: ${result.processed}`);
    console.log(`Reconciled: ${result.reconciled}`);
    console.log(`Failed: ${result.failed}`);
    console.log(`Needs Review: ${result.needsReview}`);
    console.log(rule);
  }
}
