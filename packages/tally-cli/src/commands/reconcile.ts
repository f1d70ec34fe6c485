/**
 * Reconcile command - run the pipeline once and print the run summary
 */

import {
  ConfigError,
  ReceiptReconciler,
  RunResult,
  createReconciliationConfig,
  loadReconciliationConfig,
} from 'tally-reconciler';
import { CliContext } from '../context';

export interface ReconcileOptions {
  limit?: string;
  db?: string;
  dryRun?: boolean;
}

/**
 * Positive whole number, written in digits
 */
export function parseLimit(raw: string): number {
  const text = raw.trim();
  const limit = Number(text);
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(limit) || limit < 1) {
    throw new ConfigError(`Invalid limit: ${raw} (expected a positive integer)`, 'INVALID_LIMIT');
  }
  return limit;
}

export async function reconcileCommand(options: ReconcileOptions, context: CliContext): Promise<RunResult> {
  const loaded = loadReconciliationConfig(context.env);
  const config = options.dryRun ? createReconciliationConfig({ ...loaded, autoReconcile: false }) : loaded;
  const limit = options.limit === undefined ? config.batchSize : parseLimit(options.limit);

  const reconciler = new ReceiptReconciler({
    gateway: context.openGateway(options.db ?? config.dbType),
    config,
    adapter: context.createAdapter(config),
  });

  if (options.dryRun) {
    console.log('ℹ Dry run: auto-reconcile disabled, no receipt will be updated');
  }

  let result: RunResult;
  try {
    result = await reconciler.reconcileReceipts(limit);
  } finally {
    await reconciler.disconnect();
  }

  console.log(JSON.stringify(result, null, 2));

  if (!result.success) {
    process.exitCode = 1;
  }
  return result;
}
