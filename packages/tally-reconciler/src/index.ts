/**
 * Tally Reconciler
 *
 * Receipt reconciliation pipeline:
 *   extraction -> rule tools + reasoning agent -> threshold-gated decision -> guarded update
 *
 * Entry point: ReceiptReconciler.reconcileReceipts(limit?)
 */

export * from './types';
export * from './errors';
export * from './config';
export * from './receipt';
export * from './tools';
export * from './agent';
export * from './decision';
export * from './extractor';
export * from './reconciler';
