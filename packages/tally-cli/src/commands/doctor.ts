/**
 * Doctor command - check configuration, connectivity and the receipts table
 */

import {
  ConfigError,
  ReconciliationConfig,
  UNRECONCILED_STATUS,
  loadReconciliationConfig,
  toNumber,
} from 'tally-reconciler';
import { GatewayConfigError, RecordGateway } from 'tally-storage';
import { CliContext } from '../context';

export interface DoctorOptions {
  db?: string;
}

export async function doctorCommand(options: DoctorOptions, context: CliContext): Promise<boolean> {
  console.log('🏥 Tally Doctor - Reconciliation Readiness Check\n');

  // 1. Configuration
  console.log('📋 Configuration Check:');
  let config: Readonly<ReconciliationConfig>;
  let gateway: RecordGateway;
  try {
    config = loadReconciliationConfig(context.env);
    gateway = context.openGateway(options.db ?? config.dbType);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof GatewayConfigError) {
      console.log(`  ❌ Configuration Error: ${error.message}`);
      console.log(`     Error Code: ${error.code}`);
      console.log('');
      process.exitCode = 1;
      return false;
    }
    throw error;
  }

  console.log(`  ✅ Database type: ${gateway.type}`);
  console.log(`  ✅ Receipts table: ${config.receiptsTable}`);
  console.log(
    `  ✅ Thresholds: review at ${config.minConfidence}%, auto-reconcile at ${config.autoReconcileThreshold}%` +
      (config.autoReconcile ? '' : ' (auto-reconcile disabled)')
  );
  const adapter = context.createAdapter(config);
  if (adapter.isConfigured()) {
    console.log(`  ✅ Reasoning backend: ${adapter.provider} (model: ${config.model})`);
  } else {
    console.log(
      `  ⚠️  Reasoning backend ${adapter.provider} has no API key; reconcile runs will fail at the reasoning step`
    );
  }
  console.log('');

  // 2. Connectivity
  console.log('🔌 Connectivity Check:');
  if (!(await gateway.connect())) {
    console.log(`  ❌ Could not connect to ${gateway.type} database`);
    console.log('');
    console.log('⚠️  Some checks failed. Please review the errors above.');
    process.exitCode = 1;
    return false;
  }
  console.log(`  ✅ Connected to ${gateway.type} database`);
  console.log('');

  // 3. Receipts table
  console.log('📄 Receipts Table Check:');
  let allChecks = true;
  try {
    const rows = await gateway.query(
      `SELECT COUNT(*) AS PENDING FROM ${config.receiptsTable} WHERE STATUS = :status`,
      { status: UNRECONCILED_STATUS }
    );
    const pending = rows && rows[0] ? toNumber(Object.values(rows[0])[0]) : null;
    if (pending === null) {
      console.log(`  ❌ ${config.receiptsTable} could not be read`);
      allChecks = false;
    } else {
      console.log(`  ✅ ${config.receiptsTable} readable (${pending} unreconciled receipts)`);
    }
  } finally {
    await gateway.disconnect();
  }
  console.log('');

  if (allChecks) {
    console.log('✅ All checks passed! Ready to reconcile.');
  } else {
    console.log('⚠️  Some checks failed. Please review the errors above.');
    process.exitCode = 1;
  }
  return allChecks;
}
