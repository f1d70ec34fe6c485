/**
 * Show command - print one receipt as the agent would see it
 */

import {
  ConfigError,
  Receipt,
  ReceiptExtractor,
  describeReceipt,
  formatReceiptForAgent,
  loadReconciliationConfig,
} from 'tally-reconciler';
import { CliContext } from '../context';

export interface ShowOptions {
  db?: string;
}

export async function showCommand(rawId: string, options: ShowOptions, context: CliContext): Promise<Receipt | null> {
  const id = Number(rawId);
  if (!/^\d+$/.test(rawId.trim()) || !Number.isSafeInteger(id)) {
    throw new ConfigError(`Invalid receipt ID: ${rawId}`);
  }

  const config = loadReconciliationConfig(context.env);
  const gateway = context.openGateway(options.db ?? config.dbType);

  if (!(await gateway.connect())) {
    console.error(`✗ Could not connect to ${gateway.type} database`);
    process.exitCode = 1;
    return null;
  }

  try {
    const receipt = await new ReceiptExtractor(gateway, config.receiptsTable).getReceiptById(id);
    if (!receipt) {
      console.log(`Receipt not found: ${id}`);
      return null;
    }

    console.log(`\n${describeReceipt(receipt)}\n`);
    console.log(formatReceiptForAgent(receipt));
    if (receipt.isDeleted) {
      console.log('\n⚠ Marked as deleted');
    }
    console.log('');
    return receipt;
  } finally {
    await gateway.disconnect();
  }
}
