#!/usr/bin/env node
/**
 * Tally CLI
 * Commands: reconcile, doctor, show, types
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { defaultContext } from './context';
import { ReconcileOptions, reconcileCommand } from './commands/reconcile';
import { DoctorOptions, doctorCommand } from './commands/doctor';
import { ShowOptions, showCommand } from './commands/show';
import { typesCommand } from './commands/types';

dotenv.config();

const context = defaultContext(process.env);
const program = new Command();

function fail(error: unknown): never {
  const code = error instanceof Error && 'code' in error ? ` [${String(error.code)}]` : '';
  console.error(`Error${code}:`, error instanceof Error ? error.message : error);
  process.exit(1);
}

program
  .name('tally')
  .description('Tally - receipt reconciliation with rule checks and a reasoning agent')
  .version('0.1.0');

program
  .command('reconcile')
  .description('Validate unreconciled receipts and auto-reconcile the confident ones')
  .option('--limit <n>', 'Process at most N receipts (default: RECONCILIATION_BATCH_SIZE)')
  .option('--db <type>', 'Database type (default: TALLY_DB_TYPE)')
  .option('--dry-run', 'Validate only; never update a receipt')
  .action(async (options: ReconcileOptions) => {
    try {
      await reconcileCommand(options, context);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('doctor')
  .description('Check configuration, database connectivity and the receipts table')
  .option('--db <type>', 'Database type (default: TALLY_DB_TYPE)')
  .action(async (options: DoctorOptions) => {
    try {
      await doctorCommand(options, context);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('show <id>')
  .description('Show one receipt')
  .option('--db <type>', 'Database type (default: TALLY_DB_TYPE)')
  .action(async (id: string, options: ShowOptions) => {
    try {
      await showCommand(id, options, context);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('types')
  .description('List supported database types')
  .action(() => {
    typesCommand();
  });

program.parse();
