/**
 * Reconciliation Configuration
 *
 * One explicit, frozen value handed to the orchestrator and decision engine at
 * construction. Nothing reads process.env while records are being processed.
 */

import { z } from 'zod';
import { supportedGatewayTypes } from 'tally-storage';
import { ConfigError } from './errors';

export interface ReconciliationConfig {
  /** Floor below which even a VALID verdict goes to manual review */
  minConfidence: number;
  /** Confidence at or above which a VALID verdict is written back automatically */
  autoReconcileThreshold: number;
  autoReconcile: boolean;
  /** Hard cap on reasoning iterations per receipt */
  maxIterations: number;
  model: string;
  temperature: number;
  openaiApiKey: string;
  /** Table holding receipts, optionally schema-qualified */
  receiptsTable: string;
  minYear: number;
  maxYear: number;
  minReceiptAmount: number;
  maxReceiptAmount: number;
  /** Amounts above this are reported as implausible */
  amountSanityBound: number;
  /** Default record limit for a CLI run */
  batchSize: number;
  /** Gateway type tag used when none is given */
  dbType: string;
}

export const DEFAULT_RECONCILIATION_CONFIG: Readonly<ReconciliationConfig> = Object.freeze({
  minConfidence: 80,
  autoReconcileThreshold: 90,
  autoReconcile: true,
  maxIterations: 10,
  model: 'gpt-4o-mini',
  temperature: 0,
  openaiApiKey: '',
  receiptsTable: 'RECEIPT_DETAILS',
  minYear: 2000,
  maxYear: 2100,
  minReceiptAmount: 0.01,
  maxReceiptAmount: 10_000_000,
  amountSanityBound: 1_000_000_000,
  batchSize: 10,
  dbType: 'oracle',
});

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_$]*(\.[A-Za-z_][A-Za-z0-9_$]*)?$/;

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function flag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) return fallback;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(normalized)) return true;
      if (FALSE_VALUES.includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got '${value}'` });
      return z.NEVER;
    });
}

const percent = z.coerce.number().min(0).max(100);

const ReconciliationEnvSchema = z.object({
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).default(DEFAULT_RECONCILIATION_CONFIG.model),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULT_RECONCILIATION_CONFIG.temperature),
  MIN_CONFIDENCE_SCORE: percent.default(DEFAULT_RECONCILIATION_CONFIG.minConfidence),
  AUTO_RECONCILE_THRESHOLD: percent.default(DEFAULT_RECONCILIATION_CONFIG.autoReconcileThreshold),
  ENABLE_AUTO_RECONCILE: flag(DEFAULT_RECONCILIATION_CONFIG.autoReconcile),
  AGENT_MAX_ITERATIONS: z.coerce.number().int().min(1).max(50).default(DEFAULT_RECONCILIATION_CONFIG.maxIterations),
  MAX_RECEIPT_AMOUNT: z.coerce.number().positive().default(DEFAULT_RECONCILIATION_CONFIG.maxReceiptAmount),
  MIN_RECEIPT_AMOUNT: z.coerce.number().min(0).default(DEFAULT_RECONCILIATION_CONFIG.minReceiptAmount),
  VALID_YEAR_MIN: z.coerce.number().int().default(DEFAULT_RECONCILIATION_CONFIG.minYear),
  VALID_YEAR_MAX: z.coerce.number().int().default(DEFAULT_RECONCILIATION_CONFIG.maxYear),
  RECONCILIATION_BATCH_SIZE: z.coerce.number().int().positive().default(DEFAULT_RECONCILIATION_CONFIG.batchSize),
  RECEIPTS_TABLE: z.string().default(DEFAULT_RECONCILIATION_CONFIG.receiptsTable),
  TALLY_DB_TYPE: z.string().default(DEFAULT_RECONCILIATION_CONFIG.dbType),
});

/**
 * Load configuration from environment variables.
 * Empty values count as unset.
 */
export function loadReconciliationConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<ReconciliationConfig> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const result = ReconciliationEnvSchema.safeParse(present);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid reconciliation configuration: ${detail}`);
  }

  const parsed = result.data;
  return createReconciliationConfig({
    minConfidence: parsed.MIN_CONFIDENCE_SCORE,
    autoReconcileThreshold: parsed.AUTO_RECONCILE_THRESHOLD,
    autoReconcile: parsed.ENABLE_AUTO_RECONCILE,
    maxIterations: parsed.AGENT_MAX_ITERATIONS,
    model: parsed.OPENAI_MODEL,
    temperature: parsed.OPENAI_TEMPERATURE,
    openaiApiKey: parsed.OPENAI_API_KEY,
    receiptsTable: parsed.RECEIPTS_TABLE,
    minYear: parsed.VALID_YEAR_MIN,
    maxYear: parsed.VALID_YEAR_MAX,
    minReceiptAmount: parsed.MIN_RECEIPT_AMOUNT,
    maxReceiptAmount: parsed.MAX_RECEIPT_AMOUNT,
    batchSize: parsed.RECONCILIATION_BATCH_SIZE,
    dbType: parsed.TALLY_DB_TYPE,
  });
}

/**
 * Build a validated, frozen configuration from defaults plus overrides
 */
export function createReconciliationConfig(
  overrides: Partial<ReconciliationConfig> = {}
): Readonly<ReconciliationConfig> {
  const config: ReconciliationConfig = { ...DEFAULT_RECONCILIATION_CONFIG, ...overrides };
  validateReconciliationConfig(config);
  return Object.freeze(config);
}

/**
 * Startup invariants. Throws ConfigError on the first one broken.
 */
export function validateReconciliationConfig(config: ReconciliationConfig): void {
  validateThresholds(config.minConfidence, config.autoReconcileThreshold);

  if (config.minYear > config.maxYear) {
    throw new ConfigError(`VALID_YEAR_MIN (${config.minYear}) is after VALID_YEAR_MAX (${config.maxYear})`);
  }

  if (config.minReceiptAmount > config.maxReceiptAmount) {
    throw new ConfigError(
      `MIN_RECEIPT_AMOUNT (${config.minReceiptAmount}) exceeds MAX_RECEIPT_AMOUNT (${config.maxReceiptAmount})`
    );
  }

  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    throw new ConfigError(`Agent iteration cap must be a positive integer, got ${config.maxIterations}`);
  }

  if (!TABLE_NAME.test(config.receiptsTable)) {
    throw new ConfigError(`Invalid receipts table name: '${config.receiptsTable}'`);
  }

  if (!supportedGatewayTypes().includes(config.dbType.trim().toLowerCase())) {
    throw new ConfigError(
      `Unsupported database type: ${config.dbType}. Supported types: ${supportedGatewayTypes().join(', ')}`
    );
  }
}

/**
 * minConfidence <= autoReconcileThreshold, both within [0, 100]
 */
export function validateThresholds(minConfidence: number, autoReconcileThreshold: number): void {
  for (const [label, value] of [
    ['MIN_CONFIDENCE_SCORE', minConfidence],
    ['AUTO_RECONCILE_THRESHOLD', autoReconcileThreshold],
  ] as const) {
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new ConfigError(`${label} must be between 0 and 100, got ${value}`);
    }
  }

  if (minConfidence > autoReconcileThreshold) {
    throw new ConfigError(
      `MIN_CONFIDENCE_SCORE (${minConfidence}) must not exceed AUTO_RECONCILE_THRESHOLD (${autoReconcileThreshold})`,
      'THRESHOLD_ORDER'
    );
  }
}
