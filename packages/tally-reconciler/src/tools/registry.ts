/**
 * Tool registry - name-keyed dispatch table for the reasoning agent
 *
 * Each tool is {name, description, invoke}. The agent looks tools up by the
 * name the model writes on its Action line; there is no reflection.
 */

import { RecordGateway } from 'tally-storage';
import { ReconciliationConfig } from '../config';
import { Receipt } from '../receipt';
import { ToolKeyword, ToolOutcome, ToolVerdict } from '../types';
import {
  checkBusinessRules,
  checkDuplicate,
  checkEmployerAssignment,
  checkLogicalConsistency,
  checkReceiptValidity,
} from './validation-tools';

export interface ReceiptTool {
  readonly name: string;
  readonly description: string;
  /** Always receives the snapshot the agent holds, never model-written input */
  invoke(receipt: Receipt): Promise<string>;
}

export class ToolRegistry {
  private tools: Map<string, ReceiptTool> = new Map();

  register(tool: ReceiptTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ReceiptTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ReceiptTool[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }
}

export interface ToolRegistryOptions {
  config: Pick<
    ReconciliationConfig,
    'minYear' | 'maxYear' | 'amountSanityBound' | 'minReceiptAmount' | 'maxReceiptAmount' | 'receiptsTable'
  >;
  /** Without a gateway the duplicate check answers with a WARNING */
  gateway?: RecordGateway;
}

/**
 * The five rule tools, bound to configuration and (optionally) a gateway
 */
export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
  const { config, gateway } = options;
  const registry = new ToolRegistry();

  registry.register({
    name: 'check_receipt_validity',
    description:
      'Check if a receipt is valid: all required fields present, positive amount, and known status, receipt type and apportion type.',
    invoke: async (receipt) => checkReceiptValidity(receipt),
  });

  registry.register({
    name: 'check_employer_assignment',
    description: 'Check that the receipt is assigned to an employer, office and scheme (main scheme is recommended).',
    invoke: async (receipt) => checkEmployerAssignment(receipt),
  });

  registry.register({
    name: 'check_logical_consistency',
    description:
      'Check that month, year and amount make logical sense and that the receipt date agrees with the declared month and year.',
    invoke: async (receipt) => checkLogicalConsistency(receipt, config),
  });

  registry.register({
    name: 'check_duplicate',
    description: 'Check if the receipt duplicates an existing reconciled receipt.',
    invoke: (receipt) => checkDuplicate(receipt, gateway, config.receiptsTable),
  });

  registry.register({
    name: 'check_business_rules',
    description:
      'Check business rules: status must be unreconciled, receipt number present, amount within limits, not marked as deleted.',
    invoke: async (receipt) => checkBusinessRules(receipt, config),
  });

  return registry;
}

// ============================================================================
// Verdict classification
// ============================================================================

const KEYWORD_OUTCOMES: ReadonlyArray<[ToolKeyword, ToolOutcome]> = [
  ['RULE_VIOLATION', 'fail'],
  ['INCONSISTENT', 'fail'],
  ['CONSISTENT', 'pass'],
  ['COMPLIANT', 'pass'],
  ['DUPLICATE', 'fail'],
  ['INVALID', 'fail'],
  ['WARNING', 'warn'],
  ['UNIQUE', 'pass'],
  ['VALID', 'pass'],
  ['ERROR', 'error'],
];

/**
 * Classify a tool's answer by its leading keyword.
 * Text without a known keyword is treated as a tool error.
 */
export function classifyToolVerdict(text: string): ToolVerdict {
  const head = text.trimStart().split(':', 1)[0].trim().toUpperCase();

  for (const [keyword, outcome] of KEYWORD_OUTCOMES) {
    if (head === keyword) {
      return { keyword, outcome, text };
    }
  }

  return { keyword: null, outcome: 'error', text };
}
