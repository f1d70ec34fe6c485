/**
 * types.ts - Reconciliation type contracts
 * -----------------------------------------------------------------------------
 * - Verdict: one record's validation outcome, consumed once by the decision step
 * - RunResult: per-run aggregate, frozen before it is returned
 * - ToolVerdict: a rule tool's textual verdict classified by its keyword
 */

// ============================================================================
// Verdict
// ============================================================================

export type VerdictStatus = 'VALID' | 'INVALID' | 'NEEDS_REVIEW' | 'ERROR';

/**
 * Structured validation outcome for one receipt
 */
export interface Verdict {
  status: VerdictStatus;
  /** Confidence in [0, 100] */
  confidence: number;
  reasoning: string;
  /** In order of discovery, without repeats */
  issues: string[];
  receiptId: number;
  receiptNumber: string | null;
  /** Model calls made before the verdict was reached */
  iterations: number;
  /** Tool names in the order the agent invoked them */
  toolCalls: string[];
}

// ============================================================================
// Decisions
// ============================================================================

export type Decision = { kind: 'reconcile' } | { kind: 'needs_review' } | { kind: 'invalid' };

export type RecordAction = 'reconciled' | 'update_failed' | 'needs_review' | 'invalid';

export type ResultBucket = 'reconciled' | 'failed' | 'needsReview';

export interface RecordDetail {
  receiptId: number;
  receiptNumber: string | null;
  status: VerdictStatus;
  confidence: number;
  reasoning: string;
  issues: string[];
  action: RecordAction;
}

// ============================================================================
// Run Result
// ============================================================================

export interface RunResult {
  readonly success: boolean;
  readonly message?: string;
  readonly error?: string;
  readonly runId: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly processed: number;
  readonly reconciled: number;
  readonly failed: number;
  readonly needsReview: number;
  readonly details: readonly RecordDetail[];
}

// ============================================================================
// Tool Verdicts
// ============================================================================

export type ToolOutcome = 'pass' | 'fail' | 'warn' | 'error';

export type ToolKeyword =
  | 'VALID'
  | 'CONSISTENT'
  | 'COMPLIANT'
  | 'UNIQUE'
  | 'INVALID'
  | 'INCONSISTENT'
  | 'RULE_VIOLATION'
  | 'DUPLICATE'
  | 'WARNING'
  | 'ERROR';

export interface ToolVerdict {
  keyword: ToolKeyword | null;
  outcome: ToolOutcome;
  text: string;
}
