/**
 * Rule tools over one receipt snapshot
 *
 * Every tool answers with a line that starts with its outcome keyword:
 * - pass: VALID / CONSISTENT / COMPLIANT / UNIQUE
 * - fail: INVALID / INCONSISTENT / RULE_VIOLATION / DUPLICATE
 * - WARNING: non-blocking concern
 * - ERROR: the tool itself could not run
 *
 * Only checkDuplicate touches the store.
 */

import { RecordGateway } from 'tally-storage';
import { ReconciliationConfig } from '../config';
import {
  APPORTION_TYPES,
  RECEIPT_STATUSES,
  RECEIPT_TYPES,
  RECONCILED_STATUS,
  REQUIRED_FIELDS,
  Receipt,
  UNRECONCILED_STATUS,
  formatDate,
  receiptToRow,
  toNumber,
} from '../receipt';

type ConsistencyLimits = Pick<ReconciliationConfig, 'minYear' | 'maxYear' | 'amountSanityBound'>;
type AmountLimits = Pick<ReconciliationConfig, 'minReceiptAmount' | 'maxReceiptAmount'>;

function oneOf(values: readonly string[]): string {
  return `[${values.join(', ')}]`;
}

function includes(values: readonly string[], value: string | null): boolean {
  return value !== null && values.includes(value);
}

/**
 * True when a receipt date is present and disagrees with MONTH/YEAR
 */
function dateDisagrees(receipt: Receipt): boolean {
  const { receiptDate, month, year } = receipt;
  if (!receiptDate || !month || !year) return false;
  return receiptDate.getMonth() + 1 !== month || receiptDate.getFullYear() !== year;
}

// ============================================================================
// Field completeness & format
// ============================================================================

export function checkReceiptValidity(receipt: Receipt): string {
  const row = receiptToRow(receipt);
  const missing = REQUIRED_FIELDS.filter((field) => row[field] === null || row[field] === undefined);

  if (missing.length > 0) {
    return `INVALID: Missing required fields: ${missing.join(', ')}`;
  }

  if (receipt.amount === null || receipt.amount <= 0) {
    return 'INVALID: Amount must be positive';
  }

  if (!includes(RECEIPT_STATUSES, receipt.status)) {
    return `INVALID: Status must be one of ${oneOf(RECEIPT_STATUSES)}, got '${receipt.status ?? ''}'`;
  }

  if (!includes(RECEIPT_TYPES, receipt.receiptType)) {
    return `INVALID: Receipt type must be one of ${oneOf(RECEIPT_TYPES)}, got '${receipt.receiptType ?? ''}'`;
  }

  if (!includes(APPORTION_TYPES, receipt.apportionType)) {
    return `INVALID: Apportion type must be one of ${oneOf(APPORTION_TYPES)}, got '${receipt.apportionType ?? ''}'`;
  }

  return 'VALID: Receipt has all required fields and valid format';
}

// ============================================================================
// Assignment
// ============================================================================

export function checkEmployerAssignment(receipt: Receipt): string {
  if (!receipt.employerId) {
    return 'INVALID: Missing employer assignment';
  }
  if (!receipt.officeId) {
    return 'INVALID: Missing office assignment';
  }
  if (!receipt.schemeId) {
    return 'INVALID: Missing scheme assignment';
  }
  if (!receipt.mainSchemeId) {
    return 'WARNING: Missing main scheme assignment';
  }

  return (
    `VALID: Assigned to Employer=${receipt.employerId}, Office=${receipt.officeId}, ` +
    `Scheme=${receipt.schemeId}, MainScheme=${receipt.mainSchemeId}`
  );
}

// ============================================================================
// Logical consistency
// ============================================================================

export function checkLogicalConsistency(receipt: Receipt, limits: ConsistencyLimits): string {
  const issues: string[] = [];
  const { month, year, amount } = receipt;

  if (month !== null && (month < 1 || month > 12)) {
    issues.push(`Invalid month: ${month}`);
  }

  if (year !== null && (year < limits.minYear || year > limits.maxYear)) {
    issues.push(`Suspicious year: ${year}`);
  }

  if (amount !== null) {
    if (amount < 0) {
      issues.push('Negative amount');
    } else if (amount > limits.amountSanityBound) {
      issues.push('Extremely large amount');
    }
  }

  if (dateDisagrees(receipt)) {
    issues.push(
      `Receipt date inconsistent with month/year: date=${formatDate(receipt.receiptDate)}, month=${month}, year=${year}`
    );
  }

  if (issues.length > 0) {
    return `INCONSISTENT: ${issues.join(', ')}`;
  }

  return 'CONSISTENT: All fields are logically valid';
}

// ============================================================================
// Duplicate detection
// ============================================================================

/**
 * Count reconciled receipts sharing the natural key. PENALTY_ID and
 * ADJUSTMENT_ID compare null-aware: two nulls match.
 */
export function duplicateCountSql(table: string): string {
  return `
    SELECT COUNT(*) AS DUPLICATE_COUNT
    FROM ${table}
    WHERE STATUS = '${RECONCILED_STATUS}'
      AND ID != :receipt_id
      AND MONTH = :month
      AND RECEIPT_NUMBER = :receipt_number
      AND YEAR = :year
      AND EMPLOYER_ID = :employer_id
      AND RECEIPT_TYPE = :receipt_type
      AND (PENALTY_ID = :penalty_id OR (PENALTY_ID IS NULL AND :penalty_id IS NULL))
      AND (ADJUSTMENT_ID = :adjustment_id OR (ADJUSTMENT_ID IS NULL AND :adjustment_id IS NULL))
  `;
}

export async function checkDuplicate(
  receipt: Receipt,
  gateway: RecordGateway | undefined,
  table: string
): Promise<string> {
  if (!gateway) {
    return 'WARNING: Cannot check duplicates without database connection';
  }

  const { id, receiptNumber, amount, employerId, month, year, receiptType } = receipt;
  if (!id || !receiptNumber || !amount || !employerId || !month || !year || !receiptType) {
    return 'WARNING: Insufficient data to check duplicates';
  }

  try {
    const rows = await gateway.query(duplicateCountSql(table), {
      receipt_id: id,
      month,
      receipt_number: receiptNumber,
      year,
      employer_id: employerId,
      receipt_type: receiptType,
      penalty_id: receipt.penaltyId,
      adjustment_id: receipt.adjustmentId,
    });

    if (rows === null) {
      return 'ERROR: Could not check duplicates: duplicate query failed';
    }

    const first = rows[0];
    const count = first ? toNumber(Object.values(first)[0]) ?? 0 : 0;
    if (count > 0) {
      return `DUPLICATE: Found ${count} similar reconciled receipt(s)`;
    }

    return 'UNIQUE: No duplicates found';
  } catch (error) {
    return `ERROR: Could not check duplicates: ${error instanceof Error ? error.message : String(error)}`;
  }
}

// ============================================================================
// Business rules
// ============================================================================

export function checkBusinessRules(receipt: Receipt, limits: AmountLimits): string {
  const violations: string[] = [];

  if (receipt.status !== UNRECONCILED_STATUS) {
    violations.push(`Status should be '${UNRECONCILED_STATUS}' but is '${receipt.status ?? ''}'`);
  }

  if (!receipt.receiptNumber || receipt.receiptNumber.trim().length === 0) {
    violations.push('Missing receipt number');
  }

  if (dateDisagrees(receipt)) {
    violations.push('Receipt date inconsistent with month/year');
  }

  const { amount } = receipt;
  if (amount !== null) {
    if (amount <= 0) {
      violations.push('Amount must be positive');
    } else if (amount < limits.minReceiptAmount) {
      violations.push('Amount below minimum threshold');
    } else if (amount > limits.maxReceiptAmount) {
      violations.push('Amount exceeds maximum threshold');
    }
  }

  if (receipt.isDeleted) {
    violations.push('Receipt is marked as deleted');
  }

  if (violations.length > 0) {
    return `RULE_VIOLATION: ${violations.join(', ')}`;
  }

  return 'COMPLIANT: All business rules satisfied';
}
