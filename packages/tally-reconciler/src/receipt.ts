/**
 * Receipt - typed snapshot of one RECEIPT_DETAILS row
 *
 * Column names are upper-cased once on the way in; after that every field is
 * read by name. Unrecognised columns are kept in `extra`.
 *
 * Rows are parsed leniently: a value that cannot be coerced becomes null so the
 * rule tools can report it. Only a missing ID makes a row unusable.
 */

import { Row } from 'tally-storage';

export const RECEIPT_STATUSES = ['U', 'R', 'REV', 'I'] as const;
export const RECEIPT_TYPES = ['1', '2', '3', '4', '5'] as const;
export const APPORTION_TYPES = ['Auto', 'Normal'] as const;

export const UNRECONCILED_STATUS = 'U';
export const RECONCILED_STATUS = 'R';
export const SYSTEM_ACTOR = 'SYSTEM';

export const REQUIRED_FIELDS = [
  'ID',
  'RECEIPT_NUMBER',
  'AMOUNT',
  'STATUS',
  'EMPLOYER_ID',
  'OFFICE_ID',
  'MONTH',
  'YEAR',
  'SCHEME_ID',
  'RECEIPT_TYPE',
  'APPORTION_TYPE',
] as const;

/** Fields shown to the reasoning agent, in this order */
export const AGENT_FIELDS = [
  'ID',
  'RECEIPT_NUMBER',
  'STATUS',
  'AMOUNT',
  'MONTH',
  'YEAR',
  'EMPLOYER_ID',
  'OFFICE_ID',
  'MEMBER_ID',
  'MAIN_SCHEME_ID',
  'SCHEME_ID',
  'RECEIPT_TYPE',
  'APPORTION_TYPE',
  'RECEIPT_DATE',
  'EMPLOYER_OFFICE_ID',
  'PENALTY_ID',
  'ADJUSTMENT_ID',
] as const;

export interface Receipt {
  readonly id: number;
  readonly receiptNumber: string | null;
  readonly receiptDetailNo: number | null;
  /** Owning party */
  readonly employerId: number | null;
  readonly officeId: number | null;
  readonly memberId: number | null;
  readonly receiptDate: Date | null;
  readonly month: number | null;
  readonly year: number | null;
  readonly mainSchemeId: number | null;
  readonly schemeId: number | null;
  readonly amount: number | null;
  /** Upper-cased status code */
  readonly status: string | null;
  readonly receiptType: string | null;
  readonly apportionType: string | null;
  readonly penaltyId: number | null;
  readonly adjustmentId: number | null;
  readonly reconciledBy: string | null;
  readonly createdBy: string | null;
  readonly reconciledAt: Date | null;
  readonly createdAt: Date | null;
  readonly updatedAt: Date | null;
  readonly sourcePro: string | null;
  /** Soft-delete timestamp, when it parses */
  readonly deletedAt: Date | null;
  /** Whether the soft-delete column holds any value at all */
  readonly isDeleted: boolean;
  readonly updatedBy: number | null;
  readonly deletedBy: number | null;
  readonly memsalaryAmount: number | null;
  readonly dsisFlag: string | null;
  readonly eofficeReference: string | null;
  readonly employerOfficeId: string | null;
  readonly extra: Readonly<Record<string, unknown>>;
}

export class ReceiptParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReceiptParseError';
  }
}

// ============================================================================
// Row -> Receipt
// ============================================================================

export function receiptFromRow(row: Row): Receipt {
  const columns = new Map<string, unknown>();
  for (const [key, value] of Object.entries(row)) {
    columns.set(key.toUpperCase(), value);
  }

  const consumed = new Set<string>();
  const take = (column: string): unknown => {
    consumed.add(column);
    return columns.get(column);
  };

  const id = toInteger(take('ID'));
  if (id === null) {
    throw new ReceiptParseError(`Row has no usable ID: ${String(columns.get('ID'))}`);
  }

  const status = toText(take('STATUS'));
  const deletedAt = take('DELETED_AT');

  const receipt: Omit<Receipt, 'extra'> = {
    id,
    receiptNumber: toText(take('RECEIPT_NUMBER')),
    receiptDetailNo: toInteger(take('RECEIPT_DETAIL_NO')),
    employerId: toInteger(take('EMPLOYER_ID')),
    officeId: toInteger(take('OFFICE_ID')),
    memberId: toInteger(take('MEMBER_ID')),
    receiptDate: toDate(take('RECEIPT_DATE')),
    month: toInteger(take('MONTH')),
    year: toInteger(take('YEAR')),
    mainSchemeId: toInteger(take('MAIN_SCHEME_ID')),
    schemeId: toInteger(take('SCHEME_ID')),
    amount: toNumber(take('AMOUNT')),
    status: status === null ? null : status.toUpperCase(),
    receiptType: toText(take('RECEIPT_TYPE')),
    apportionType: toText(take('APPORTION_TYPE')),
    penaltyId: toInteger(take('PENALTY_ID')),
    adjustmentId: toInteger(take('ADJUSTMENT_ID')),
    reconciledBy: toText(take('RECONCILED_BY')),
    createdBy: toText(take('CREATED_BY')),
    reconciledAt: toDate(take('RECONCILED_AT')),
    createdAt: toDate(take('CREATED_AT')),
    updatedAt: toDate(take('UPDATED_AT')),
    sourcePro: toText(take('SOURCE_PRO')),
    deletedAt: toDate(deletedAt),
    isDeleted: deletedAt !== null && deletedAt !== undefined && String(deletedAt).trim() !== '',
    updatedBy: toInteger(take('UPDATED_BY')),
    deletedBy: toInteger(take('DELETED_BY')),
    memsalaryAmount: toNumber(take('MEMSALARY_AMOUNT')),
    dsisFlag: toText(take('DSIS_FLAG')),
    eofficeReference: toText(take('EOFFICE_REFERENCE')),
    employerOfficeId: toText(take('EMPLOYER_OFFICE_ID')),
  };

  const extra: Record<string, unknown> = {};
  for (const [column, value] of columns) {
    if (!consumed.has(column)) {
      extra[column] = value;
    }
  }

  return Object.freeze({ ...receipt, extra: Object.freeze(extra) });
}

// ============================================================================
// Receipt -> Row / text
// ============================================================================

/**
 * Upper-case column form, dates rendered as local `YYYY-MM-DD[ HH:mm:ss]`
 */
export function receiptToRow(receipt: Receipt): Row {
  return {
    ID: receipt.id,
    RECEIPT_NUMBER: receipt.receiptNumber,
    RECEIPT_DETAIL_NO: receipt.receiptDetailNo,
    EMPLOYER_ID: receipt.employerId,
    OFFICE_ID: receipt.officeId,
    MEMBER_ID: receipt.memberId,
    RECEIPT_DATE: formatDate(receipt.receiptDate),
    MONTH: receipt.month,
    YEAR: receipt.year,
    MAIN_SCHEME_ID: receipt.mainSchemeId,
    SCHEME_ID: receipt.schemeId,
    AMOUNT: receipt.amount,
    STATUS: receipt.status,
    RECEIPT_TYPE: receipt.receiptType,
    APPORTION_TYPE: receipt.apportionType,
    PENALTY_ID: receipt.penaltyId,
    ADJUSTMENT_ID: receipt.adjustmentId,
    RECONCILED_BY: receipt.reconciledBy,
    CREATED_BY: receipt.createdBy,
    RECONCILED_AT: formatDate(receipt.reconciledAt),
    CREATED_AT: formatDate(receipt.createdAt),
    UPDATED_AT: formatDate(receipt.updatedAt),
    SOURCE_PRO: receipt.sourcePro,
    DELETED_AT: formatDate(receipt.deletedAt),
    UPDATED_BY: receipt.updatedBy,
    DELETED_BY: receipt.deletedBy,
    MEMSALARY_AMOUNT: receipt.memsalaryAmount,
    DSIS_FLAG: receipt.dsisFlag,
    EOFFICE_REFERENCE: receipt.eofficeReference,
    EMPLOYER_OFFICE_ID: receipt.employerOfficeId,
    ...receipt.extra,
  };
}

/**
 * Compact `FIELD: value` lines for the agent prompt; absent fields are left out
 */
export function formatReceiptForAgent(receipt: Receipt): string {
  const row = receiptToRow(receipt);
  const lines: string[] = [];
  for (const field of AGENT_FIELDS) {
    const value = row[field];
    if (value !== null && value !== undefined) {
      lines.push(`${field}: ${String(value)}`);
    }
  }
  return lines.join('\n');
}

export function describeReceipt(receipt: Receipt): string {
  return (
    `Receipt(ID=${receipt.id}, Number=${receipt.receiptNumber ?? 'None'}, ` +
    `Status=${receipt.status ?? 'None'}, Amount=${receipt.amount ?? 'None'}, ` +
    `Employer=${receipt.employerId ?? 'None'})`
  );
}

// ============================================================================
// Coercion
// ============================================================================

export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function toInteger(value: unknown): number | null {
  const parsed = toNumber(value);
  return parsed !== null && Number.isSafeInteger(parsed) ? parsed : null;
}

function toText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) return formatDate(value);
  return String(value);
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?(Z)?)?$/;
const DAY_FIRST_DASHED = /^(\d{2})-(\d{2})-(\d{4})(?: (\d{2}):(\d{2}):(\d{2}))?$/;
const MONTH_FIRST_SLASHED = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Accepts Date objects and the string forms
 * YYYY-MM-DD[ HH:mm:ss[.SSS]], DD-MM-YYYY[ HH:mm:ss] and MM/DD/YYYY.
 * Strings are read as local time unless they end in Z.
 */
export function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();

  let match = ISO_DATE.exec(text);
  if (match) {
    const millis = match[7] ? Number(match[7].padEnd(3, '0').slice(0, 3)) : 0;
    return buildDate(
      Number(match[1]),
      Number(match[2]),
      Number(match[3]),
      Number(match[4] ?? 0),
      Number(match[5] ?? 0),
      Number(match[6] ?? 0),
      millis,
      match[8] === 'Z'
    );
  }

  match = DAY_FIRST_DASHED.exec(text);
  if (match) {
    return buildDate(
      Number(match[3]),
      Number(match[2]),
      Number(match[1]),
      Number(match[4] ?? 0),
      Number(match[5] ?? 0),
      Number(match[6] ?? 0),
      0,
      false
    );
  }

  match = MONTH_FIRST_SLASHED.exec(text);
  if (match) {
    return buildDate(Number(match[3]), Number(match[1]), Number(match[2]), 0, 0, 0, 0, false);
  }

  return null;
}

function buildDate(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number,
  millis: number,
  utc: boolean
): Date | null {
  const date = utc
    ? new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis))
    : new Date(year, month - 1, day, hours, minutes, seconds, millis);

  const actualMonth = utc ? date.getUTCMonth() : date.getMonth();
  const actualDay = utc ? date.getUTCDate() : date.getDate();
  if (Number.isNaN(date.getTime()) || actualMonth !== month - 1 || actualDay !== day) {
    return null;
  }
  return date;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

export function formatDate(date: Date | null): string | null {
  if (date === null) return null;

  const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  if (date.getHours() === 0 && date.getMinutes() === 0 && date.getSeconds() === 0 && date.getMilliseconds() === 0) {
    return day;
  }
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
