/**
 * Shared test fixtures: receipt rows, an in-memory gateway and a scripted validator
 */

import { GatewayInfo, RecordGateway, Row, SQLiteGateway, SqlParams } from 'tally-storage';
import { Receipt, receiptFromRow } from '../receipt';
import { Validator } from '../agent';
import { Verdict, VerdictStatus } from '../types';

export type SeedRow = Record<string, string | number | null>;

/**
 * A complete, valid unreconciled receipt row
 */
export function makeRow(overrides: SeedRow = {}): SeedRow {
  return {
    ID: 1,
    RECEIPT_NUMBER: 'RCP-1001',
    AMOUNT: 1500,
    STATUS: 'U',
    EMPLOYER_ID: 501,
    OFFICE_ID: 12,
    MEMBER_ID: null,
    MONTH: 3,
    YEAR: 2024,
    MAIN_SCHEME_ID: 7,
    SCHEME_ID: 70,
    RECEIPT_TYPE: '1',
    APPORTION_TYPE: 'Auto',
    RECEIPT_DATE: '2024-03-15',
    PENALTY_ID: null,
    ADJUSTMENT_ID: null,
    DELETED_AT: null,
    ...overrides,
  };
}

export function makeReceipt(overrides: SeedRow = {}): Receipt {
  return receiptFromRow(makeRow(overrides));
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
}

// ============================================================================
// FakeGateway
// ============================================================================

export interface RecordedCall {
  sql: string;
  params?: SqlParams;
}

/**
 * RecordGateway held entirely in memory. Query results come from `rows`
 * (null simulates a failed query); updates answer with `updateResult`.
 */
export class FakeGateway implements RecordGateway {
  readonly name = 'fake';
  readonly type = 'sqlite' as const;

  rows: Row[] | null = [];
  connectResult = true;
  updateResult = true;
  queries: RecordedCall[] = [];
  updates: RecordedCall[] = [];
  connectCalls = 0;
  private connected = false;

  async connect(): Promise<boolean> {
    this.connectCalls++;
    this.connected = this.connectResult;
    return this.connected;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async isConnected(): Promise<boolean> {
    return this.connected;
  }

  async query(sql: string, params?: SqlParams): Promise<Row[] | null> {
    this.queries.push({ sql, params });
    return this.rows;
  }

  async update(sql: string, params?: SqlParams): Promise<boolean> {
    this.updates.push({ sql, params });
    return this.updateResult;
  }

  nowExpression(): string {
    return 'CURRENT_TIMESTAMP';
  }

  info(): GatewayInfo {
    return { name: this.name, type: this.type, connected: this.connected, config: {} };
  }
}

// ============================================================================
// ScriptedValidator
// ============================================================================

/**
 * Answers with a preset status/confidence per receipt ID
 */
export class ScriptedValidator implements Validator {
  calls: number[] = [];
  private script: Map<number, { status: VerdictStatus; confidence: number } | Error>;

  constructor(entries: Array<[number, { status: VerdictStatus; confidence: number } | Error]>) {
    this.script = new Map(entries);
  }

  async validate(receipt: Receipt): Promise<Verdict> {
    this.calls.push(receipt.id);
    const entry = this.script.get(receipt.id);
    if (entry instanceof Error) {
      throw entry;
    }
    const { status, confidence } = entry ?? { status: 'NEEDS_REVIEW', confidence: 50 };
    return {
      status,
      confidence,
      reasoning: `scripted ${status} at ${confidence}`,
      issues: [],
      receiptId: receipt.id,
      receiptNumber: receipt.receiptNumber,
      iterations: 1,
      toolCalls: [],
    };
  }
}

// ============================================================================
// SQLite fixtures
// ============================================================================

export const RECEIPT_TABLE_DDL = `
  CREATE TABLE RECEIPT_DETAILS (
    ID INTEGER PRIMARY KEY,
    RECEIPT_NUMBER TEXT,
    AMOUNT REAL,
    STATUS TEXT,
    EMPLOYER_ID INTEGER,
    OFFICE_ID INTEGER,
    MEMBER_ID INTEGER,
    MONTH INTEGER,
    YEAR INTEGER,
    MAIN_SCHEME_ID INTEGER,
    SCHEME_ID INTEGER,
    RECEIPT_TYPE TEXT,
    APPORTION_TYPE TEXT,
    RECEIPT_DATE TEXT,
    PENALTY_ID INTEGER,
    ADJUSTMENT_ID INTEGER,
    DELETED_AT TEXT,
    RECONCILED_BY TEXT,
    RECONCILED_AT TEXT,
    UPDATED_AT TEXT
  )
`;

/**
 * Connected in-memory SQLite gateway with an empty RECEIPT_DETAILS table
 */
export async function createReceiptStore(): Promise<SQLiteGateway> {
  const gateway = new SQLiteGateway('test', { database: ':memory:' });
  if (!(await gateway.connect())) {
    throw new Error('Could not open in-memory SQLite');
  }
  gateway.exec(RECEIPT_TABLE_DDL);
  return gateway;
}

export async function insertReceipt(gateway: RecordGateway, row: SeedRow): Promise<void> {
  const columns = Object.keys(row);
  const ok = await gateway.update(
    `INSERT INTO RECEIPT_DETAILS (${columns.join(', ')}) VALUES (${columns.map((c) => `:${c}`).join(', ')})`,
    row
  );
  if (!ok) {
    throw new Error(`Could not insert receipt ${String(row.ID)}`);
  }
}
