/**
 * ReceiptExtractor - reads receipts from the store as typed snapshots
 */

import { RecordGateway, Row } from 'tally-storage';
import { Receipt, ReceiptParseError, UNRECONCILED_STATUS, receiptFromRow } from './receipt';

export class ReceiptExtractor {
  private gateway: RecordGateway;
  private table: string;

  constructor(gateway: RecordGateway, table: string) {
    this.gateway = gateway;
    this.table = table;
  }

  /**
   * All receipts with STATUS 'U', ordered by ID.
   * A failed query is logged and reads as no receipts.
   */
  async getUnreconciledReceipts(): Promise<Receipt[]> {
    const rows = await this.gateway.query(
      `SELECT * FROM ${this.table} WHERE STATUS = :status ORDER BY ID`,
      { status: UNRECONCILED_STATUS }
    );

    if (rows === null) {
      console.error('✗ Error extracting receipts: query failed');
      return [];
    }

    if (rows.length === 0) {
      console.log('ℹ No unreconciled receipts found');
      return [];
    }

    const receipts = this.toReceipts(rows);
    console.log(`✓ Extracted ${receipts.length} unreconciled receipts`);
    return receipts;
  }

  async getReceiptById(id: number): Promise<Receipt | null> {
    const rows = await this.gateway.query(`SELECT * FROM ${this.table} WHERE ID = :id`, { id });
    if (!rows || rows.length === 0) {
      return null;
    }
    return this.toReceipts(rows)[0] ?? null;
  }

  private toReceipts(rows: Row[]): Receipt[] {
    const receipts: Receipt[] = [];
    for (const row of rows) {
      try {
        receipts.push(receiptFromRow(row));
      } catch (error) {
        if (!(error instanceof ReceiptParseError)) throw error;
        console.warn(`⚠ Skipping unreadable receipt row: ${error.message}`);
      }
    }
    return receipts;
  }
}
