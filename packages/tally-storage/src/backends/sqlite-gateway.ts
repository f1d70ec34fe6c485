/**
 * SQLiteGateway - better-sqlite3 backend
 *
 * Synchronous driver wrapped in the async gateway surface.
 * Each update runs inside db.transaction(), which rolls back on throw.
 */

import Database from 'better-sqlite3';
import { BaseGateway } from '../base-gateway';
import { SqliteConnectionConfig } from '../config';
import { Row, SqlValue } from '../interfaces';
import { BoundStatement } from '../sql';

type SqliteValue = string | number | null;

export class SQLiteGateway extends BaseGateway<SqliteConnectionConfig> {
  readonly type = 'sqlite' as const;
  protected readonly placeholderStyle = 'question' as const;

  private db: Database.Database | null = null;

  constructor(name: string, config: SqliteConnectionConfig) {
    super(name, config);
  }

  protected async open(): Promise<void> {
    this.db = new Database(this.config.database);
  }

  protected async close(): Promise<void> {
    const db = this.db;
    this.db = null;
    db?.close();
  }

  protected hasHandle(): boolean {
    return this.db !== null && this.db.open;
  }

  protected async ping(): Promise<void> {
    this.requireDb().prepare('SELECT 1').get();
  }

  protected async select(statement: BoundStatement): Promise<Row[]> {
    return this.requireDb()
      .prepare<SqliteValue[], Row>(statement.text)
      .all(...statement.values.map(toSqliteValue));
  }

  protected async execute(statement: BoundStatement): Promise<void> {
    const db = this.requireDb();
    const stmt = db.prepare<SqliteValue[]>(statement.text);
    db.transaction(() => {
      stmt.run(...statement.values.map(toSqliteValue));
    })();
  }

  protected target(): string {
    return this.config.database;
  }

  nowExpression(): string {
    return 'CURRENT_TIMESTAMP';
  }

  /**
   * Raw handle for schema setup in tests and local tooling
   */
  exec(sql: string): void {
    this.requireDb().exec(sql);
  }

  private requireDb(): Database.Database {
    if (!this.db) throw new Error('Database not initialized');
    return this.db;
  }
}

function toSqliteValue(value: SqlValue): SqliteValue {
  return value instanceof Date ? value.toISOString() : value;
}
