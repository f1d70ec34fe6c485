/**
 * MySQLGateway - mysql2 backend
 */

import { Connection, RowDataPacket, createConnection } from 'mysql2/promise';
import { BaseGateway, errorMessage } from '../base-gateway';
import { ServerConnectionConfig } from '../config';
import { Row } from '../interfaces';
import { BoundStatement } from '../sql';

export class MySQLGateway extends BaseGateway<ServerConnectionConfig> {
  readonly type = 'mysql' as const;
  protected readonly placeholderStyle = 'question' as const;

  private connection: Connection | null = null;

  constructor(name: string, config: ServerConnectionConfig) {
    super(name, config);
  }

  protected async open(): Promise<void> {
    this.connection = await createConnection({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database || undefined,
      user: this.config.user,
      password: this.config.password,
    });
  }

  protected async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    await connection?.end();
  }

  protected hasHandle(): boolean {
    return this.connection !== null;
  }

  protected async ping(): Promise<void> {
    await this.requireConnection().ping();
  }

  protected async select(statement: BoundStatement): Promise<Row[]> {
    const [rows] = await this.requireConnection().query<RowDataPacket[]>(statement.text, statement.values);
    return rows.map((row) => ({ ...row }));
  }

  protected async execute(statement: BoundStatement): Promise<void> {
    const connection = this.requireConnection();
    await connection.beginTransaction();
    try {
      await connection.query(statement.text, statement.values);
      await connection.commit();
    } catch (error) {
      try {
        await connection.rollback();
      } catch (rollbackError) {
        console.error(`✗ MySQL rollback failed (${this.name}): ${errorMessage(rollbackError)}`);
      }
      throw error;
    }
  }

  protected target(): string {
    return `${this.config.host}:${this.config.port}/${this.config.database}`;
  }

  nowExpression(): string {
    return 'NOW()';
  }

  private requireConnection(): Connection {
    if (!this.connection) throw new Error('MySQL connection not open');
    return this.connection;
  }
}
