/**
 * PostgreSQLGateway - pg backend
 *
 * One Client per gateway (single writer, no pool).
 * Updates run between BEGIN and COMMIT; any error issues ROLLBACK.
 */

import { Client } from 'pg';
import { BaseGateway, errorMessage } from '../base-gateway';
import { ServerConnectionConfig } from '../config';
import { Row } from '../interfaces';
import { BoundStatement } from '../sql';

export class PostgreSQLGateway extends BaseGateway<ServerConnectionConfig> {
  readonly type = 'postgres' as const;
  protected readonly placeholderStyle = 'dollar' as const;

  private client: Client | null = null;

  constructor(name: string, config: ServerConnectionConfig) {
    super(name, config);
  }

  protected async open(): Promise<void> {
    // A pg Client cannot be reused after end(), so every connect builds a new one
    const client = new Client({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
    });

    client.on('error', (err) => {
      console.error(`Unexpected PostgreSQL client error (${this.name}):`, err.message);
      if (this.client === client) {
        this.client = null;
      }
      client.end().catch((endError: unknown) => {
        console.warn(`⚠ Could not end broken PostgreSQL client (${this.name}): ${errorMessage(endError)}`);
      });
    });

    await client.connect();
    this.client = client;
  }

  protected async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    await client?.end();
  }

  protected hasHandle(): boolean {
    return this.client !== null;
  }

  protected async ping(): Promise<void> {
    await this.requireClient().query('SELECT 1');
  }

  protected async select(statement: BoundStatement): Promise<Row[]> {
    const result = await this.requireClient().query<Row>(statement.text, statement.values);
    return result.rows;
  }

  protected async execute(statement: BoundStatement): Promise<void> {
    const client = this.requireClient();
    await client.query('BEGIN');
    try {
      await client.query(statement.text, statement.values);
      await client.query('COMMIT');
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error(`✗ PostgreSQL rollback failed (${this.name}): ${errorMessage(rollbackError)}`);
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

  private requireClient(): Client {
    if (!this.client) throw new Error('PostgreSQL client not connected');
    return this.client;
  }
}
