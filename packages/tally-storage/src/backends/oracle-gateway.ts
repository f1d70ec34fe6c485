/**
 * OracleGateway - oracledb backend (thin mode, no client libraries needed)
 *
 * Oracle takes :name binds natively, so statements pass through unchanged.
 * Column names come back upper-case.
 */

import * as oracledb from 'oracledb';
import { BaseGateway, errorMessage } from '../base-gateway';
import { OracleConnectionConfig } from '../config';
import { Row } from '../interfaces';
import { BoundStatement } from '../sql';

export class OracleGateway extends BaseGateway<OracleConnectionConfig> {
  readonly type = 'oracle' as const;
  protected readonly placeholderStyle = 'named' as const;

  private connection: oracledb.Connection | null = null;

  constructor(name: string, config: OracleConnectionConfig) {
    super(name, config);
  }

  protected async open(): Promise<void> {
    this.connection = await oracledb.getConnection({
      user: this.config.user,
      password: this.config.password,
      connectString: this.connectString(),
    });
  }

  protected async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    await connection?.close();
  }

  protected hasHandle(): boolean {
    return this.connection !== null;
  }

  protected async ping(): Promise<void> {
    await this.requireConnection().ping();
  }

  protected async select(statement: BoundStatement): Promise<Row[]> {
    const result = await this.requireConnection().execute<Row>(statement.text, statement.named, {
      outFormat: oracledb.OUT_FORMAT_OBJECT,
    });
    return result.rows ?? [];
  }

  protected async execute(statement: BoundStatement): Promise<void> {
    const connection = this.requireConnection();
    try {
      await connection.execute(statement.text, statement.named, { autoCommit: false });
      await connection.commit();
    } catch (error) {
      try {
        await connection.rollback();
      } catch (rollbackError) {
        console.error(`✗ Oracle rollback failed (${this.name}): ${errorMessage(rollbackError)}`);
      }
      throw error;
    }
  }

  protected target(): string {
    return `${this.config.host}:${this.config.port}/${this.config.sid}`;
  }

  nowExpression(): string {
    return 'SYSTIMESTAMP';
  }

  /**
   * SID-style descriptor; EZConnect strings only address service names
   */
  private connectString(): string {
    return (
      `(DESCRIPTION=(ADDRESS=(PROTOCOL=TCP)(HOST=${this.config.host})(PORT=${this.config.port}))` +
      `(CONNECT_DATA=(SID=${this.config.sid})))`
    );
  }

  private requireConnection(): oracledb.Connection {
    if (!this.connection) throw new Error('Oracle connection not open');
    return this.connection;
  }
}
