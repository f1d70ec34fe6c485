/**
 * BaseGateway - shared connect/query/update discipline for every backend
 *
 * Backends only supply the driver calls. This class owns:
 * - "not connected" short-circuits
 * - parameter binding into the backend's placeholder style
 * - turning driver exceptions into false/null and logging them
 */

import { GatewayInfo, GatewayType, RecordGateway, Row, SqlParams } from './interfaces';
import { BoundStatement, PlaceholderStyle, bindNamedParameters } from './sql';

const LABELS: Record<GatewayType, string> = {
  sqlite: 'SQLite',
  postgres: 'PostgreSQL',
  mysql: 'MySQL',
  oracle: 'Oracle',
};

export abstract class BaseGateway<TConfig extends object> implements RecordGateway {
  abstract readonly type: GatewayType;
  protected abstract readonly placeholderStyle: PlaceholderStyle;

  readonly name: string;
  protected readonly config: TConfig;

  constructor(name: string, config: TConfig) {
    this.name = name;
    this.config = config;
  }

  /** Open the driver connection; throw on failure */
  protected abstract open(): Promise<void>;
  /** Close the driver connection and drop the handle */
  protected abstract close(): Promise<void>;
  /** Whether a driver handle is currently held */
  protected abstract hasHandle(): boolean;
  /** Round-trip to the server; throw if it does not answer */
  protected abstract ping(): Promise<void>;
  protected abstract select(statement: BoundStatement): Promise<Row[]>;
  /** Execute and commit, rolling back before rethrowing on failure */
  protected abstract execute(statement: BoundStatement): Promise<void>;
  /** Human-readable target, e.g. host:port/db */
  protected abstract target(): string;

  abstract nowExpression(): string;

  protected get label(): string {
    return LABELS[this.type];
  }

  async connect(): Promise<boolean> {
    if (this.hasHandle()) {
      if (await this.isConnected()) {
        return true;
      }
      // Stale handle: release it before opening a new one
      try {
        await this.close();
      } catch (error) {
        console.warn(`⚠ Could not close stale ${this.label} connection (${this.name}): ${errorMessage(error)}`);
      }
    }

    try {
      await this.open();
      console.log(`✓ Connected to ${this.label} database '${this.name}': ${this.target()}`);
      return true;
    } catch (error) {
      console.error(`✗ ${this.label} connection error (${this.name}): ${errorMessage(error)}`);
      return false;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.hasHandle()) return;

    try {
      await this.close();
      console.log(`✓ ${this.label} connection '${this.name}' closed`);
    } catch (error) {
      console.error(`✗ Error closing ${this.label} connection (${this.name}): ${errorMessage(error)}`);
    }
  }

  async isConnected(): Promise<boolean> {
    if (!this.hasHandle()) return false;

    try {
      await this.ping();
      return true;
    } catch {
      return false;
    }
  }

  async query(sql: string, params?: SqlParams): Promise<Row[] | null> {
    if (!(await this.isConnected())) {
      console.error(`✗ Not connected to ${this.label} database '${this.name}'. Please connect first.`);
      return null;
    }

    try {
      const statement = bindNamedParameters(sql, params, this.placeholderStyle);
      return await this.select(statement);
    } catch (error) {
      console.error(`✗ ${this.label} query error (${this.name}): ${errorMessage(error)}`);
      return null;
    }
  }

  async update(sql: string, params?: SqlParams): Promise<boolean> {
    if (!(await this.isConnected())) {
      console.error(`✗ Not connected to ${this.label} database '${this.name}'. Please connect first.`);
      return false;
    }

    try {
      const statement = bindNamedParameters(sql, params, this.placeholderStyle);
      await this.execute(statement);
      return true;
    } catch (error) {
      console.error(`✗ ${this.label} update error (${this.name}): ${errorMessage(error)}`);
      return false;
    }
  }

  info(): GatewayInfo {
    const config: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.config)) {
      if (key !== 'password') {
        config[key] = value;
      }
    }

    return {
      name: this.name,
      type: this.type,
      connected: this.hasHandle(),
      config,
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
