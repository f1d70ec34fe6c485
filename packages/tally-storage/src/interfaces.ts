/**
 * Record Store Gateway Interfaces
 *
 * One capability surface over every backing store the reconciler can read from:
 * - query() returns rows or null (null = failure, [] = no rows)
 * - update() commits on success and rolls back on failure
 * - nothing raises past this boundary; failures are booleans/nulls
 */

export type GatewayType = 'sqlite' | 'postgres' | 'mysql' | 'oracle';

/** Values a statement can bind. Dates are passed through to drivers that take them. */
export type SqlValue = string | number | Date | null;

/** Named parameters, referenced as :name in statement text */
export type SqlParams = Readonly<Record<string, SqlValue | undefined>>;

/** A result row keyed by column name, as the driver reported it */
export type Row = Record<string, unknown>;

export interface GatewayInfo {
  name: string;
  type: GatewayType;
  connected: boolean;
  /** Connection parameters with the password removed */
  config: Record<string, unknown>;
}

/**
 * RecordGateway - uniform query/update capability over one backing store
 */
export interface RecordGateway {
  readonly name: string;
  readonly type: GatewayType;

  /**
   * Open the connection. Returns false (never throws) when it cannot be opened.
   */
  connect(): Promise<boolean>;

  /**
   * Close the connection if open
   */
  disconnect(): Promise<void>;

  /**
   * Whether the connection is open and answering
   */
  isConnected(): Promise<boolean>;

  /**
   * Run a SELECT. Returns null on failure, which callers must treat
   * differently from an empty result.
   */
  query(sql: string, params?: SqlParams): Promise<Row[] | null>;

  /**
   * Run an INSERT/UPDATE/DELETE in its own transaction.
   * Returns true once committed; false after a rollback.
   */
  update(sql: string, params?: SqlParams): Promise<boolean>;

  /**
   * Current-timestamp expression in this store's SQL dialect
   */
  nowExpression(): string;

  info(): GatewayInfo;
}
