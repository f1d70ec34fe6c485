/**
 * Tally Storage
 *
 * Record store gateway over the relational stores receipts live in.
 *
 * Backends:
 * - sqlite (better-sqlite3)
 * - postgres (pg)
 * - mysql (mysql2)
 * - oracle (oracledb, thin mode)
 */

export * from './interfaces';
export * from './config';
export * from './sql';
export { BaseGateway, errorMessage } from './base-gateway';
export * from './backends';
export { createGateway, normalizeGatewayType, supportedGatewayTypes } from './factory';
export { ConnectionManager } from './connection-manager';
