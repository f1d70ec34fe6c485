/**
 * Gateway Connection Configuration
 * Named parameters win; anything left out is filled from the environment.
 */

import { z } from 'zod';
import { GatewayType } from './interfaces';

export class GatewayConfigError extends Error {
  code: string;

  constructor(message: string, code: string = 'GATEWAY_MISCONFIGURED') {
    super(message);
    this.name = 'GatewayConfigError';
    this.code = code;
  }
}

/**
 * Connection parameters a caller may pass by name.
 * Each backend reads the subset it understands.
 */
export interface ConnectionParams {
  host?: string;
  port?: number;
  database?: string;
  sid?: string;
  user?: string;
  password?: string;
}

export interface SqliteConnectionConfig {
  database: string;
}

export interface ServerConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface OracleConnectionConfig {
  host: string;
  port: number;
  sid: string;
  user: string;
  password: string;
}

type Env = Record<string, string | undefined>;

const port = z.coerce.number().int().min(1).max(65535);

const OracleEnvSchema = z.object({
  ORACLE_HOST: z.string().default('localhost'),
  ORACLE_PORT: port.default(1521),
  ORACLE_SID: z.string().default(''),
  ORACLE_USER: z.string().default(''),
  ORACLE_PASSWORD: z.string().default(''),
});

const MysqlEnvSchema = z.object({
  MYSQL_HOST: z.string().default('localhost'),
  MYSQL_PORT: port.default(3306),
  MYSQL_DATABASE: z.string().default(''),
  MYSQL_USER: z.string().default('root'),
  MYSQL_PASSWORD: z.string().default(''),
});

const PostgresEnvSchema = z.object({
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: port.default(5432),
  POSTGRES_DATABASE: z.string().default('postgres'),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().default(''),
});

const SqliteEnvSchema = z.object({
  SQLITE_DATABASE: z.string().default(':memory:'),
});

/**
 * Empty values count as unset, so `PORT=` in an env file falls back to the default
 */
function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env, type: GatewayType): z.infer<T> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const result = schema.safeParse(present);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new GatewayConfigError(`Invalid ${type} environment configuration: ${detail}`);
  }
  return result.data;
}

export function resolveSqliteConfig(params: ConnectionParams = {}, env: Env = process.env): SqliteConnectionConfig {
  const defaults = parseEnv(SqliteEnvSchema, env, 'sqlite');
  return { database: params.database || defaults.SQLITE_DATABASE };
}

export function resolvePostgresConfig(params: ConnectionParams = {}, env: Env = process.env): ServerConnectionConfig {
  const defaults = parseEnv(PostgresEnvSchema, env, 'postgres');
  return {
    host: params.host || defaults.POSTGRES_HOST,
    port: params.port || defaults.POSTGRES_PORT,
    database: params.database || defaults.POSTGRES_DATABASE,
    user: params.user || defaults.POSTGRES_USER,
    password: params.password || defaults.POSTGRES_PASSWORD,
  };
}

export function resolveMysqlConfig(params: ConnectionParams = {}, env: Env = process.env): ServerConnectionConfig {
  const defaults = parseEnv(MysqlEnvSchema, env, 'mysql');
  return {
    host: params.host || defaults.MYSQL_HOST,
    port: params.port || defaults.MYSQL_PORT,
    database: params.database || defaults.MYSQL_DATABASE,
    user: params.user || defaults.MYSQL_USER,
    password: params.password || defaults.MYSQL_PASSWORD,
  };
}

export function resolveOracleConfig(params: ConnectionParams = {}, env: Env = process.env): OracleConnectionConfig {
  const defaults = parseEnv(OracleEnvSchema, env, 'oracle');
  return {
    host: params.host || defaults.ORACLE_HOST,
    port: params.port || defaults.ORACLE_PORT,
    sid: params.sid || defaults.ORACLE_SID,
    user: params.user || defaults.ORACLE_USER,
    password: params.password || defaults.ORACLE_PASSWORD,
  };
}
