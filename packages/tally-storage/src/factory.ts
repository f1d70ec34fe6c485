import { ConnectionParams, GatewayConfigError, resolveMysqlConfig, resolveOracleConfig, resolvePostgresConfig, resolveSqliteConfig } from './config';
import { GatewayType, RecordGateway } from './interfaces';
import { MySQLGateway, OracleGateway, PostgreSQLGateway, SQLiteGateway } from './backends';

/**
 * Accepted type tags (case-insensitive) and the backend each selects
 */
const TYPE_TAGS: Readonly<Record<string, GatewayType>> = {
  oracle: 'oracle',
  mysql: 'mysql',
  sqlite: 'sqlite',
  sqlite3: 'sqlite',
  postgres: 'postgres',
  postgresql: 'postgres',
};

export function supportedGatewayTypes(): string[] {
  return Object.keys(TYPE_TAGS);
}

/**
 * Resolve a type tag to its backend.
 * Fail-closed: throws GatewayConfigError for anything unrecognised.
 */
export function normalizeGatewayType(tag: string): GatewayType {
  const type = TYPE_TAGS[tag.trim().toLowerCase()];
  if (!type) {
    throw new GatewayConfigError(
      `Unsupported database type: ${tag}. Supported types: ${supportedGatewayTypes().join(', ')}`,
      'UNSUPPORTED_GATEWAY'
    );
  }
  return type;
}

/**
 * Create a gateway for a type tag.
 * Parameters left out of `params` default from the environment.
 */
export function createGateway(
  tag: string,
  name: string = 'default',
  params: ConnectionParams = {},
  env: Record<string, string | undefined> = process.env
): RecordGateway {
  const type = normalizeGatewayType(tag);

  switch (type) {
    case 'sqlite':
      return new SQLiteGateway(name, resolveSqliteConfig(params, env));
    case 'postgres':
      return new PostgreSQLGateway(name, resolvePostgresConfig(params, env));
    case 'mysql':
      return new MySQLGateway(name, resolveMysqlConfig(params, env));
    case 'oracle':
      return new OracleGateway(name, resolveOracleConfig(params, env));
    default: {
      const _exhaustive: never = type;
      throw new Error(`Unexpected gateway type: ${_exhaustive}`);
    }
  }
}
