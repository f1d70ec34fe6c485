/**
 * Reconciliation configuration errors
 */

export type ConfigErrorCode = 'THRESHOLD_ORDER' | 'INVALID_CONFIG' | 'INVALID_LIMIT';

export class ConfigError extends Error {
  code: ConfigErrorCode;

  constructor(message: string, code: ConfigErrorCode = 'INVALID_CONFIG') {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
  }
}
