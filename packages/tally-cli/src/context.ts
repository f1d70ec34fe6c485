/**
 * Everything a command needs from the outside world.
 * Tests pass their own; the CLI builds one from process.env.
 */

import { ModelBusAdapter, OpenAIAdapter } from 'tally-model-bus';
import { ReconciliationConfig } from 'tally-reconciler';
import { RecordGateway, createGateway } from 'tally-storage';

export type Env = Record<string, string | undefined>;

export interface CliContext {
  env: Env;
  /** Gateway for a type tag; not yet connected */
  openGateway(type: string): RecordGateway;
  createAdapter(config: Readonly<ReconciliationConfig>): ModelBusAdapter;
}

export function defaultContext(env: Env = process.env): CliContext {
  return {
    env,
    openGateway: (type) => createGateway(type, 'cli', {}, env),
    createAdapter: (config) => new OpenAIAdapter({ api_key: config.openaiApiKey || undefined }, env),
  };
}
