/**
 * Types command - list the database type tags the gateway factory accepts
 */

import { supportedGatewayTypes } from 'tally-storage';

export function typesCommand(): string[] {
  const types = supportedGatewayTypes();
  console.log('Supported database types:');
  for (const type of types) {
    console.log(`  ${type}`);
  }
  return types;
}
