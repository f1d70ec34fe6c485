/**
 * ConnectionManager - named gateways, created through the factory
 */

import { ConnectionParams } from './config';
import { createGateway } from './factory';
import { GatewayInfo, RecordGateway } from './interfaces';
import { errorMessage } from './base-gateway';

export class ConnectionManager {
  private connections: Map<string, RecordGateway> = new Map();
  private env: Record<string, string | undefined>;

  constructor(env: Record<string, string | undefined> = process.env) {
    this.env = env;
  }

  /**
   * Register a new named gateway. Returns false if the name is taken
   * or the type tag is not supported.
   */
  add(name: string, type: string, params: ConnectionParams = {}): boolean {
    if (this.connections.has(name)) {
      console.error(`✗ Connection '${name}' already exists. Remove it first.`);
      return false;
    }

    try {
      this.connections.set(name, createGateway(type, name, params, this.env));
      return true;
    } catch (error) {
      console.error(`✗ Error creating ${type} connection: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Register an already-built gateway under its own name
   */
  register(gateway: RecordGateway): boolean {
    if (this.connections.has(gateway.name)) {
      console.error(`✗ Connection '${gateway.name}' already exists. Remove it first.`);
      return false;
    }
    this.connections.set(gateway.name, gateway);
    return true;
  }

  get(name: string): RecordGateway | undefined {
    return this.connections.get(name);
  }

  async connect(name: string): Promise<boolean> {
    const gateway = this.connections.get(name);
    if (!gateway) {
      console.error(`✗ Connection '${name}' not found.`);
      return false;
    }
    return gateway.connect();
  }

  async disconnect(name: string): Promise<void> {
    await this.connections.get(name)?.disconnect();
  }

  async disconnectAll(): Promise<void> {
    for (const gateway of this.connections.values()) {
      await gateway.disconnect();
    }
  }

  async remove(name: string): Promise<boolean> {
    const gateway = this.connections.get(name);
    if (!gateway) {
      console.error(`✗ Connection '${name}' not found`);
      return false;
    }

    await gateway.disconnect();
    this.connections.delete(name);
    console.log(`✓ Connection '${name}' removed`);
    return true;
  }

  list(): GatewayInfo[] {
    return Array.from(this.connections.values()).map((gateway) => gateway.info());
  }
}
