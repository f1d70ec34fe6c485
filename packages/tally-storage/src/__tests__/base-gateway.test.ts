/**
 * BaseGateway connect discipline over a counting in-process driver
 */

import { BaseGateway } from '../base-gateway';
import { Row } from '../interfaces';
import { BoundStatement } from '../sql';

class CountingGateway extends BaseGateway<{ database: string }> {
  readonly type = 'sqlite' as const;
  protected readonly placeholderStyle = 'question' as const;

  opened = 0;
  closed = 0;
  pingFails = false;
  closeFails = false;
  private handle = false;

  constructor() {
    super('counting', { database: 'counting.db' });
  }

  protected async open(): Promise<void> {
    this.opened++;
    this.handle = true;
  }

  protected async close(): Promise<void> {
    this.closed++;
    this.handle = false;
    if (this.closeFails) {
      throw new Error('already gone');
    }
  }

  protected hasHandle(): boolean {
    return this.handle;
  }

  protected async ping(): Promise<void> {
    if (this.pingFails) {
      throw new Error('server went away');
    }
  }

  protected async select(_statement: BoundStatement): Promise<Row[]> {
    return [];
  }

  protected async execute(_statement: BoundStatement): Promise<void> {}

  protected target(): string {
    return this.config.database;
  }

  nowExpression(): string {
    return 'CURRENT_TIMESTAMP';
  }
}

describe('BaseGateway.connect', () => {
  let gateway: CountingGateway;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    gateway = new CountingGateway();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reuses a live handle', async () => {
    expect(await gateway.connect()).toBe(true);
    expect(await gateway.connect()).toBe(true);

    expect(gateway.opened).toBe(1);
    expect(gateway.closed).toBe(0);
  });

  it('closes a dead handle before opening a new one', async () => {
    await gateway.connect();
    gateway.pingFails = true;

    expect(await gateway.connect()).toBe(true);

    expect(gateway.opened).toBe(2);
    expect(gateway.closed).toBe(1);
  });

  it('still reopens when closing the dead handle fails', async () => {
    await gateway.connect();
    gateway.pingFails = true;
    gateway.closeFails = true;

    expect(await gateway.connect()).toBe(true);

    expect(gateway.opened).toBe(2);
    expect(console.warn).toHaveBeenCalledWith(
      '⚠ Could not close stale SQLite connection (counting): already gone'
    );
  });

  it('opens without closing when no handle is held', async () => {
    expect(await gateway.connect()).toBe(true);
    await gateway.disconnect();
    expect(await gateway.connect()).toBe(true);

    expect(gateway.opened).toBe(2);
    expect(gateway.closed).toBe(1);
  });
});
