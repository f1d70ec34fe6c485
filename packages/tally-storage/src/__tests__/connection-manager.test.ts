/**
 * ConnectionManager - named gateways
 */

import { ConnectionManager } from '../connection-manager';

describe('ConnectionManager', () => {
  let manager: ConnectionManager;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    manager = new ConnectionManager({});
  });

  afterEach(async () => {
    await manager.disconnectAll();
    jest.restoreAllMocks();
  });

  it('registers a gateway once per name', () => {
    expect(manager.add('local', 'sqlite', { database: ':memory:' })).toBe(true);
    expect(manager.add('local', 'sqlite')).toBe(false);
    expect(manager.get('local')?.type).toBe('sqlite');
  });

  it('refuses an unsupported type', () => {
    expect(manager.add('legacy', 'db2')).toBe(false);
    expect(manager.get('legacy')).toBeUndefined();
  });

  it('connects, lists and removes by name', async () => {
    manager.add('local', 'sqlite');
    expect(await manager.connect('local')).toBe(true);
    expect(manager.list()).toEqual([
      { name: 'local', type: 'sqlite', connected: true, config: { database: ':memory:' } },
    ]);

    expect(await manager.remove('local')).toBe(true);
    expect(manager.list()).toEqual([]);
  });

  it('reports unknown names', async () => {
    expect(await manager.connect('missing')).toBe(false);
    expect(await manager.remove('missing')).toBe(false);
  });
});
