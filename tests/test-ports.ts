import { afterEach, describe, expect, it } from 'vitest';
import { createServer, type Server } from 'net';
import { NoPortsAvailableError } from '../src/errors.js';
import {
  PortProber,
  assignPorts,
  canConnect,
  canonicalizePort,
  findAvailablePort,
} from '../src/orchestrator/ports.js';
import type { ProjectRecord, Registry } from '../src/types.js';

// Only the registry decides in these tests; nothing probes the machine.
const registryOnly = new PortProber({ checks: [] });

function listen(): Promise<{ server: Server; port: number }> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('expected a TCP address'));
        return;
      }
      resolve({ server, port: address.port });
    });
  });
}

describe('canonicalizePort', () => {
  it.each([
    [80, 8000],
    [100, 10000],
    [443, 44300],
    [5, 5000],
    [5173, 5100],
    [3306, 3300],
    [6379, 6300],
    [8000, 8000],
    [11211, 11200],
    [33060, 33000],
    [65535, 65500],
  ])('%i -> %i', (defaultPort, expected) => {
    expect(canonicalizePort(defaultPort)).toBe(expected);
  });
});

describe('findAvailablePort', () => {
  it('returns the start port when nothing holds it', async () => {
    expect(await findAvailablePort(8000, new Map(), registryOnly)).toBe(8000);
  });

  it('skips ports held by any registered project', async () => {
    const registry: Registry = new Map<string, ProjectRecord>([
      ['shop', { name: 'shop', ports: { APP_PORT: 8000 } }],
      ['blog', { name: 'blog', ports: { APP_PORT: 8001, VITE_PORT: 5100 } }],
    ]);
    expect(await findAvailablePort(8000, registry, registryOnly)).toBe(8002);
    expect(await findAvailablePort(5100, registry, registryOnly)).toBe(5101);
  });

  it('consults every listener check', async () => {
    const busy = new Set([3300, 3301]);
    const prober = new PortProber({ checks: [async () => false, async (port) => busy.has(port)] });
    expect(await findAvailablePort(3300, new Map(), prober)).toBe(3302);
  });

  it('stops at 65535', async () => {
    const registry: Registry = new Map<string, ProjectRecord>([['a', { name: 'a', ports: { X_PORT: 65534, Y_PORT: 65535 } }]]);

    await expect(findAvailablePort(65534, registry, registryOnly, { variable: 'X_PORT' })).rejects.toMatchObject({
      from: 65534,
      to: 65535,
    });
  });

  it('counts only the ports it tried', async () => {
    const registry: Registry = new Map<string, ProjectRecord>([['a', { name: 'a', ports: { X_PORT: 65534, Y_PORT: 65535 } }]]);

    await expect(findAvailablePort(65534, registry, registryOnly, { variable: 'X_PORT' })).rejects.toThrow(
      'No available ports found for X_PORT\nSearched range: 65534-65535 (2 attempts)'
    );
  });

  it('reports a start port above 65535 without searching', async () => {
    const prober = new PortProber({ checks: [async () => false] });

    await expect(findAvailablePort(canonicalizePort(999), new Map(), prober, { variable: 'ODD_PORT' })).rejects.toThrow(
      'No available ports found for ODD_PORT\nStart port 99900 is above 65535'
    );
  });

  it('gives up after maxAttempts', async () => {
    const prober = new PortProber({ checks: [async () => true] });
    const search = findAvailablePort(9000, new Map(), prober, { variable: 'APP_PORT', maxAttempts: 3 });

    await expect(search).rejects.toThrow(NoPortsAvailableError);
    await expect(search).rejects.toThrow('No available ports found for APP_PORT\nSearched range: 9000-9002 (3 attempts)');
  });
});

describe('assignPorts', () => {
  it('does not hand out the same port twice within one project', async () => {
    const assignments = await assignPorts(
      'shop',
      [
        { name: 'APP_PORT', defaultPort: 80 },
        { name: 'HTTP_PORT', defaultPort: 8080 },
      ],
      new Map(),
      registryOnly
    );

    expect(assignments).toEqual([
      { name: 'APP_PORT', defaultPort: 80, startPort: 8000, port: 8000 },
      { name: 'HTTP_PORT', defaultPort: 8080, startPort: 8000, port: 8001 },
    ]);
  });

  it('is deterministic for the same registry', async () => {
    const registry: Registry = new Map<string, ProjectRecord>([['blog', { name: 'blog', ports: { APP_PORT: 8000 } }]]);
    const variables = [{ name: 'APP_PORT', defaultPort: 80 }];

    const first = await assignPorts('shop', variables, registry, registryOnly);
    const second = await assignPorts('shop', variables, registry, registryOnly);
    expect(first).toEqual(second);
    expect(first[0]?.port).toBe(8001);
  });

  it('leaves the passed registry untouched', async () => {
    const registry: Registry = new Map();
    await assignPorts('shop', [{ name: 'APP_PORT', defaultPort: 80 }], registry, registryOnly);
    expect(registry.size).toBe(0);
  });
});

describe('live probing', () => {
  let server: Server | undefined;

  afterEach(async () => {
    await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
    server = undefined;
  });

  it('sees a listening socket and skips its port', async () => {
    const listening = await listen();
    server = listening.server;

    expect(await canConnect(listening.port, '127.0.0.1')).toBe(true);

    const prober = new PortProber({ checks: [(port) => canConnect(port, '127.0.0.1')] });
    expect(await prober.isAvailable(listening.port, new Map())).toBe(false);
  });

  it('reports a closed port as free', async () => {
    const listening = await listen();
    await new Promise<void>((resolve) => listening.server.close(() => resolve()));

    expect(await canConnect(listening.port, '127.0.0.1')).toBe(false);
  });
});
