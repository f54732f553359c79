import { execFile } from 'child_process';
import { createConnection } from 'net';
import { NoPortsAvailableError, errorCode } from '../errors.js';
import type { PortAssignment, PortVariable, Registry } from '../types.js';

const MAX_PORT = 65535;
export const DEFAULT_MAX_ATTEMPTS = 10_000;

/** Resolves true when something is listening on the port. */
export type ListenerCheck = (port: number) => Promise<boolean>;

/**
 * Maps a service's default port to the start of its "hundred block":
 * 80 -> 8000, 100 -> 10000, 5173 -> 5100, 3306 -> 3300, 65535 -> 65500.
 * Depends on the digit count; five-digit defaults round down to the hundred.
 */
export function canonicalizePort(defaultPort: number): number {
  const digits = String(defaultPort);

  if (digits.length >= 4 && digits.endsWith('00')) {
    return defaultPort;
  }

  switch (digits.length) {
    case 1:
      return Number(`${digits}000`);
    case 2:
    case 3:
      return Number(`${digits}00`);
    case 4:
      return Number(`${digits.slice(0, 2)}00`);
    default:
      return Math.floor(defaultPort / 100) * 100;
  }
}

export function canConnect(port: number, host = 'localhost', timeoutMs = 300): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ port, host });
    const finish = (connected: boolean) => {
      socket.destroy();
      resolve(connected);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

/** `lsof -i :PORT -sTCP:LISTEN`; reports no listener when lsof is not installed. */
export function hasListeningSocket(port: number, timeoutMs = 2000): Promise<boolean> {
  return new Promise((resolve, reject) => {
    execFile('lsof', ['-i', `:${port}`, '-sTCP:LISTEN'], { timeout: timeoutMs }, (error) => {
      if (!error) {
        resolve(true);
        return;
      }
      if (errorCode(error) === 'ENOENT' || typeof error.code === 'number' || error.killed) {
        // Non-zero exit means no match; a killed lsof is treated the same way.
        resolve(false);
        return;
      }
      reject(error);
    });
  });
}

export interface PortProberOptions {
  host?: string;
  connectTimeoutMs?: number;
  checks?: ListenerCheck[];
}

export class PortProber {
  private checks: ListenerCheck[];

  constructor(options: PortProberOptions = {}) {
    const host = options.host ?? 'localhost';
    const connectTimeoutMs = options.connectTimeoutMs ?? 300;

    this.checks = options.checks ?? [
      (port) => canConnect(port, host, connectTimeoutMs),
      (port) => hasListeningSocket(port),
    ];
  }

  isRegistered(port: number, registry: Registry): boolean {
    for (const record of registry.values()) {
      if (Object.values(record.ports).includes(port)) {
        return true;
      }
    }
    return false;
  }

  async isAvailable(port: number, registry: Registry): Promise<boolean> {
    if (this.isRegistered(port, registry)) {
      return false;
    }

    for (const check of this.checks) {
      if (await check(port)) {
        return false;
      }
    }

    return true;
  }
}

export interface FindPortOptions {
  variable?: string;
  maxAttempts?: number;
}

export async function findAvailablePort(
  startPort: number,
  registry: Registry,
  prober: PortProber,
  options: FindPortOptions = {}
): Promise<number> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  let attempts = 0;

  for (let port = startPort; port <= MAX_PORT && attempts < maxAttempts; port++) {
    attempts++;
    if (await prober.isAvailable(port, registry)) {
      return port;
    }
  }

  throw new NoPortsAvailableError(options.variable ?? 'port', startPort, Math.max(startPort, startPort + attempts - 1), attempts);
}

/**
 * Assigns every variable in order. Ports handed out earlier in the same call
 * count as registered for later variables of the same project.
 */
export async function assignPorts(
  projectName: string,
  variables: PortVariable[],
  registry: Registry,
  prober: PortProber,
  options: Omit<FindPortOptions, 'variable'> = {}
): Promise<PortAssignment[]> {
  const ports: Record<string, number> = {};
  const working: Registry = new Map(registry);
  working.set(projectName, { name: projectName, ports });

  const assignments: PortAssignment[] = [];
  for (const variable of variables) {
    const startPort = canonicalizePort(variable.defaultPort);
    const port = await findAvailablePort(startPort, working, prober, {
      ...options,
      variable: variable.name,
    });
    ports[variable.name] = port;
    assignments.push({ ...variable, startPort, port });
  }

  return assignments;
}
