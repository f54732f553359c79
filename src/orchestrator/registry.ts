import { readFile, writeFile, mkdir, rename, rm } from 'fs/promises';
import { dirname } from 'path';
import { randomBytes } from 'crypto';
import { CorruptRegistryError, RegistryWriteError, ShipyardError, ExitCode, errorCode } from '../errors.js';
import { PROXY_SERVICES, type ProjectRecord, type ProxyService, type Registry } from '../types.js';
import type { RegistryLock } from './lock.js';

export type RegistryLine =
  | { kind: 'blank' }
  | { kind: 'comment' }
  | { kind: 'section'; name: string }
  | { kind: 'pair'; key: string; value: string }
  | { kind: 'malformed' };

const SECTION_PATTERN = /^\s*\[([^\]]+)\]\s*$/;
const PAIR_PATTERN = /^\s*([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.+?)\s*$/;
const PORT_KEY_PATTERN = /_PORT$/;

const FILE_HEADER = [
  '# Shipyard Project Registry',
  '# This file tracks project configurations including ports, domains, and proxy services',
  '# Format: INI with [project-name] sections',
];

export function classifyLine(line: string): RegistryLine {
  if (line.trim() === '') return { kind: 'blank' };
  if (/^\s*#/.test(line)) return { kind: 'comment' };

  const section = SECTION_PATTERN.exec(line);
  if (section?.[1] !== undefined) {
    return { kind: 'section', name: section[1].trim() };
  }

  const pair = PAIR_PATTERN.exec(line);
  if (pair?.[1] !== undefined && pair[2] !== undefined) {
    return { kind: 'pair', key: pair[1], value: pair[2] };
  }

  return { kind: 'malformed' };
}

function isProxyService(value: string): value is ProxyService {
  return PROXY_SERVICES.some((service) => service === value);
}

/**
 * Single pass over the file. Any unparseable line aborts the whole parse, so a
 * registry is either fully loaded or not at all.
 */
export function parseRegistry(content: string, file = '<registry>'): Registry {
  const registry: Registry = new Map();
  let current: ProjectRecord | undefined;

  const lines = content.split(/\r?\n/);
  for (const [index, line] of lines.entries()) {
    const corrupt = (reason: string) => new CorruptRegistryError(file, index + 1, reason, line);
    const classified = classifyLine(line);

    switch (classified.kind) {
      case 'blank':
      case 'comment':
        continue;

      case 'section':
        if (registry.has(classified.name)) {
          throw corrupt(`duplicate section [${classified.name}]`);
        }
        current = { name: classified.name, ports: {} };
        registry.set(current.name, current);
        continue;

      case 'pair':
        if (!current) {
          throw corrupt('key outside of section');
        }
        applyPair(current, classified.key, classified.value, corrupt);
        continue;

      case 'malformed':
        throw corrupt('neither a [section] header nor a key=value pair');
    }
  }

  return registry;
}

function applyPair(
  record: ProjectRecord,
  key: string,
  value: string,
  corrupt: (reason: string) => CorruptRegistryError
): void {
  switch (key) {
    case 'path':
      record.path = value;
      return;
    case 'domain':
      record.domain = value;
      return;
    case 'proxy_service':
      if (!isProxyService(value)) {
        throw corrupt(`unknown proxy service "${value}"`);
      }
      record.proxyService = value;
      return;
    case 'proxy_secure':
      if (value !== 'true' && value !== 'false') {
        throw corrupt('proxy_secure must be true or false');
      }
      record.proxySecure = value === 'true';
      return;
  }

  if (PORT_KEY_PATTERN.test(key)) {
    const port = Number(value);
    if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
      throw corrupt(`${key} is not a valid port`);
    }
    record.ports[key] = port;
    return;
  }

  record.extra = { ...record.extra, [key]: value };
}

function sortedKeys(values: Record<string, unknown> | undefined): string[] {
  return Object.keys(values ?? {}).sort();
}

export function serializeRecord(record: ProjectRecord): string[] {
  const lines = [`[${record.name}]`];

  if (record.path !== undefined) lines.push(`path=${record.path}`);
  if (record.domain !== undefined) lines.push(`domain=${record.domain}`);
  if (record.proxyService !== undefined) lines.push(`proxy_service=${record.proxyService}`);
  if (record.proxySecure !== undefined) lines.push(`proxy_secure=${record.proxySecure}`);

  for (const key of sortedKeys(record.extra)) {
    lines.push(`${key}=${record.extra?.[key]}`);
  }
  for (const key of sortedKeys(record.ports)) {
    lines.push(`${key}=${record.ports[key]}`);
  }

  return lines;
}

export function serializeRegistry(registry: Registry): string {
  const out = [...FILE_HEADER];

  for (const name of [...registry.keys()].sort()) {
    const record = registry.get(name);
    if (record) {
      out.push('', ...serializeRecord(record));
    }
  }

  return `${out.join('\n')}\n`;
}

/** Returns every port held by more than one record, with the holders. */
export function findPortConflicts(registry: Registry): Map<number, string[]> {
  const holders = new Map<number, string[]>();

  for (const record of registry.values()) {
    for (const port of Object.values(record.ports)) {
      holders.set(port, [...(holders.get(port) ?? []), record.name]);
    }
  }

  return new Map([...holders].filter(([, names]) => names.length > 1));
}

function assertSaveable(registry: Registry): void {
  const conflicts = findPortConflicts(registry);
  if (conflicts.size > 0) {
    const details = [...conflicts]
      .map(([port, names]) => `${port} (${names.join(', ')})`)
      .join('; ');
    throw new ShipyardError(
      ExitCode.RegistryWriteFailed,
      `Refusing to write registry with duplicate port assignments: ${details}`
    );
  }

  for (const record of registry.values()) {
    if ((record.domain === undefined) !== (record.proxyService === undefined)) {
      throw new ShipyardError(
        ExitCode.RegistryWriteFailed,
        `Refusing to write registry: [${record.name}] must have both domain and proxy_service or neither`
      );
    }
  }
}

export class RegistryStore {
  constructor(
    private registryFile: string,
    private lock?: RegistryLock
  ) {}

  getPath(): string {
    return this.registryFile;
  }

  async load(): Promise<Registry> {
    let content: string;
    try {
      content = await readFile(this.registryFile, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return new Map();
      }
      throw error;
    }
    return parseRegistry(content, this.registryFile);
  }

  async save(registry: Registry): Promise<void> {
    assertSaveable(registry);

    const tempPath = `${this.registryFile}.tmp.${randomBytes(8).toString('hex')}`;

    try {
      await mkdir(dirname(this.registryFile), { recursive: true });
      await writeFile(tempPath, serializeRegistry(registry), 'utf-8');
      await rename(tempPath, this.registryFile);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new RegistryWriteError(this.registryFile, error);
    }
  }

  /** Runs `fn` while holding the cross-process registry lock. */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.lock) {
      return fn();
    }

    const release = await this.lock.acquire();
    try {
      return await fn();
    } finally {
      await release();
    }
  }
}
