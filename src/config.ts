import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

export const VERSION = '0.3.0';

export const COMPOSE_FILE = 'docker-compose.yml';
export const ENV_FILE = '.env';
export const ENV_EXAMPLE_FILE = '.env.example';
export const DOMAIN_TLD = 'test';
export const PROJECT_CERT_DIR = 'certificates';

const optionalMs = z.coerce.number().int().positive().optional();

const EnvSchema = z.object({
  SHIPYARD_HOME: z.string().min(1).optional(),
  SHIPYARD_LOCK_TIMEOUT_MS: optionalMs,
  SHIPYARD_LOCK_STALE_MS: optionalMs,
  SHIPYARD_CONNECT_TIMEOUT_MS: optionalMs,
  SHIPYARD_COMMAND_TIMEOUT_MS: optionalMs,
  NO_COLOR: z.string().optional(),
});

export interface Config {
  registryDir: string;
  registryFile: string;
  lockTimeoutMs: number;
  lockStaleMs?: number; // undefined: a lock marker is only ever removed by its owner
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  color: boolean;
  valetCertDir: string;
  herdCertDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdout.isTTY)): Config {
  const parsed = EnvSchema.parse(env);
  const home = homedir();
  const registryDir = parsed.SHIPYARD_HOME ?? join(home, '.config', 'shipyard');

  return {
    registryDir,
    registryFile: join(registryDir, 'projects.conf'),
    lockTimeoutMs: parsed.SHIPYARD_LOCK_TIMEOUT_MS ?? 10_000,
    lockStaleMs: parsed.SHIPYARD_LOCK_STALE_MS,
    connectTimeoutMs: parsed.SHIPYARD_CONNECT_TIMEOUT_MS ?? 300,
    commandTimeoutMs: parsed.SHIPYARD_COMMAND_TIMEOUT_MS ?? 30_000,
    color: parsed.NO_COLOR === undefined && isTTY,
    valetCertDir: join(home, '.config', 'valet', 'Certificates'),
    herdCertDir: join(home, 'Library', 'Application Support', 'Herd', 'config', 'valet', 'Certificates'),
  };
}
