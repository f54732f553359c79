import { access, copyFile, readFile, rename, rm, writeFile } from 'fs/promises';
import { constants } from 'fs';
import { join } from 'path';
import { randomBytes } from 'crypto';
import { ENV_EXAMPLE_FILE, ENV_FILE } from '../config.js';
import { ExitCode, ShipyardError, describeError } from '../errors.js';

const SAIL_PORT_PATTERN = /(^|\s)(APP_PORT|VITE_PORT|FORWARD_[A-Z_]*_PORT)\s*=/;
const MANAGED_KEY_PATTERN = /^(COMPOSE_PROJECT_NAME|APP_URL|ASSET_URL|VITE_SERVER_HOST)=/;

export const ENV_HEADER = '# Auto-assigned Docker Ports (via shipyard)';

export interface PortDefinition {
  name: string;
  line: number;
}

export interface EnvUpdate {
  projectName: string;
  ports: Record<string, number>;
  domain?: string; // full domain, e.g. "shop.test"
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/** Creates `.env` from `.env.example` when it is missing. */
export async function ensureEnvFile(projectPath: string): Promise<'found' | 'created'> {
  const envPath = join(projectPath, ENV_FILE);
  if (await exists(envPath)) {
    return 'found';
  }

  const examplePath = join(projectPath, ENV_EXAMPLE_FILE);
  if (!(await exists(examplePath))) {
    throw new ShipyardError(
      ExitCode.EnvNotFound,
      '.env file not found and .env.example does not exist.',
      'Please create a .env file or .env.example before running this script.'
    );
  }

  await copyFile(examplePath, envPath);
  return 'created';
}

export function findPortDefinitions(envText: string): PortDefinition[] {
  const found: PortDefinition[] = [];

  envText.split(/\r?\n/).forEach((line, index) => {
    const match = SAIL_PORT_PATTERN.exec(line);
    if (match?.[2]) {
      found.push({ name: match[2], line: index + 1 });
    }
  });

  return found;
}

export async function assertNoPortDefinitions(projectPath: string): Promise<void> {
  const envText = await readFile(join(projectPath, ENV_FILE), 'utf-8');
  const found = findPortDefinitions(envText);

  if (found.length > 0) {
    const listing = found.map((definition) => `  - ${definition.name} (line ${definition.line})`).join('\n');
    throw new ShipyardError(
      ExitCode.EnvHasPorts,
      `.env already contains port definitions.\n\nFound these port variables:\n${listing}`,
      'Please remove all *_PORT variables from .env before running this script.'
    );
  }
}

export function appUrl(update: EnvUpdate): string | undefined {
  if (update.domain) return `https://${update.domain}`;
  const appPort = update.ports.APP_PORT;
  return appPort === undefined ? undefined : `http://localhost:${appPort}`;
}

/**
 * New assignments go on top; the four managed keys are regenerated and every
 * other existing line is kept as it was.
 */
export function renderEnv(existing: string, update: EnvUpdate): string {
  const top = [ENV_HEADER, `COMPOSE_PROJECT_NAME=${update.projectName}`];

  const url = appUrl(update);
  if (url && update.ports.APP_PORT !== undefined) {
    top.push(`APP_URL=${url}`);
    top.push(`VITE_SERVER_HOST=${update.domain ?? 'localhost'}`);
    top.push('ASSET_URL="${APP_URL}"');
  }

  for (const name of Object.keys(update.ports).sort()) {
    top.push(`${name}=${update.ports[name]}`);
  }

  const lines = existing.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  const kept = lines.filter((line) => !MANAGED_KEY_PATTERN.test(line));

  return `${[...top, '', ...kept].join('\n')}\n`;
}

export async function writeEnv(projectPath: string, update: EnvUpdate): Promise<void> {
  const envPath = join(projectPath, ENV_FILE);
  const tempPath = `${envPath}.tmp.${randomBytes(8).toString('hex')}`;

  try {
    const existing = await readFile(envPath, 'utf-8');
    await writeFile(tempPath, renderEnv(existing, update), 'utf-8');
    await rename(tempPath, envPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new ShipyardError(
      ExitCode.EnvWriteFailed,
      `Failed to prepend ports to .env file (${describeError(error)})`
    );
  }
}
