import { readFile } from 'fs/promises';
import { join } from 'path';
import { COMPOSE_FILE } from '../config.js';
import { ExitCode, ShipyardError, errorCode } from '../errors.js';
import type { PortVariable } from '../types.js';

// ${APP_PORT:-80} and ${APP_PORT:80}
const PORT_VARIABLE_PATTERN = /\$\{([A-Z_]+_PORT):-?([^}]+)\}/g;

/** Port variables with defaults, deduplicated by name and sorted. */
export function extractPortVariables(composeText: string): PortVariable[] {
  const found = new Map<string, number>();

  for (const match of composeText.matchAll(PORT_VARIABLE_PATTERN)) {
    const [, name, rawDefault] = match;
    if (name === undefined || rawDefault === undefined) continue;

    const value = rawDefault.trim();
    if (!/^\d+$/.test(value) || Number(value) < 1) continue;
    if (!found.has(name)) {
      found.set(name, Number(value));
    }
  }

  return [...found]
    .map(([name, defaultPort]) => ({ name, defaultPort }))
    .sort((a, b) => (a.name < b.name ? -1 : 1));
}

export async function readComposePortVariables(projectPath: string): Promise<PortVariable[]> {
  const composePath = join(projectPath, COMPOSE_FILE);
  try {
    return extractPortVariables(await readFile(composePath, 'utf-8'));
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ShipyardError(ExitCode.ComposeNotFound, `docker-compose file not found: ${COMPOSE_FILE}`);
    }
    throw error;
  }
}
