import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ExitCode } from '../src/errors.js';
import { extractPortVariables, readComposePortVariables } from '../src/orchestrator/compose.js';

const COMPOSE = `services:
    laravel.test:
        ports:
            - '\${APP_PORT:-80}:80'
            - '\${VITE_PORT:-5173}:\${VITE_PORT:-5173}'
    mysql:
        ports:
            - '\${FORWARD_DB_PORT:-3306}:3306'
    redis:
        ports:
            - '\${FORWARD_REDIS_PORT:6379}:6379'
    mailpit:
        ports:
            - '\${FORWARD_MAILPIT_PORT:-\${MAIL_PORT}}:1025'
            - '\${FORWARD_MAILPIT_DASHBOARD_PORT:-8025}:8025'
        environment:
            DB_HOST: '\${DB_HOST:-mysql}'
`;

describe('extractPortVariables', () => {
  it('finds *_PORT variables with numeric defaults, sorted by name', () => {
    expect(extractPortVariables(COMPOSE)).toEqual([
      { name: 'APP_PORT', defaultPort: 80 },
      { name: 'FORWARD_DB_PORT', defaultPort: 3306 },
      { name: 'FORWARD_MAILPIT_DASHBOARD_PORT', defaultPort: 8025 },
      { name: 'FORWARD_REDIS_PORT', defaultPort: 6379 },
      { name: 'VITE_PORT', defaultPort: 5173 },
    ]);
  });

  it('keeps the first default when a variable repeats', () => {
    expect(extractPortVariables("- '${APP_PORT:-80}'\n- '${APP_PORT:-8080}'")).toEqual([
      { name: 'APP_PORT', defaultPort: 80 },
    ]);
  });

  it('ignores variables without a default', () => {
    expect(extractPortVariables("- '${APP_PORT}:80'")).toEqual([]);
  });
});

describe('readComposePortVariables', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'shipyard-compose-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads docker-compose.yml from the project', async () => {
    writeFileSync(join(tempDir, 'docker-compose.yml'), COMPOSE);
    const variables = await readComposePortVariables(tempDir);
    expect(variables.map((variable) => variable.name)).toContain('APP_PORT');
  });

  it('fails with exit status 1 when the file is missing', async () => {
    await expect(readComposePortVariables(tempDir)).rejects.toMatchObject({
      exitCode: ExitCode.ComposeNotFound,
      message: 'docker-compose file not found: docker-compose.yml',
    });
  });
});
