import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { ExitCode, ShipyardError, errorCode } from '../errors.js';

const ComposerJsonSchema = z.object({
  repositories: z
    .union([
      z.array(z.object({ type: z.string().optional(), url: z.string().optional() }).passthrough()),
      z.record(z.unknown()),
    ])
    .optional(),
});

export interface ComposerCredential {
  host: string;
  username: string;
  token: string;
}

/** `host=user:token`; the username defaults to "token" when only a secret is given. */
export function parseComposerAuth(value: string): ComposerCredential {
  const match = /^([^=\s]+)=(?:([^:]*):)?(.+)$/.exec(value);
  if (!match?.[1] || !match[3]) {
    throw new ShipyardError(
      ExitCode.Usage,
      `Invalid --composer-auth value "${value}"`,
      'Expected host=user:token, e.g. --composer-auth repo.example.com=deploy:test-secret'
    );
  }
  return { host: match[1], username: match[2] || 'token', token: match[3] };
}

/** Hosts of the `type: composer` repositories, without the scheme. */
export function extractComposerRepositories(composerJson: string): string[] {
  const parsed = ComposerJsonSchema.parse(JSON.parse(composerJson));
  if (!Array.isArray(parsed.repositories)) return [];

  return parsed.repositories
    .filter((repo) => repo.type === 'composer' && repo.url)
    .map((repo) => (repo.url ?? '').replace(/^https?:\/\//, '').replace(/\/+$/, ''));
}

export async function readComposerRepositories(projectPath: string): Promise<string[]> {
  try {
    return extractComposerRepositories(await readFile(join(projectPath, 'composer.json'), 'utf-8'));
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ShipyardError(ExitCode.CommandFailed, 'composer.json not found in current directory');
    }
    throw error;
  }
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * The bash script run inside the Composer image. Every repository must have a
 * credential; the run stops before anything is installed otherwise.
 */
export function buildComposerScript(repositories: string[], credentials: ComposerCredential[]): string {
  const steps = repositories.map((host) => {
    const credential = credentials.find((candidate) => candidate.host === host);
    if (!credential) {
      throw new ShipyardError(
        ExitCode.CommandFailed,
        `No credentials provided for private repository ${host}`,
        `Pass --composer-auth ${host}=<username>:<token>`
      );
    }
    return `composer config http-basic.${host} ${shellQuote(credential.username)} ${shellQuote(credential.token)}`;
  });

  return [...steps, 'composer install --ignore-platform-reqs'].join(' && ');
}
