import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { interrupt } from '../src/cli/commands.js';
import { Output } from '../src/cli/output.js';
import { ExitCode } from '../src/errors.js';
import { RegistryLock } from '../src/orchestrator/lock.js';

describe('interrupt', () => {
  let tempDir: string;
  let file: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'shipyard-interrupt-'));
    file = join(tempDir, 'projects.conf');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('releases a held lock and exits with the cancelled status', async () => {
    const lock = new RegistryLock(file);
    await lock.acquire();
    expect(existsSync(`${file}.lock`)).toBe(true);

    const code = await interrupt('SIGINT', lock, new Output({ color: false }));

    expect(code).toBe(ExitCode.UserCancelled);
    expect(code).toBe(130);
    expect(lock.isHeld()).toBe(false);
    expect(existsSync(`${file}.lock`)).toBe(false);
    expect(console.log).toHaveBeenLastCalledWith('Received SIGINT. Exiting...');
  });

  it('lets a queued caller take the lock afterwards', async () => {
    const lock = new RegistryLock(file, { pollIntervalMs: 10 });
    await lock.acquire();
    const waiting = lock.acquire(5000);

    await interrupt('SIGTERM', lock, new Output({ color: false }));

    const release = await waiting;
    expect(lock.isHeld()).toBe(true);
    await release();
  });

  it('is harmless when nothing holds the lock', async () => {
    const lock = new RegistryLock(file);
    expect(await interrupt('SIGTERM', lock, new Output({ color: false }))).toBe(ExitCode.UserCancelled);
    expect(existsSync(`${file}.lock`)).toBe(false);
  });
});
