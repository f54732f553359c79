import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import lockfile from 'proper-lockfile';
import { LockTimeoutError, describeError, errorCode } from '../errors.js';
import { silentLogger, type Logger } from '../types.js';

export interface RegistryLockOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  /** Treat a marker whose mtime is older than this as abandoned. Off by default. */
  staleMs?: number;
  logger?: Logger;
}

// proper-lockfile always applies a staleness window; this one is never reached,
// so only the holder ever removes the marker.
const NEVER_STALE_MS = Number.MAX_SAFE_INTEGER;
const MTIME_REFRESH_MS = 5000;

interface Holder {
  releaseMarker: () => Promise<void>;
  handoff: () => void;
}

/** Releases one acquisition; a no-op once that acquisition is no longer the holder. */
export type LockRelease = () => Promise<void>;

/**
 * Cross-process mutex around the registry file. The marker is a directory
 * (`<file>.lock`) created with mkdir, which is atomic on every filesystem the
 * tool runs on. Callers sharing one instance queue in arrival order before
 * they contend for the marker.
 */
export class RegistryLock {
  private holder?: Holder;
  private tail: Promise<void> = Promise.resolve();
  private timeoutMs: number;
  private pollIntervalMs: number;
  private staleMs?: number;
  private logger: Logger;

  constructor(
    private file: string,
    options: RegistryLockOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.staleMs = options.staleMs;
    this.logger = options.logger ?? silentLogger;
  }

  get lockPath(): string {
    return `${this.file}.lock`;
  }

  isHeld(): boolean {
    return this.holder !== undefined;
  }

  /** Waits for earlier in-process callers, then polls for the marker until `timeoutMs` after the call. */
  async acquire(timeoutMs = this.timeoutMs): Promise<LockRelease> {
    const deadline = Date.now() + timeoutMs;

    let handoff: () => void = () => {};
    const turn = new Promise<void>((resolve) => {
      handoff = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);
    await previous;

    let releaseMarker: () => Promise<void>;
    try {
      releaseMarker = await this.lockMarker(timeoutMs, deadline);
    } catch (error) {
      handoff();
      throw error;
    }

    const holder: Holder = { releaseMarker, handoff };
    this.holder = holder;
    return () => this.releaseHolder(holder);
  }

  /** Releases whoever holds the lock now. Safe to call repeatedly, and without a prior acquire. */
  async release(): Promise<void> {
    if (this.holder) {
      await this.releaseHolder(this.holder);
    }
  }

  private async releaseHolder(holder: Holder): Promise<void> {
    if (this.holder !== holder) return;
    this.holder = undefined;

    try {
      await holder.releaseMarker();
    } catch (error) {
      this.logger.warn(`Could not remove registry lock ${this.lockPath}: ${describeError(error)}`);
    } finally {
      holder.handoff();
    }
  }

  private async lockMarker(timeoutMs: number, deadline: number): Promise<() => Promise<void>> {
    await mkdir(dirname(this.file), { recursive: true });

    for (;;) {
      try {
        return await lockfile.lock(this.file, {
          lockfilePath: this.lockPath,
          realpath: false,
          retries: 0,
          stale: this.staleMs ?? NEVER_STALE_MS,
          update: this.staleMs === undefined ? MTIME_REFRESH_MS : undefined,
          onCompromised: (error) => this.compromised(error),
        });
      } catch (error) {
        if (errorCode(error) !== 'ELOCKED') {
          throw error;
        }
      }

      if (Date.now() >= deadline) {
        throw new LockTimeoutError(timeoutMs);
      }
      await sleep(this.pollIntervalMs);
    }
  }

  private compromised(error: Error): void {
    const holder = this.holder;
    this.holder = undefined;
    holder?.handoff();
    this.logger.warn(`Registry lock was compromised: ${error.message}`);
  }
}
