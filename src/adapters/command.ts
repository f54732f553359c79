import { spawn } from 'child_process';
import { access } from 'fs/promises';
import { constants } from 'fs';
import { delimiter, join } from 'path';
import kill from 'tree-kill';

export interface CommandResult {
  ok: boolean;
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error?: string; // spawn failure, e.g. ENOENT
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  /** 'inherit' streams output to the terminal; stdout/stderr are then empty. */
  stdio?: 'pipe' | 'inherit';
}

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<CommandResult>;

/** Never rejects; failures are reported through the result. */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: options.stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      shell: false,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let settled = false;

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    const timer =
      options.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            if (child.pid !== undefined) {
              kill(child.pid, 'SIGKILL', (error?: Error) => {
                if (error) child.kill('SIGKILL');
              });
            }
          }, options.timeoutMs);

    const finish = (result: Omit<CommandResult, 'stdout' | 'stderr' | 'timedOut'>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ ...result, stdout, stderr, timedOut });
    };

    child.once('error', (error) => finish({ ok: false, code: null, error: error.message }));
    child.once('close', (code) => finish({ ok: code === 0 && !timedOut, code }));
  });

export async function commandExists(command: string, pathEnv = process.env.PATH ?? ''): Promise<boolean> {
  for (const dir of pathEnv.split(delimiter).filter(Boolean)) {
    try {
      await access(join(dir, command), constants.X_OK);
      return true;
    } catch {
      // not in this directory
    }
  }
  return false;
}
