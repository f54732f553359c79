import type { VolumeCleanup, VolumeManager } from './base.js';
import { runCommand, type CommandResult, type CommandRunner } from './command.js';

export const COMPOSER_IMAGE = 'laravelsail/php84-composer:latest';
export const NETWORK_WARNING_THRESHOLD = 20;

function lines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

export class DockerClient implements VolumeManager {
  constructor(
    private run: CommandRunner = runCommand,
    private timeoutMs = 30_000
  ) {}

  async isInstalled(): Promise<boolean> {
    const result = await this.run('docker', ['--version'], { timeoutMs: this.timeoutMs });
    return result.ok;
  }

  async isRunning(): Promise<boolean> {
    const result = await this.run('docker', ['info'], { timeoutMs: this.timeoutMs });
    return result.ok;
  }

  async listVolumes(): Promise<string[]> {
    const result = await this.run('docker', ['volume', 'ls', '--format', '{{.Name}}'], {
      timeoutMs: this.timeoutMs,
    });
    if (!result.ok) {
      throw new Error(`docker volume ls failed: ${result.error ?? result.stderr.trim()}`);
    }
    return lines(result.stdout);
  }

  async removeByPrefix(projectName: string): Promise<VolumeCleanup> {
    const prefix = `${projectName}_sail-`;
    const volumes = (await this.listVolumes()).filter((name) => name.startsWith(prefix));

    const cleanup: VolumeCleanup = { removed: [], failed: [] };
    for (const volume of volumes) {
      const result = await this.run('docker', ['volume', 'rm', volume], { timeoutMs: this.timeoutMs });
      (result.ok ? cleanup.removed : cleanup.failed).push(volume);
    }
    return cleanup;
  }

  /** Bridge networks other than Docker's default one. */
  async countBridgeNetworks(): Promise<number> {
    const result = await this.run(
      'docker',
      ['network', 'ls', '--filter', 'driver=bridge', '--format', '{{.Name}}'],
      { timeoutMs: this.timeoutMs }
    );
    return result.ok ? lines(result.stdout).filter((name) => name !== 'bridge').length : 0;
  }

  pruneNetworks(): Promise<CommandResult> {
    return this.run('docker', ['network', 'prune', '-f'], { timeoutMs: this.timeoutMs });
  }

  /** Runs `script` with bash inside the Sail Composer image, mounted on the project. */
  runComposer(projectPath: string, script: string): Promise<CommandResult> {
    const user = process.getuid && process.getgid ? ['-u', `${process.getuid()}:${process.getgid()}`] : [];

    return this.run(
      'docker',
      ['run', '--rm', ...user, '-v', `${projectPath}:/var/www/html`, '-w', '/var/www/html', COMPOSER_IMAGE, 'bash', '-c', script],
      { stdio: 'inherit' }
    );
  }
}
