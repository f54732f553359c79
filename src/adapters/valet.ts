import type { ProxyService } from '../types.js';
import type { DomainTool } from './base.js';
import { commandExists, runCommand, type CommandRunner } from './command.js';

/**
 * Site names from the table printed by `valet proxies`:
 *
 *   +------+-----+-----------------------+
 *   | Site | SSL | URL                   |
 *   +------+-----+-----------------------+
 *   | shop | X   | https://shop.test     |
 */
export function parseProxyTable(output: string): string[] {
  return output
    .split(/\r?\n/)
    .filter((line) => line.trimStart().startsWith('|'))
    .map((line) => line.split('|')[1]?.trim() ?? '')
    .filter((site) => site !== '' && site !== 'Site');
}

export class ValetAdapter implements DomainTool {
  readonly name: ProxyService = 'valet';

  constructor(
    readonly certificateDir: string,
    protected run: CommandRunner = runCommand,
    protected timeoutMs = 30_000
  ) {}

  async detect(): Promise<boolean> {
    return commandExists(this.name);
  }

  async listProxies(): Promise<string[]> {
    const result = await this.run(this.name, ['proxies'], { timeoutMs: this.timeoutMs });
    return result.ok ? parseProxyTable(result.stdout) : [];
  }

  proxy(site: string, target: string, secure: boolean) {
    const args = ['proxy', site, target, ...(secure ? ['--secure'] : [])];
    return this.run(this.name, args, { timeoutMs: this.timeoutMs });
  }

  unproxy(site: string) {
    return this.run(this.name, ['unproxy', site], { timeoutMs: this.timeoutMs });
  }
}

export class HerdAdapter extends ValetAdapter {
  override readonly name: ProxyService = 'herd';
}
