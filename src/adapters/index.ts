import type { Config } from '../config.js';
import type { ProxyService } from '../types.js';
import type { DomainTool, ProxyManager } from './base.js';
import { runCommand, type CommandResult, type CommandRunner } from './command.js';
import { HerdAdapter, ValetAdapter } from './valet.js';

export class DomainToolRegistry implements ProxyManager {
  private tools: DomainTool[];

  constructor(tools: DomainTool[]) {
    this.tools = tools;
  }

  static fromConfig(config: Config, run: CommandRunner = runCommand): DomainToolRegistry {
    return new DomainToolRegistry([
      new ValetAdapter(config.valetCertDir, run, config.commandTimeoutMs),
      new HerdAdapter(config.herdCertDir, run, config.commandTimeoutMs),
    ]);
  }

  get(name: ProxyService): DomainTool | undefined {
    return this.tools.find((tool) => tool.name === name);
  }

  async detectAvailable(): Promise<DomainTool[]> {
    const available: DomainTool[] = [];
    for (const tool of this.tools) {
      if (await tool.detect()) {
        available.push(tool);
      }
    }
    return available;
  }

  /** `domain` is the full name ("shop.test"); the tools expect the site without TLD. */
  async remove(service: ProxyService, domain: string): Promise<CommandResult> {
    const tool = this.get(service);
    if (!tool) {
      return { ok: false, code: null, stdout: '', stderr: '', timedOut: false, error: `Unknown proxy service ${service}` };
    }
    return tool.unproxy(siteName(domain));
  }
}

export function siteName(domain: string): string {
  const dot = domain.lastIndexOf('.');
  return dot > 0 ? domain.slice(0, dot) : domain;
}

export type { DomainTool, ProxyManager, VolumeManager, VolumeCleanup } from './base.js';
export type { CommandResult, CommandRunner } from './command.js';
export { DockerClient } from './docker.js';
export { SailRunner } from './sail.js';
export { ValetAdapter, HerdAdapter } from './valet.js';
