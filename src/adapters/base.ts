import type { ProxyService } from '../types.js';
import type { CommandResult } from './command.js';

/** A local-domain proxy tool with a Valet-style CLI. */
export interface DomainTool {
  readonly name: ProxyService;
  readonly certificateDir: string;

  detect(): Promise<boolean>;

  listProxies(): Promise<string[]>;
  proxy(site: string, target: string, secure: boolean): Promise<CommandResult>;
  unproxy(site: string): Promise<CommandResult>;
}

export interface ProxyManager {
  remove(service: ProxyService, domain: string): Promise<CommandResult>;
}

export interface VolumeCleanup {
  removed: string[];
  failed: string[];
}

export interface VolumeManager {
  /** Removes the `<projectName>_sail-*` volumes Sail created for a project. */
  removeByPrefix(projectName: string): Promise<VolumeCleanup>;
}
