import { stat } from 'fs/promises';
import { describeError, errorCode } from '../errors.js';
import { silentLogger, type Logger, type ProjectRecord, type Registry } from '../types.js';
import type { ProxyManager, VolumeManager } from '../adapters/base.js';
import type { RegistryStore } from './registry.js';

export interface ReconcilerDeps {
  store: RegistryStore;
  proxies: ProxyManager;
  volumes: VolumeManager;
  logger?: Logger;
  isDirectory?: (path: string) => Promise<boolean>;
}

export interface ReconcileResult {
  registry: Registry;
  removed: ProjectRecord[];
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    // Unreadable is not the same as gone; keep the record.
    return true;
  }
}

/**
 * Drops registry records whose project directory was deleted, along with their
 * domain proxy and Sail volumes. External cleanup is best-effort: failures are
 * logged and the run continues.
 */
export class Reconciler {
  private logger: Logger;
  private isDirectory: (path: string) => Promise<boolean>;

  constructor(private deps: ReconcilerDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.isDirectory = deps.isDirectory ?? isDirectory;
  }

  async findStale(registry: Registry): Promise<ProjectRecord[]> {
    const stale: ProjectRecord[] = [];
    for (const record of registry.values()) {
      if (record.path !== undefined && !(await this.isDirectory(record.path))) {
        stale.push(record);
      }
    }
    return stale;
  }

  async reconcile(registry: Registry): Promise<ReconcileResult> {
    const stale = await this.findStale(registry);
    if (stale.length === 0) {
      return { registry, removed: [] };
    }

    const next: Registry = new Map(registry);
    for (const record of stale) {
      this.logger.info(`  × Project '${record.name}' path no longer exists: ${record.path}`);
      next.delete(record.name);
      await this.removeProxy(record);
      await this.removeVolumes(record);
    }

    this.logger.info('');
    this.logger.info(`Cleaning up ${stale.length} stale project(s) from registry...`);
    await this.deps.store.save(next);
    this.logger.success(`Cleaned up ${stale.length} stale project(s)`);

    return { registry: next, removed: stale };
  }

  private async removeProxy(record: ProjectRecord): Promise<void> {
    if (!record.domain || !record.proxyService) return;

    this.logger.info(`    Removing proxy: ${record.domain} (via ${record.proxyService})`);
    try {
      const result = await this.deps.proxies.remove(record.proxyService, record.domain);
      if (result.ok) {
        this.logger.info('    ✓ Proxy removed successfully');
      } else {
        this.logger.warn('    Failed to remove proxy (may have been already removed)');
      }
    } catch (error) {
      this.logger.warn(`    Failed to remove proxy: ${describeError(error)}`);
    }
  }

  private async removeVolumes(record: ProjectRecord): Promise<void> {
    this.logger.info('    Checking for Sail volumes to clean up...');
    try {
      const { removed, failed } = await this.deps.volumes.removeByPrefix(record.name);
      if (removed.length === 0 && failed.length === 0) {
        this.logger.info('    No Sail volumes found');
        return;
      }
      for (const volume of removed) {
        this.logger.info(`    ✓ Removed volume: ${volume}`);
      }
      for (const volume of failed) {
        this.logger.warn(`    Failed to remove volume: ${volume} (may be in use)`);
      }
    } catch (error) {
      this.logger.warn(`    Failed to clean up Sail volumes: ${describeError(error)}`);
    }
  }
}
