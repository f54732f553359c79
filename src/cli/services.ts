import type { Config } from '../config.js';
import { DockerClient, DomainToolRegistry } from '../adapters/index.js';
import { runCommand, type CommandRunner } from '../adapters/command.js';
import { RegistryLock } from '../orchestrator/lock.js';
import { PortProber } from '../orchestrator/ports.js';
import { Reconciler } from '../orchestrator/reconciler.js';
import { RegistryStore } from '../orchestrator/registry.js';
import type { Logger } from '../types.js';

export interface Services {
  config: Config;
  lock: RegistryLock;
  store: RegistryStore;
  reconciler: Reconciler;
  prober: PortProber;
  domainTools: DomainToolRegistry;
  docker: DockerClient;
}

/** One instance per process; the CLI commands and the MCP server share it. */
export function createServices(config: Config, logger: Logger, run: CommandRunner = runCommand): Services {
  const lock = new RegistryLock(config.registryFile, {
    timeoutMs: config.lockTimeoutMs,
    staleMs: config.lockStaleMs,
    logger,
  });
  const store = new RegistryStore(config.registryFile, lock);
  const domainTools = DomainToolRegistry.fromConfig(config, run);
  const docker = new DockerClient(run, config.commandTimeoutMs);

  return {
    config,
    lock,
    store,
    reconciler: new Reconciler({ store, proxies: domainTools, volumes: docker, logger }),
    prober: new PortProber({ connectTimeoutMs: config.connectTimeoutMs }),
    domainTools,
    docker,
  };
}
