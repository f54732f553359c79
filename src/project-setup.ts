import { EventEmitter } from 'events';
import { DOMAIN_TLD } from './config.js';
import { ExitCode, ShipyardError, describeError } from './errors.js';
import { readComposePortVariables } from './orchestrator/compose.js';
import { assertNoPortDefinitions, appUrl, ensureEnvFile, writeEnv } from './orchestrator/env-file.js';
import { assignPorts, type PortProber } from './orchestrator/ports.js';
import type { Reconciler } from './orchestrator/reconciler.js';
import type { RegistryStore } from './orchestrator/registry.js';
import type { RegistryLock } from './orchestrator/lock.js';
import { findCertificates, ignoreCertificates, linkCertificates, type LinkedCertificates } from './certificates.js';
import { buildComposerScript, readComposerRepositories, type ComposerCredential } from './adapters/composer.js';
import { NETWORK_WARNING_THRESHOLD, type DockerClient } from './adapters/docker.js';
import type { DomainToolRegistry } from './adapters/index.js';
import { SailRunner } from './adapters/sail.js';
import type { PortAssignment, ProjectRecord, ProxyService } from './types.js';

export const DOMAIN_PATTERN = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?$/;

/** "/Users/me/Code/Shop-API" -> "users_me_code_shop_api" */
export function projectNameFromPath(projectPath: string): string {
  return projectPath
    .replace(/^\//, '')
    .replace(/[^a-zA-Z0-9]/g, '_')
    .toLowerCase();
}

function noDomainToolError(requested: ProxyService | undefined, availableCount: number): ShipyardError {
  if (requested) {
    return new ShipyardError(ExitCode.Usage, `${requested} is not installed or not in PATH.`);
  }
  if (availableCount === 0) {
    return new ShipyardError(
      ExitCode.Usage,
      'Neither Valet nor Herd is installed; a local domain cannot be registered.',
      'Run again with --no-domain.'
    );
  }
  return new ShipyardError(
    ExitCode.Usage,
    'Both Valet and Herd are installed.',
    'Choose one with --proxy valet or --proxy herd.'
  );
}

export async function assertDockerReady(docker: DockerClient): Promise<void> {
  if (!(await docker.isInstalled())) {
    throw new ShipyardError(
      ExitCode.DockerNotInstalled,
      'Docker is not installed or not in PATH.',
      'Please install Docker Desktop from https://www.docker.com/products/docker-desktop'
    );
  }
  if (!(await docker.isRunning())) {
    throw new ShipyardError(
      ExitCode.DockerNotRunning,
      'Docker is installed but not running.',
      'Please start Docker Desktop and try again.'
    );
  }
}

export interface DomainRequest {
  site: string; // without TLD
  tool: ProxyService;
}

export type RegistrationResult =
  | { kind: 'registered'; record: ProjectRecord; assignments: PortAssignment[] }
  | { kind: 'no-port-variables' };

export type SetupEvent =
  | { type: 'docker:ready' }
  | { type: 'docker:networks'; count: number; pruned?: number }
  | { type: 'env:prepared'; created: boolean }
  | { type: 'composer:installing'; repositories: string[] }
  | { type: 'composer:installed' }
  | { type: 'lock:acquired' }
  | { type: 'registry:loaded'; name: string; otherProjects: number }
  | { type: 'ports:extracted'; count: number }
  | { type: 'port:assigned'; assignment: PortAssignment }
  | { type: 'domain:registered'; domain: string; tool: ProxyService; target: string }
  | { type: 'domain:failed'; domain: string; reason: string }
  | { type: 'certificates:linked'; certificates: LinkedCertificates; gitignoreUpdated: boolean }
  | { type: 'certificates:missing'; reason: string; hint: string }
  | { type: 'registry:saved'; path: string }
  | { type: 'env:written'; count: number; appUrl?: string };

export interface ProjectSetupDeps {
  store: RegistryStore;
  lock: RegistryLock;
  reconciler: Reconciler;
  prober: PortProber;
  domainTools: DomainToolRegistry;
  docker: DockerClient;
  sail?: SailRunner;
}

/**
 * Registration flow for one project directory. Everything that reads or
 * writes the shared registry happens inside `register`, under the lock.
 */
export class ProjectSetup extends EventEmitter {
  readonly projectName: string;
  private sail: SailRunner;

  constructor(
    readonly projectPath: string,
    private deps: ProjectSetupDeps
  ) {
    super();
    this.projectName = projectNameFromPath(projectPath);
    this.sail = deps.sail ?? new SailRunner(projectPath);
  }

  onEvent(listener: (event: SetupEvent) => void): this {
    return this.on('event', listener);
  }

  private emitEvent(event: SetupEvent): void {
    this.emit('event', event);
  }

  async checkDocker(options: { pruneNetworks?: boolean } = {}): Promise<void> {
    const { docker } = this.deps;

    await assertDockerReady(docker);
    this.emitEvent({ type: 'docker:ready' });

    const count = await docker.countBridgeNetworks();
    if (count <= NETWORK_WARNING_THRESHOLD) return;

    if (options.pruneNetworks && (await docker.pruneNetworks()).ok) {
      const after = await docker.countBridgeNetworks();
      this.emitEvent({ type: 'docker:networks', count, pruned: count - after });
      return;
    }
    this.emitEvent({ type: 'docker:networks', count });
  }

  async checkComposeFile(): Promise<void> {
    await readComposePortVariables(this.projectPath);
  }

  /** Validates the requested site and picks the proxy tool. Runs before any state changes. */
  async resolveDomain(site: string, tool?: ProxyService): Promise<DomainRequest> {
    if (!DOMAIN_PATTERN.test(site)) {
      throw new ShipyardError(
        ExitCode.Usage,
        `Invalid domain name "${site}". Use only alphanumeric characters and hyphens.`,
        'Domain cannot start or end with a hyphen.'
      );
    }

    const available = await this.deps.domainTools.detectAvailable();
    const selected = tool
      ? available.find((candidate) => candidate.name === tool)
      : available.length === 1
        ? available[0]
        : undefined;

    if (!selected) {
      throw noDomainToolError(tool, available.length);
    }

    if ((await selected.listProxies()).includes(site)) {
      throw new ShipyardError(
        ExitCode.Usage,
        `Domain '${site}.${DOMAIN_TLD}' is already registered as a proxy.`,
        'Choose a different name with --domain.'
      );
    }

    return { site, tool: selected.name };
  }

  async installDependencies(credentials: ComposerCredential[] = []): Promise<void> {
    const repositories = await readComposerRepositories(this.projectPath);
    const script = buildComposerScript(repositories, credentials);

    this.emitEvent({ type: 'composer:installing', repositories });
    const result = await this.deps.docker.runComposer(this.projectPath, script);
    if (!result.ok) {
      throw new ShipyardError(
        ExitCode.CommandFailed,
        'Composer install failed.',
        repositories.length > 0 ? 'Please check your credentials and try again.' : undefined
      );
    }
    this.emitEvent({ type: 'composer:installed' });
  }

  async prepareEnv(): Promise<void> {
    const status = await ensureEnvFile(this.projectPath);
    await assertNoPortDefinitions(this.projectPath);
    this.emitEvent({ type: 'env:prepared', created: status === 'created' });
  }

  async register(domain?: DomainRequest): Promise<RegistrationResult> {
    const release = await this.deps.lock.acquire();
    try {
      this.emitEvent({ type: 'lock:acquired' });
      return await this.registerLocked(domain);
    } finally {
      await release();
    }
  }

  private async registerLocked(domain?: DomainRequest): Promise<RegistrationResult> {
    const { store, reconciler, prober } = this.deps;
    const name = this.projectName;

    const { registry } = await reconciler.reconcile(await store.load());

    if (registry.has(name)) {
      throw new ShipyardError(
        ExitCode.AlreadyRegistered,
        `Project '${name}' is already registered in the port registry.\n\nRegistry file: ${store.getPath()}`,
        `To re-assign ports, manually remove the [${name}] section from the registry.`
      );
    }
    this.emitEvent({ type: 'registry:loaded', name, otherProjects: registry.size });

    const variables = await readComposePortVariables(this.projectPath);
    if (variables.length === 0) {
      return { kind: 'no-port-variables' };
    }
    this.emitEvent({ type: 'ports:extracted', count: variables.length });

    const assignments = await assignPorts(name, variables, registry, prober);
    for (const assignment of assignments) {
      this.emitEvent({ type: 'port:assigned', assignment });
    }

    const ports = Object.fromEntries(assignments.map((assignment) => [assignment.name, assignment.port]));
    const record: ProjectRecord = { name, path: this.projectPath, ports };

    if (domain) {
      const registered = await this.registerDomain(domain, ports.APP_PORT);
      if (registered) {
        record.domain = registered;
        record.proxyService = domain.tool;
        record.proxySecure = true;
      }
    }

    try {
      await store.save(new Map(registry).set(name, record));
    } catch (error) {
      if (record.domain && record.proxyService) {
        // no record would point at the proxy otherwise; its own failure does not mask the write error
        await this.deps.domainTools.remove(record.proxyService, record.domain);
      }
      throw error;
    }
    this.emitEvent({ type: 'registry:saved', path: store.getPath() });

    const update = { projectName: name, ports, domain: record.domain };
    await writeEnv(this.projectPath, update);
    this.emitEvent({ type: 'env:written', count: assignments.length, appUrl: appUrl(update) });

    return { kind: 'registered', record, assignments };
  }

  /** Returns the full domain when the proxy was created. */
  private async registerDomain(request: DomainRequest, appPort: number | undefined): Promise<string | undefined> {
    const domain = `${request.site}.${DOMAIN_TLD}`;
    const tool = this.deps.domainTools.get(request.tool);

    if (appPort === undefined) {
      this.emitEvent({ type: 'domain:failed', domain, reason: 'APP_PORT not assigned. Cannot register proxy.' });
      return undefined;
    }
    if (!tool) {
      this.emitEvent({ type: 'domain:failed', domain, reason: `${request.tool} is not available` });
      return undefined;
    }

    const target = `http://localhost:${appPort}`;
    const result = await tool.proxy(request.site, target, true);
    if (!result.ok) {
      this.emitEvent({ type: 'domain:failed', domain, reason: `${tool.name} proxy command failed` });
      return undefined;
    }
    this.emitEvent({ type: 'domain:registered', domain, tool: tool.name, target });

    try {
      const pair = await findCertificates(tool.certificateDir, domain);
      const certificates = await linkCertificates(this.projectPath, pair);
      const gitignoreUpdated = await ignoreCertificates(this.projectPath);
      this.emitEvent({ type: 'certificates:linked', certificates, gitignoreUpdated });
    } catch (error) {
      this.emitEvent({
        type: 'certificates:missing',
        reason: describeError(error),
        hint: `${tool.name} secure ${request.site}`,
      });
    }

    return domain;
  }

  async startContainers(): Promise<void> {
    if (!(await this.sail.up()).ok) {
      throw new ShipyardError(
        ExitCode.CommandFailed,
        'Failed to start Docker containers.',
        'You may need to run this manually:\n  ./vendor/bin/sail up -d'
      );
    }
  }

  async runLaravelSetup(): Promise<void> {
    if (!(await this.sail.composerSetup()).ok) {
      throw new ShipyardError(
        ExitCode.CommandFailed,
        'Laravel setup failed.',
        'You may need to run this manually:\n  ./vendor/bin/sail composer setup'
      );
    }
  }
}
