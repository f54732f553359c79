import { z } from 'zod';
import { DOMAIN_TLD, PROJECT_CERT_DIR, VERSION } from '../config.js';
import { ExitCode, ShipyardError } from '../errors.js';
import { parseComposerAuth } from '../adapters/composer.js';
import { isDirectory } from '../orchestrator/reconciler.js';
import type { RegistryLock } from '../orchestrator/lock.js';
import type { RegistryStore } from '../orchestrator/registry.js';
import { ProjectSetup, assertDockerReady, type SetupEvent } from '../project-setup.js';
import { PROXY_SERVICES, type ProjectRecord } from '../types.js';
import type { Output } from './output.js';
import type { Services } from './services.js';

const InitOptionsSchema = z.object({
  domain: z.union([z.string().min(1), z.literal(false)]).optional(),
  proxy: z
    .enum(['valet', 'herd'], {
      errorMap: () => ({ message: `--proxy must be one of: ${PROXY_SERVICES.join(', ')}` }),
    })
    .optional(),
  composerAuth: z.array(z.string()).default([]),
  skipComposer: z.boolean().default(false),
  pruneNetworks: z.boolean().default(false),
  postSetup: z.boolean().default(false),
});

export type InitOptions = z.infer<typeof InitOptionsSchema>;

export function parseInitOptions(raw: unknown): InitOptions {
  const result = InitOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ShipyardError(ExitCode.Usage, result.error.issues.map((issue) => issue.message).join('\n'));
  }
  return result.data;
}

export function renderSetupEvent(out: Output, event: SetupEvent): void {
  switch (event.type) {
    case 'docker:ready':
      out.success('Docker is installed and running');
      return;
    case 'docker:networks':
      if (event.pruned !== undefined) {
        out.success(`Pruned ${event.pruned} unused Docker network(s)`);
        return;
      }
      out.warn(`Found ${event.count} Docker networks. Docker may run out of address pools for new projects.`);
      out.info('  Run: docker network prune -f (or pass --prune-networks)');
      return;
    case 'env:prepared':
      if (event.created) out.success('Created .env from .env.example');
      out.success('No existing port definitions in .env');
      return;
    case 'composer:installing':
      out.line();
      out.info(
        event.repositories.length > 0
          ? `Installing Composer dependencies (${event.repositories.length} private repositor${event.repositories.length === 1 ? 'y' : 'ies'})...`
          : 'Installing Composer dependencies...'
      );
      return;
    case 'composer:installed':
      out.success('Composer dependencies installed');
      out.line();
      return;
    case 'lock:acquired':
      out.success('Acquired registry lock');
      return;
    case 'registry:loaded':
      out.info(`Project identifier: ${event.name}`);
      out.success('Project not yet registered');
      out.success(
        event.otherProjects > 0
          ? `Loaded existing registry (${event.otherProjects} other project(s))`
          : 'Registry is empty (first project)'
      );
      return;
    case 'ports:extracted':
      out.success(`Extracted ${event.count} port variable(s) from docker-compose.yml`);
      out.line();
      out.info('Assigning ports:');
      return;
    case 'port:assigned': {
      const { name, startPort, port } = event.assignment;
      const taken = port === startPort ? '' : ` (${startPort} taken)`;
      out.info(`  ${name}: ${startPort} → ${port}${taken} ${out.paint('green', '✓ available')}`);
      return;
    }
    case 'domain:registered':
      out.line();
      out.success(`Registered ${out.paint('cyan', event.domain)} → ${event.target} (via ${event.tool})`);
      return;
    case 'domain:failed':
      out.line();
      out.warn(`Domain ${event.domain} was not registered: ${event.reason}`);
      return;
    case 'certificates:linked':
      out.success(`SSL certificates linked in ./${PROJECT_CERT_DIR}/`);
      if (event.gitignoreUpdated) out.success(`Added /${PROJECT_CERT_DIR} to .gitignore`);
      out.line();
      return;
    case 'certificates:missing':
      out.warn(event.reason);
      out.info(`  Generate the certificate with: ${event.hint}`);
      out.line();
      return;
    case 'registry:saved':
      out.success(`Updated registry: ${event.path}`);
      return;
    case 'env:written': {
      const url = event.appUrl ? ` (APP_URL=${event.appUrl})` : '';
      out.success(`Added ${event.count} port assignment(s) to top of .env file${url}`);
      return;
    }
  }
}

function rule(out: Output): void {
  out.line(out.paint('cyan', '━'.repeat(70)));
}

export async function runInit(services: Services, out: Output, projectPath: string, raw: unknown): Promise<void> {
  const options = parseInitOptions(raw);
  const credentials = options.composerAuth.map(parseComposerAuth);

  out.title(VERSION);
  out.info('(Press Ctrl+C at any time to cancel)');
  out.line();

  const setup = new ProjectSetup(projectPath, services);
  setup.onEvent((event) => renderSetupEvent(out, event));

  await setup.checkDocker({ pruneNetworks: options.pruneNetworks });
  await setup.checkComposeFile();

  const domain = typeof options.domain === 'string' ? await setup.resolveDomain(options.domain, options.proxy) : undefined;
  if (domain) {
    out.success(`Domain name validated: ${out.paint('cyan', `${domain.site}.${DOMAIN_TLD}`)} (via ${domain.tool})`);
  }

  if (!options.skipComposer) {
    await setup.installDependencies(credentials);
  }
  await setup.prepareEnv();

  const result = await setup.register(domain);
  if (result.kind === 'no-port-variables') {
    out.info('No port variables with defaults found in docker-compose.yml; nothing to assign.');
    return;
  }
  if (!domain) {
    out.info('Domain registration skipped');
  }

  const { record, assignments } = result;
  out.line();
  out.success(`Project setup complete! Assigned ${assignments.length} ports to '${record.name}'.`);
  out.line();

  const appPort = record.ports.APP_PORT;
  if (!options.postSetup) {
    rule(out);
    out.line(out.paint('yellow', 'Next steps: Start containers and run setup'));
    rule(out);
    out.line();
    out.line('To complete setup manually, run:');
    out.line('  1. ./vendor/bin/sail up -d');
    out.line('  2. ./vendor/bin/sail composer setup');
    return;
  }

  out.info('Step 1/2: Starting Docker containers (vendor/bin/sail up -d)...');
  await setup.startContainers();
  out.success('Docker containers started');
  out.line();
  out.info('Step 2/2: Running Laravel setup (vendor/bin/sail composer setup)...');
  await setup.runLaravelSetup();
  out.success('Laravel setup completed');
  out.line();
  rule(out);
  out.line(out.paint('green', '✓ All setup complete!'));
  rule(out);

  if (record.domain && appPort !== undefined) {
    out.line();
    out.line('Your application is accessible at:');
    out.line(`  ${out.paint('cyan', `https://${record.domain}`)}`);
    out.line(out.paint('dim', `Docker is listening on localhost:${appPort}`));
    out.line(out.paint('dim', `${record.proxyService ?? 'proxy'}: ${record.domain} → localhost:${appPort}`));
  } else if (appPort !== undefined) {
    out.line();
    out.line('Your application should be accessible at:');
    out.line(`  ${out.paint('cyan', `http://localhost:${appPort}`)}`);
  }
}

export interface ListedProject extends ProjectRecord {
  exists: boolean | null; // null when the record has no path
}

export async function listProjects(store: RegistryStore): Promise<ListedProject[]> {
  const registry = await store.load();
  const listed: ListedProject[] = [];
  for (const record of [...registry.values()].sort((a, b) => (a.name < b.name ? -1 : 1))) {
    listed.push({ ...record, exists: record.path === undefined ? null : await isDirectory(record.path) });
  }
  return listed;
}

export async function runList(services: Services, out: Output, options: { json?: boolean }): Promise<void> {
  const projects = await listProjects(services.store);

  if (options.json) {
    out.line(JSON.stringify(projects, null, 2));
    return;
  }

  out.title(VERSION);
  if (projects.length === 0) {
    out.info('No registered projects found');
    out.line();
    out.line("Run 'shipyard init' in a project directory to register a new project.");
    return;
  }

  out.info(`Registered Projects (${projects.length})`);
  out.line();

  for (const project of projects) {
    out.line(out.paint('bold', project.name));
    if (project.path !== undefined) {
      out.line(`  Path:   ${project.path}`);
      if (project.exists === false) {
        out.line(`  ${out.paint('yellow', '⚠ Path no longer exists')}`);
      }
    }
    if (project.domain) {
      out.line(`  Domain: ${project.domain} (${project.proxyService ?? 'unknown'})`);
    }
    const ports = Object.keys(project.ports).sort();
    if (ports.length > 0) {
      out.line('  Ports:');
      for (const name of ports) {
        out.line(`    ${name}:${project.ports[name]}`);
      }
    }
    out.line();
  }

  out.info(`Config file: ${services.store.getPath()}`);
}

export async function runCleanup(services: Services, out: Output): Promise<void> {
  out.title(VERSION);
  await assertDockerReady(services.docker);
  out.success('Docker is installed and running');
  out.line();
  out.info('Starting Shipyard cleanup...');
  out.line();

  await services.store.withLock(async () => {
    const registry = await services.store.load();
    if (registry.size === 0) {
      out.info('No registered projects found');
      return;
    }

    out.info(`Found ${registry.size} registered project(s)`);
    out.line();
    const { removed } = await services.reconciler.reconcile(registry);
    if (removed.length === 0) {
      out.info('No stale projects found');
    }
  });

  out.line();
  out.success('Cleanup complete!');
}

export function printUpdateInstructions(out: Output): void {
  out.info(`Shipyard v${VERSION} is installed through npm. To update, run:`);
  out.line('  npm install -g shipyard-sail@latest');
}

/** Ctrl+C and SIGTERM: drop the registry lock and report the cancelled exit status. */
export async function interrupt(signal: NodeJS.Signals, lock: RegistryLock, out: Output): Promise<ExitCode> {
  out.line();
  out.info(`Received ${signal}. Exiting...`);
  await lock.release();
  return ExitCode.UserCancelled;
}
