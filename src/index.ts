#!/usr/bin/env node
import { Command } from 'commander';
import { ZodError } from 'zod';
import { VERSION, loadConfig } from './config.js';
import { ShipyardError, describeError } from './errors.js';
import { interrupt, printUpdateInstructions, runCleanup, runInit, runList } from './cli/commands.js';
import { Output } from './cli/output.js';
import { createServices, type Services } from './cli/services.js';
import { ShipyardMcpServer } from './mcp/server.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function report(out: Output, error: unknown): number {
  if (error instanceof ShipyardError) {
    out.line();
    out.error(error.message);
    if (error.hint) {
      out.line();
      out.line(error.hint);
    }
    return error.exitCode;
  }
  if (error instanceof ZodError) {
    out.error(`Invalid configuration: ${error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`);
    return 1;
  }
  out.error(describeError(error));
  return 1;
}

function handleInterrupts(out: Output, services: Services) {
  const onSignal = (signal: NodeJS.Signals) => {
    void interrupt(signal, services.lock, out).then((code) => process.exit(code));
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

async function serveMcp(services: Services) {
  const server = new ShipyardMcpServer(services);

  const shutdown = async (signal: string) => {
    console.error(`\nReceived ${signal}, shutting down...`);
    try {
      await server.shutdown();
      console.error('Shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await server.start();
}

async function main(argv: string[]) {
  const config = loadConfig();
  const mcpMode = argv[2] === 'mcp';
  const out = new Output({ color: config.color && !mcpMode, stderrOnly: mcpMode });
  const services = createServices(config, out);

  const program = new Command()
    .name('shipyard')
    .description('Port, domain and certificate setup for Laravel Sail projects')
    .version(`Shipyard v${VERSION}`, '-v, --version', 'Show version')
    .helpOption('-h, --help', 'Show this help')
    .option('--update', 'Show how to update Shipyard')
    .on('option:update', () => {
      printUpdateInstructions(out);
      process.exit(0);
    });

  program
    .command('init')
    .description('Set up the Laravel Sail project in the current directory')
    .option('--domain <name>', 'register <name>.test through Valet or Herd')
    .option('--no-domain', 'skip domain registration')
    .option('--proxy <tool>', 'proxy tool to use when both are installed (valet or herd)')
    .option('--composer-auth <host=user:token>', 'credentials for a private Composer repository (repeatable)', collect, [])
    .option('--skip-composer', 'do not run composer install')
    .option('--prune-networks', 'run docker network prune -f when many networks exist')
    .option('--post-setup', 'run sail up -d and sail composer setup afterwards')
    .action(async (options: unknown) => {
      handleInterrupts(out, services);
      await runInit(services, out, process.cwd(), options);
    });

  program
    .command('list')
    .description('Show all registered projects')
    .option('--json', 'print the registry as JSON')
    .action(async (options: { json?: boolean }) => {
      await runList(services, out, options);
    });

  program
    .command('cleanup')
    .description('Remove stale projects from the registry')
    .action(async () => {
      handleInterrupts(out, services);
      await runCleanup(services, out);
    });

  program
    .command('mcp')
    .description('Serve the registry to MCP clients over stdio')
    .action(async () => {
      await serveMcp(services);
    });

  if (argv.length <= 2) {
    program.help();
  }

  try {
    await program.parseAsync(argv);
  } finally {
    if (!mcpMode) {
      await services.lock.release();
    }
  }
}

main(process.argv).catch((error: unknown) => {
  process.exit(report(new Output({ color: Boolean(process.stderr.isTTY) && process.env.NO_COLOR === undefined }), error));
});
