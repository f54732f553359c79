import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { VERSION } from '../config.js';
import { describeError } from '../errors.js';
import { listProjects } from '../cli/commands.js';
import type { Services } from '../cli/services.js';
import { canonicalizePort, findAvailablePort } from '../orchestrator/ports.js';
import {
  CheckPortSchema,
  CleanupProjectsSchema,
  ListProjectsSchema,
  SuggestPortSchema,
  type CheckPortInput,
  type SuggestPortInput,
} from './validation.js';

function reply(summary: string, data: unknown): CallToolResult {
  return {
    content: [
      { type: 'text', text: summary },
      { type: 'text', text: JSON.stringify({ success: true, data }, null, 2) },
    ],
  };
}

function failure(error: unknown): CallToolResult {
  const message =
    error instanceof ZodError ? error.issues.map((issue) => issue.message).join('; ') : describeError(error);
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}

/**
 * Exposes the port registry to MCP clients over stdio. Anything written to
 * stdout besides the protocol breaks the client, so all logging goes to stderr.
 */
export class ShipyardMcpServer {
  private server: Server;
  private transport?: StdioServerTransport;

  constructor(private services: Services) {
    this.server = new Server(
      {
        name: 'shipyard',
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: [
          {
            name: 'list_projects',
            description: 'List every project in the Shipyard registry with its ports, domain and path status',
            inputSchema: {
              type: 'object',
              properties: {},
            },
          },
          {
            name: 'cleanup_projects',
            description: 'Remove projects whose directory no longer exists, with their proxy and Sail volumes',
            inputSchema: {
              type: 'object',
              properties: {},
            },
          },
          {
            name: 'check_port',
            description: 'Check whether a TCP port is registered to a project or in use on this machine',
            inputSchema: {
              type: 'object',
              properties: {
                port: {
                  type: 'number',
                  description: 'Port number to check (1-65535)',
                },
              },
              required: ['port'],
            },
          },
          {
            name: 'suggest_port',
            description:
              'Suggest the port `shipyard init` would assign for a docker-compose default. Nothing is reserved.',
            inputSchema: {
              type: 'object',
              properties: {
                defaultPort: {
                  type: 'number',
                  description: 'Default from docker-compose.yml, e.g. 80 for ${APP_PORT:-80}',
                },
                variable: {
                  type: 'string',
                  description: 'Variable name used in error messages (e.g., APP_PORT)',
                },
              },
              required: ['defaultPort'],
            },
          },
        ],
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  /** Dispatches one tool call; errors become an error result, never a rejection. */
  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    try {
      switch (name) {
        case 'list_projects':
          ListProjectsSchema.parse(args);
          return await this.handleListProjects();

        case 'cleanup_projects':
          CleanupProjectsSchema.parse(args);
          return await this.handleCleanupProjects();

        case 'check_port':
          return await this.handleCheckPort(CheckPortSchema.parse(args));

        case 'suggest_port':
          return await this.handleSuggestPort(SuggestPortSchema.parse(args));

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      return failure(error);
    }
  }

  private async handleListProjects() {
    const projects = await listProjects(this.services.store);

    if (projects.length === 0) {
      return reply('No registered projects found', { registry: this.services.store.getPath(), projects });
    }

    const lines = projects.map((project) => {
      const ports = Object.entries(project.ports)
        .map(([name, port]) => `${name}=${port}`)
        .join(', ');
      const stale = project.exists === false ? ' [path missing]' : '';
      return `- ${project.name}${stale}: ${ports}${project.domain ? ` (${project.domain})` : ''}`;
    });

    return reply(`Registered projects (${projects.length}):\n${lines.join('\n')}`, {
      registry: this.services.store.getPath(),
      projects,
    });
  }

  private async handleCleanupProjects() {
    const { store, reconciler } = this.services;
    const removed = await store.withLock(async () => {
      const result = await reconciler.reconcile(await store.load());
      return result.removed.map((record) => record.name);
    });

    const summary =
      removed.length === 0
        ? 'No stale projects found'
        : `Removed ${removed.length} stale project(s): ${removed.join(', ')}`;
    return reply(summary, { removed });
  }

  private async handleCheckPort({ port }: CheckPortInput) {
    const { store, prober } = this.services;
    const registry = await store.load();
    const owner = [...registry.values()].find((record) => Object.values(record.ports).includes(port));
    const available = owner === undefined && (await prober.isAvailable(port, registry));

    let summary = `Port ${port} is available`;
    if (owner) {
      summary = `Port ${port} is registered to ${owner.name}`;
    } else if (!available) {
      summary = `Port ${port} is in use by another process`;
    }

    return reply(summary, { port, available, registeredTo: owner?.name ?? null });
  }

  private async handleSuggestPort({ defaultPort, variable }: SuggestPortInput) {
    const { store, prober } = this.services;
    const registry = await store.load();
    const startPort = canonicalizePort(defaultPort);
    const port = await findAvailablePort(startPort, registry, prober, { variable });

    return reply(`Suggested port for ${variable ?? `default ${defaultPort}`}: ${port} (search started at ${startPort})`, {
      defaultPort,
      startPort,
      port,
    });
  }

  async start() {
    this.transport = new StdioServerTransport();
    await this.server.connect(this.transport);
    console.error(`Shipyard MCP server v${VERSION} started on stdio`);
    console.error(`Registry: ${this.services.store.getPath()}`);
  }

  async shutdown() {
    await this.services.lock.release();
    await this.server.close();
  }
}
