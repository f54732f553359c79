import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DomainToolRegistry, siteName } from '../src/adapters/index.js';
import { DockerClient } from '../src/adapters/docker.js';
import { HerdAdapter, ValetAdapter, parseProxyTable } from '../src/adapters/valet.js';
import { commandExists, runCommand, type CommandResult, type CommandRunner, type RunOptions } from '../src/adapters/command.js';
import {
  buildComposerScript,
  extractComposerRepositories,
  parseComposerAuth,
} from '../src/adapters/composer.js';

interface Call {
  command: string;
  args: string[];
  options?: RunOptions;
}

/** Records every call and answers from a table keyed by "command arg0 arg1...". */
function fakeRunner(answers: Record<string, Partial<CommandResult>> = {}) {
  const calls: Call[] = [];
  const run: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const answer = answers[[command, ...args].join(' ')] ?? {};
    return { ok: true, code: 0, stdout: '', stderr: '', timedOut: false, ...answer };
  };
  return { run, calls };
}

const PROXIES_TABLE = `+------+-----+---------------------------+------------------------+
| Site | SSL | URL                       | Path                   |
+------+-----+---------------------------+------------------------+
| shop | X   | https://shop.test         | http://localhost:8000  |
| blog |     | http://blog.test          | http://localhost:8001  |
+------+-----+---------------------------+------------------------+
`;

describe('ValetAdapter', () => {
  it('parses site names from the proxies table', () => {
    expect(parseProxyTable(PROXIES_TABLE)).toEqual(['shop', 'blog']);
    expect(parseProxyTable('')).toEqual([]);
  });

  it('creates secure proxies', async () => {
    const { run, calls } = fakeRunner();
    const valet = new ValetAdapter('/certs', run, 1000);

    await valet.proxy('shop', 'http://localhost:8000', true);
    await valet.unproxy('shop');

    expect(calls.map((call) => [call.command, ...call.args])).toEqual([
      ['valet', 'proxy', 'shop', 'http://localhost:8000', '--secure'],
      ['valet', 'unproxy', 'shop'],
    ]);
    expect(calls[0]?.options?.timeoutMs).toBe(1000);
  });

  it('reports no proxies when the command fails', async () => {
    const { run } = fakeRunner({ 'herd proxies': { ok: false, code: 1, stdout: PROXIES_TABLE } });
    expect(await new HerdAdapter('/certs', run).listProxies()).toEqual([]);
  });

  it('runs herd for the herd adapter', async () => {
    const { run, calls } = fakeRunner({ 'herd proxies': { stdout: PROXIES_TABLE } });
    expect(await new HerdAdapter('/certs', run).listProxies()).toEqual(['shop', 'blog']);
    expect(calls[0]?.command).toBe('herd');
  });
});

describe('DomainToolRegistry', () => {
  it('strips the TLD before unproxying', async () => {
    const { run, calls } = fakeRunner();
    const tools = new DomainToolRegistry([new ValetAdapter('/certs', run), new HerdAdapter('/certs', run)]);

    const result = await tools.remove('herd', 'shop.test');

    expect(result.ok).toBe(true);
    expect(calls.map((call) => [call.command, ...call.args])).toEqual([['herd', 'unproxy', 'shop']]);
  });

  it('fails for a tool it does not know', async () => {
    const tools = new DomainToolRegistry([]);
    const result = await tools.remove('valet', 'shop.test');
    expect(result.ok).toBe(false);
    expect(result.error).toBe('Unknown proxy service valet');
  });

  it('derives the site name', () => {
    expect(siteName('shop.test')).toBe('shop');
    expect(siteName('my-shop.test')).toBe('my-shop');
    expect(siteName('shop')).toBe('shop');
  });
});

describe('DockerClient', () => {
  it('removes only the volumes Sail created for the project', async () => {
    const { run, calls } = fakeRunner({
      'docker volume ls --format {{.Name}}': {
        stdout: 'srv_shop_sail-mysql\nsrv_shop_sail-redis\nsrv_shopping_sail-mysql\nother\n',
      },
      'docker volume rm srv_shop_sail-redis': { ok: false, code: 1 },
    });

    const cleanup = await new DockerClient(run).removeByPrefix('srv_shop');

    expect(cleanup).toEqual({ removed: ['srv_shop_sail-mysql'], failed: ['srv_shop_sail-redis'] });
    expect(calls.filter((call) => call.args[1] === 'rm')).toHaveLength(2);
  });

  it('throws when volumes cannot be listed', async () => {
    const { run } = fakeRunner({
      'docker volume ls --format {{.Name}}': { ok: false, code: 1, stderr: 'daemon not running\n' },
    });
    await expect(new DockerClient(run).listVolumes()).rejects.toThrow('docker volume ls failed: daemon not running');
  });

  it('counts bridge networks other than the default one', async () => {
    const { run } = fakeRunner({
      'docker network ls --filter driver=bridge --format {{.Name}}': { stdout: 'bridge\nshop_sail\nblog_sail\n' },
    });
    expect(await new DockerClient(run).countBridgeNetworks()).toBe(2);
  });

  it('runs composer in the Sail image with the project mounted', async () => {
    const { run, calls } = fakeRunner();
    await new DockerClient(run).runComposer('/srv/shop', 'composer install --ignore-platform-reqs');

    const call = calls[0];
    expect(call?.command).toBe('docker');
    expect(call?.args.slice(0, 2)).toEqual(['run', '--rm']);
    expect(call?.args).toContain('/srv/shop:/var/www/html');
    expect(call?.args.slice(-4)).toEqual([
      'laravelsail/php84-composer:latest',
      'bash',
      '-c',
      'composer install --ignore-platform-reqs',
    ]);
    expect(call?.options?.stdio).toBe('inherit');
  });
});

describe('composer', () => {
  it('parses credentials', () => {
    expect(parseComposerAuth('repo.example.com=deploy:test-secret')).toEqual({
      host: 'repo.example.com',
      username: 'deploy',
      token: 'test-secret',
    });
    expect(parseComposerAuth('repo.example.com=test-secret')).toEqual({
      host: 'repo.example.com',
      username: 'token',
      token: 'test-secret',
    });
    expect(() => parseComposerAuth('no-separator')).toThrow(/Invalid --composer-auth/);
  });

  it('lists composer repositories without their scheme', () => {
    const json = JSON.stringify({
      repositories: [
        { type: 'composer', url: 'https://repo.example.com/' },
        { type: 'vcs', url: 'https://github.com/example/pkg' },
        { type: 'composer', url: 'http://satis.example.org' },
      ],
    });
    expect(extractComposerRepositories(json)).toEqual(['repo.example.com', 'satis.example.org']);
    expect(extractComposerRepositories('{"name":"example/app"}')).toEqual([]);
  });

  it('configures every repository before installing', () => {
    const script = buildComposerScript(
      ['repo.example.com'],
      [{ host: 'repo.example.com', username: 'deploy', token: "it's-a-test-secret" }]
    );
    expect(script).toBe(
      "composer config http-basic.repo.example.com 'deploy' 'it'\\''s-a-test-secret' && composer install --ignore-platform-reqs"
    );
    expect(buildComposerScript([], [])).toBe('composer install --ignore-platform-reqs');
  });

  it('refuses a repository without credentials', () => {
    expect(() => buildComposerScript(['repo.example.com'], [])).toThrow(
      'No credentials provided for private repository repo.example.com'
    );
  });
});

describe('runCommand', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'shipyard-cmd-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('captures output and exit status', async () => {
    const result = await runCommand(process.execPath, ['-e', 'process.stdout.write("hi"); process.exit(3)']);
    expect(result).toMatchObject({ ok: false, code: 3, stdout: 'hi', timedOut: false });
  });

  it('resolves with an error when the command does not exist', async () => {
    const result = await runCommand(join(tempDir, 'missing-binary'), []);
    expect(result.ok).toBe(false);
    expect(result.error).toMatch(/ENOENT/);
  });

  it('finds executables on PATH', async () => {
    const bin = join(tempDir, 'bin');
    mkdirSync(bin);
    writeFileSync(join(bin, 'valet'), '#!/bin/sh\n');
    chmodSync(join(bin, 'valet'), 0o755);

    expect(await commandExists('valet', bin)).toBe(true);
    expect(await commandExists('herd', bin)).toBe(false);
  });
});
