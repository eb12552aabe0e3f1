import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { CommanderError } from 'commander';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { load } from 'js-yaml';
import type { MxRecord } from 'dns';
import { CliDependencies, createProgram, deployOverrides, parseCount, parseList } from '../cli';
import { starterConfig } from '../config/starter';
import { silentLogger } from '../logging/logger';
import { AutomationConfig, DeploymentResult } from '../types';

function harness(overrides: CliDependencies = {}) {
  const printed: string[] = [];
  const out: string[] = [];
  const err: string[] = [];
  const program = createProgram({
    createLogger: () => silentLogger,
    print: line => printed.push(line),
    writeOut: text => out.push(text),
    writeErr: text => err.push(text),
    exitOverride: true,
    ...overrides
  });
  const run = (...args: string[]) => program.parseAsync(args, { from: 'user' });
  return { program, run, printed, out, err };
}

async function commanderError(promise: Promise<unknown>): Promise<CommanderError> {
  const error = await promise.then(() => undefined, (e: unknown) => e);
  if (!(error instanceof CommanderError)) {
    throw new Error(`Expected a CommanderError, got ${String(error)}`);
  }
  return error;
}

function resolverFor(mx: MxRecord[]) {
  const empty = () => Promise.reject(Object.assign(new Error('query ENODATA'), { code: 'ENODATA' }));
  return {
    resolveMx: vi.fn(async () => mx),
    resolve4: vi.fn(async (hostname: string) => (hostname.startsWith('mail.') ? ['203.0.113.10'] : empty())),
    resolveTxt: vi.fn(async () => [['v=spf1 mx ~all']]),
    resolveNs: vi.fn(async () => ['ns1.digitalocean.com'])
  };
}

const succeeded = (deploymentId = 'deployment-1'): DeploymentResult => ({
  success: true,
  address: '198.51.100.7',
  conflicts: [],
  accountCount: 3,
  reportDirectory: '/srv/reports/vps_email_deployment_20240305_070809',
  testResults: { port_25_smtp: 'PASS', 'mx_example.com': 'FAIL' },
  metadata: { deploymentId, timestamp: new Date(2024, 2, 5, 7, 8, 9), duration: 1200 }
});

describe('cli', () => {
  const level = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  describe('parseList', () => {
    it('should split, trim and accumulate', () => {
      expect(parseList(' example.com, example.org ,')).toEqual(['example.com', 'example.org']);
      expect(parseList('example.net', ['example.com'])).toEqual(['example.com', 'example.net']);
    });
  });

  describe('parseCount', () => {
    it('should accept positive integers only', () => {
      expect(parseCount('5')).toBe(5);
      expect(() => parseCount('0')).toThrow('Must be a positive integer.');
      expect(() => parseCount('2.5')).toThrow('Must be a positive integer.');
    });
  });

  describe('deployOverrides', () => {
    it('should map flags onto configuration keys', () => {
      const overrides = deployOverrides({
        domains: ['example.com'],
        doToken: 'test-token',
        sshKeyId: ['12345'],
        serverAddress: '198.51.100.7',
        accountsPerDomain: 2,
        skipDns: true
      });

      expect(overrides.domains).toEqual(['example.com']);
      expect(overrides.provider).toMatchObject({ api_token: 'test-token', ssh_key_ids: ['12345'], region: undefined });
      expect(overrides.server).toEqual({ address: '198.51.100.7' });
      expect(overrides.accounts).toEqual({ per_domain: 2 });
      expect(overrides.dns).toMatchObject({ skip: true, force: undefined });
      expect(overrides.output_dir).toBeUndefined();
    });
  });

  describe('program', () => {
    it('should print help and exit with status 0', async () => {
      const { run, out } = harness();

      const error = await commanderError(run('--help'));

      expect(error.code).toBe('commander.helpDisplayed');
      expect(error.exitCode).toBe(0);
      expect(out.join('')).toContain('Usage: vps-mail-deploy');
    });

    it('should reject unknown options', async () => {
      const { run, err } = harness();

      const error = await commanderError(run('deploy', '--bogus'));

      expect(error.code).toBe('commander.unknownOption');
      expect(error.exitCode).toBe(1);
      expect(err.join('')).toContain("error: unknown option '--bogus'");
    });
  });

  describe('deploy', () => {
    it('should load the configuration from flags and print the results', async () => {
      let received: AutomationConfig | undefined;
      const { run, printed } = harness({
        createDeployer: (config) => {
          received = config;
          return { deploy: async () => succeeded() };
        }
      });

      await run(
        'deploy',
        '-d', 'Example.com',
        '--server-address', '198.51.100.7',
        '--ssh-identity-file', '/home/deploy/.ssh/id_ed25519',
        '--accounts-per-domain', '2',
        '--skip-dns',
        '--output-dir', '/srv/reports'
      );

      expect(received).toMatchObject({
        domains: ['example.com'],
        server: { address: '198.51.100.7', sshIdentityFile: '/home/deploy/.ssh/id_ed25519' },
        accounts: { perDomain: 2 },
        dns: { skip: true },
        outputDir: '/srv/reports'
      });
      expect(printed).toEqual([
        '\n✅ Deployment Results:',
        '🖥️  Server: 198.51.100.7',
        '📧 Accounts created: 3',
        '📁 Report: /srv/reports/vps_email_deployment_20240305_070809',
        '  port_25_smtp: PASS',
        '  mx_example.com: FAIL',
        '\n⏱️  Deployment took 1200ms',
        '🆔 Deployment ID: deployment-1'
      ]);
    });

    it('should exit with status 1 when the deployment fails', async () => {
      const { run, err } = harness({
        createDeployer: () => ({
          deploy: async () => ({
            success: false,
            conflicts: [],
            accountCount: 0,
            errors: [{
              code: 'DNS_CONFLICT',
              message: 'Existing mail providers detected for: example.com',
              remediation: 'Resolve the conflicts listed above, or rerun with --force-dns to continue anyway'
            }],
            metadata: { deploymentId: 'deployment-1', timestamp: new Date(2024, 2, 5) }
          })
        })
      });

      const error = await commanderError(run('deploy', '-d', 'example.com', '--server-address', '198.51.100.7'));

      expect(error.code).toBe('deploy.failed');
      expect(error.exitCode).toBe(1);
      expect(err.join('')).toBe(
        '❌ DNS_CONFLICT: Existing mail providers detected for: example.com\n' +
        '💡 Resolve the conflicts listed above, or rerun with --force-dns to continue anyway\n'
      );
    });

    it('should exit with status 1 on an invalid configuration', async () => {
      const deploy = vi.fn(async () => succeeded());
      const { run, err } = harness({ createDeployer: () => ({ deploy }) });

      const error = await commanderError(run('deploy', '-d', 'not a domain', '--server-address', '198.51.100.7'));

      expect(error.code).toBe('deploy.invalidConfig');
      expect(err.join('')).toContain('Domain must be a valid domain name');
      expect(deploy).not.toHaveBeenCalled();
    });

    it('should reject a non-numeric account count', async () => {
      const { run } = harness();

      const error = await commanderError(run('deploy', '--accounts-per-domain', 'many'));

      expect(error.code).toBe('commander.invalidArgument');
    });
  });

  describe('check-dns', () => {
    it('should print instructions for clean domains', async () => {
      const { run, printed } = harness({ resolver: resolverFor([]) });

      await run('check-dns', '-d', 'example.com', '--server-address', '203.0.113.10');

      expect(printed).toHaveLength(1);
      const lines = printed[0].split('\n');
      expect(lines).toContain('Server address: 203.0.113.10');
      expect(lines).toContain('DOMAIN: example.com');
      expect(lines).toContain('DNS provider: digitalocean');
      expect(lines).not.toContain('CONFLICTS DETECTED:');
    });

    it('should default the server address placeholder', async () => {
      const { run, printed } = harness({ resolver: resolverFor([]) });

      await run('check-dns', '-d', 'example.com');

      expect(printed[0].split('\n')).toContain('  A     mail.example.com               → YOUR_SERVER_IP');
    });

    it('should exit with status 1 when a blocking conflict exists', async () => {
      const { run, printed, err } = harness({ resolver: resolverFor([{ exchange: 'mx1.mail.ovh.net', priority: 1 }]) });

      const error = await commanderError(run('check-dns', '-d', 'example.com'));

      expect(error.code).toBe('checkDns.conflicts');
      expect(error.exitCode).toBe(1);
      expect(printed[0].split('\n')).toContain('  - [blocking] OVH MX Plan detected (mx1.mail.ovh.net)');
      expect(err.join('')).toBe('❌ example.com: OVH MX Plan detected (mx1.mail.ovh.net)\n');
    });

    it('should reject invalid domains before any lookup', async () => {
      const resolver = resolverFor([]);
      const { run } = harness({ resolver });

      const error = await commanderError(run('check-dns', '-d', 'not a domain'));

      expect(error.code).toBe('checkDns.invalidDomains');
      expect(resolver.resolveMx).not.toHaveBeenCalled();
    });

    it('should require domains', async () => {
      const { run } = harness();

      const error = await commanderError(run('check-dns'));

      expect(error.code).toBe('commander.missingMandatoryOptionValue');
    });
  });

  describe('init', () => {
    let directory: string | undefined;

    afterEach(async () => {
      if (directory) {
        await fs.rm(directory, { recursive: true, force: true });
        directory = undefined;
      }
    });

    it('should write an owner-only starter configuration', async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'mail-init-'));
      const target = path.join(directory, 'mail-deploy.yml');
      const { run, printed } = harness();

      await run('init', '-o', target, '-d', 'example.com,example.org');

      const content = await fs.readFile(target, 'utf8');
      expect(content.split('\n')[0]).toBe('# vps-mail-deploy configuration');
      expect(load(content)).toEqual(starterConfig(['example.com', 'example.org']));
      expect((await fs.stat(target)).mode & 0o777).toBe(0o600);
      expect(printed[0]).toBe(`✅ Configuration file created: ${target}`);
    });

    it('should refuse to overwrite without --force', async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'mail-init-'));
      const target = path.join(directory, 'mail-deploy.yml');
      await fs.writeFile(target, 'domains: [example.com]\n');
      const { run } = harness();

      const error = await commanderError(run('init', '-o', target));

      expect(error.code).toBe('init.exists');
      expect(await fs.readFile(target, 'utf8')).toBe('domains: [example.com]\n');
    });

    it('should overwrite with --force', async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'mail-init-'));
      const target = path.join(directory, 'mail-deploy.yml');
      await fs.writeFile(target, 'domains: [example.com]\n');
      const { run } = harness();

      await run('init', '-o', target, '--force');

      expect(load(await fs.readFile(target, 'utf8'))).toEqual(starterConfig());
    });
  });
});
