#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, writeFileSync } from 'fs';
import { Resolver } from 'dns/promises';
import { dump as dumpYaml } from 'js-yaml';
import { createConfigLoader, findDefaultConfig } from './config/loader';
import { starterConfig } from './config/starter';
import { RawConfig } from './config/types';
import { validateDomains } from './config/validator';
import { blockingConflicts, describeConflict, DnsAnalyzer, DnsResolver } from './dns/dns-analyzer';
import { toDeploymentError } from './errors';
import { ConsoleLogger, Logger } from './logging/logger';
import { DeploymentOrchestrator } from './orchestration/deployment-orchestrator';
import { DeployOptions } from './orchestration/types';
import { TemplateEngine } from './templates/template-engine';
import { AutomationConfig, DeploymentError, DeploymentResult, DomainAnalysis } from './types';
import { VERSION } from './version';

interface DeployFlags {
  domains?: string[];
  config?: string;
  provider?: string;
  doToken?: string;
  sshKeyId?: string[];
  region?: string;
  size?: string;
  image?: string;
  serverAddress?: string;
  sshIdentityFile?: string;
  adminEmail?: string;
  cfToken?: string;
  cfZoneId?: string;
  webhookUrl?: string;
  outputDir?: string;
  accountsPerDomain?: number;
  skipDns?: boolean;
  forceDns?: boolean;
  skipTests?: boolean;
  verbose?: boolean;
}

interface CheckDnsFlags {
  domains: string[];
  serverAddress?: string;
  verbose?: boolean;
}

interface InitFlags {
  output: string;
  domains?: string[];
  force?: boolean;
}

export interface Deployer {
  deploy(options?: DeployOptions): Promise<DeploymentResult>;
}

export interface CliDependencies {
  createLogger?: (verbose: boolean) => Logger;
  createDeployer?: (config: AutomationConfig, logger: Logger) => Deployer;
  resolver?: DnsResolver;
  /** Plain output lines (results, instructions) */
  print?: (line: string) => void;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
  /** Throw a CommanderError instead of exiting the process */
  exitOverride?: boolean;
}

export function parseList(value: string, previous: string[] = []): string[] {
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return [...previous, ...items];
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Maps deploy flags onto the configuration file shape. Absent flags stay
 * undefined so they do not override the file.
 */
export function deployOverrides(flags: DeployFlags): RawConfig {
  return {
    domains: flags.domains,
    admin_email: flags.adminEmail,
    provider: {
      name: flags.provider,
      api_token: flags.doToken,
      region: flags.region,
      size: flags.size,
      image: flags.image,
      ssh_key_ids: flags.sshKeyId
    },
    dns: {
      api_token: flags.cfToken,
      zone_id: flags.cfZoneId,
      skip: flags.skipDns,
      force: flags.forceDns
    },
    server: {
      address: flags.serverAddress,
      ssh_identity_file: flags.sshIdentityFile
    },
    accounts: {
      per_domain: flags.accountsPerDomain
    },
    webhook_url: flags.webhookUrl,
    output_dir: flags.outputDir,
    skip_tests: flags.skipTests,
    verbose: flags.verbose
  };
}

function formatError(error: DeploymentError): string {
  const lines = [chalk.red(`❌ ${error.code}: ${error.message}`)];
  if (error.remediation) {
    lines.push(chalk.yellow(`💡 ${error.remediation}`));
  }
  return lines.join('\n');
}

export function createProgram(deps: CliDependencies = {}): Command {
  const createLogger = deps.createLogger ?? ((verbose: boolean) => new ConsoleLogger({ verbose }));
  const createDeployer = deps.createDeployer
    ?? ((config: AutomationConfig, logger: Logger) => new DeploymentOrchestrator(config, logger));
  const print = deps.print ?? ((line: string) => console.log(line));

  const program = new Command();

  program
    .name('vps-mail-deploy')
    .description('Provision a VPS mail server, check DNS conflicts and generate mail accounts')
    .version(VERSION);

  // inherited by the subcommands created below
  if (deps.writeOut || deps.writeErr) {
    program.configureOutput({
      writeOut: deps.writeOut ?? ((text) => process.stdout.write(text)),
      writeErr: deps.writeErr ?? ((text) => process.stderr.write(text))
    });
  }
  if (deps.exitOverride) {
    program.exitOverride();
  }

  program
    .command('deploy')
    .description('Provision the server, configure mail and write the credential report')
    .option('-d, --domains <list>', 'Comma-separated domains to serve', parseList)
    .option('-c, --config <path>', 'Path to a YAML or JSON configuration file')
    .option('--provider <name>', 'VM provider')
    .addOption(new Option('--do-token <token>', 'DigitalOcean API token').env('DIGITALOCEAN_TOKEN'))
    .option('--ssh-key-id <id...>', 'SSH key ids or fingerprints to install')
    .option('--region <slug>', 'Region of the new server')
    .option('--size <slug>', 'Size of the new server')
    .option('--image <slug>', 'Image of the new server')
    .option('--server-address <ip>', 'Use an existing server instead of provisioning one')
    .option('--ssh-identity-file <path>', 'Private key ssh uses to reach the server')
    .option('--admin-email <email>', 'Contact address for the TLS certificate')
    .addOption(new Option('--cf-token <token>', 'Cloudflare API token').env('CLOUDFLARE_API_TOKEN'))
    .option('--cf-zone-id <id>', 'Cloudflare zone id')
    .option('--webhook-url <url>', 'Webhook for start, success and failure notifications')
    .option('--output-dir <dir>', 'Directory the report directory is created in')
    .option('--accounts-per-domain <n>', 'Email accounts to create per domain', parseCount)
    .option('--skip-dns', 'Skip DNS analysis and record creation')
    .option('--force-dns', 'Continue even when another mail provider is detected')
    .option('--skip-tests', 'Skip the post-deployment connectivity checks')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (flags: DeployFlags, command: Command) => {
      const spinner = ora('Loading configuration...').start();

      let config: AutomationConfig;
      try {
        config = await createConfigLoader().load({
          path: flags.config ?? findDefaultConfig(),
          overrides: deployOverrides(flags)
        });
        spinner.succeed(`Configuration loaded for ${config.domains.join(', ')}`);
      } catch (error) {
        spinner.fail('Configuration is invalid');
        command.error(formatError(toDeploymentError(error)), { exitCode: 1, code: 'deploy.invalidConfig' });
      }

      const logger = createLogger(config.verbose);
      const controller = new AbortController();
      const cancel = () => {
        logger.warn('Cancelling after the current step...');
        controller.abort();
      };
      process.once('SIGINT', cancel);

      let result: DeploymentResult;
      try {
        result = await createDeployer(config, logger).deploy({ signal: controller.signal });
      } finally {
        process.removeListener('SIGINT', cancel);
      }

      if (!result.success) {
        const [firstError] = result.errors ?? [];
        const message = firstError ? formatError(firstError) : chalk.red('❌ Deployment failed');
        command.error(message, { exitCode: 1, code: 'deploy.failed' });
      }

      print(chalk.green('\n✅ Deployment Results:'));
      if (result.address) {
        print(`🖥️  Server: ${result.address}`);
      }
      print(`📧 Accounts created: ${result.accountCount}`);
      if (result.reportDirectory) {
        print(`📁 Report: ${result.reportDirectory}`);
      }
      for (const [check, outcome] of Object.entries(result.testResults ?? {})) {
        print(`  ${check}: ${outcome === 'PASS' ? chalk.green(outcome) : chalk.red(outcome)}`);
      }
      print(chalk.gray(`\n⏱️  Deployment took ${result.metadata.duration ?? 0}ms`));
      print(chalk.gray(`🆔 Deployment ID: ${result.metadata.deploymentId}`));
    });

  program
    .command('check-dns')
    .description('Check domains for mail provider conflicts and print the records to create')
    .requiredOption('-d, --domains <list>', 'Comma-separated domains to check', parseList)
    .option('--server-address <ip>', 'Server address to use in the suggested records')
    .option('-v, --verbose', 'Enable verbose logging')
    .action(async (flags: CheckDnsFlags, command: Command) => {
      let domains: string[];
      try {
        domains = validateDomains(flags.domains);
      } catch (error) {
        command.error(formatError(toDeploymentError(error)), { exitCode: 1, code: 'checkDns.invalidDomains' });
      }

      const logger = createLogger(flags.verbose ?? false);
      const analyzer = new DnsAnalyzer(deps.resolver ?? new Resolver(), logger);
      const spinner = ora('Checking DNS...').start();

      const analyses: Array<{ domain: string; analysis: DomainAnalysis }> = [];
      try {
        for (const domain of domains) {
          spinner.text = `Checking DNS for ${domain}...`;
          analyses.push({ domain, analysis: await analyzer.analyzeDomain(domain) });
        }
        spinner.succeed('DNS check completed');
      } catch (error) {
        spinner.fail('DNS check failed');
        command.error(formatError(toDeploymentError(error)), { exitCode: 1, code: 'checkDns.lookupFailed' });
      }

      print(new TemplateEngine().generate('dns-instructions', {
        address: flags.serverAddress ?? 'YOUR_SERVER_IP',
        generatedAt: new Date(),
        analyses
      }));

      const blocking = blockingConflicts(analyses.flatMap(({ analysis }) => analysis.conflicts));
      if (blocking.length > 0) {
        command.error(
          chalk.red(blocking.map(conflict => `❌ ${conflict.domain}: ${describeConflict(conflict)}`).join('\n')),
          { exitCode: 1, code: 'checkDns.conflicts' }
        );
      }
    });

  program
    .command('init')
    .description('Write a starter configuration file')
    .option('-o, --output <path>', 'Output configuration file path', 'mail-deploy.yml')
    .option('-d, --domains <list>', 'Comma-separated domains to put in the file', parseList)
    .option('-f, --force', 'Overwrite an existing file')
    .action((flags: InitFlags, command: Command) => {
      if (existsSync(flags.output) && !flags.force) {
        command.error(chalk.red(`❌ ${flags.output} already exists; use --force to overwrite it`), {
          exitCode: 1,
          code: 'init.exists'
        });
      }

      const header = [
        '# vps-mail-deploy configuration',
        '# ${VAR} and ${VAR:-default} are replaced from the environment when loaded',
        ''
      ].join('\n');
      const body = dumpYaml(starterConfig(flags.domains), { lineWidth: 120 });
      writeFileSync(flags.output, `${header}${body}`, { mode: 0o600 });

      print(chalk.green(`✅ Configuration file created: ${flags.output}`));
      print('1. Review the domains and server settings');
      print('2. Export DIGITALOCEAN_TOKEN and, for automatic DNS records, CLOUDFLARE_API_TOKEN');
      print(`3. Run: ${chalk.cyan(`vps-mail-deploy deploy --config ${flags.output}`)}`);
    });

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
