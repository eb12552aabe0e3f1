import path from 'path';
import { Resolver } from 'dns/promises';
import { v4 as uuidv4 } from 'uuid';
import { ResourceNamingService } from '../config/naming';
import { CloudflareDnsClient } from '../dns/cloudflare-client';
import { blockingConflicts, DnsAnalyzer } from '../dns/dns-analyzer';
import { suggestRecords } from '../dns/record-plan';
import { CancelledError, DnsConflictError, ProviderError, toDeploymentError } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { AccountGenerator, generateSecret } from '../mailserver/account-generator';
import { MailServerConfigurator } from '../mailserver/mail-server-configurator';
import { WebhookNotifier } from '../notifications/webhook-notifier';
import { DigitalOceanClient } from '../provisioning/digitalocean-client';
import { TcpPortProbe } from '../provisioning/port-probe';
import { ResourceProvisioner } from '../provisioning/resource-provisioner';
import { SshExecutor } from '../provisioning/ssh-executor';
import { ReportGenerator, writeReport } from '../reporting/report-generator';
import { TemplateEngine } from '../templates/template-engine';
import {
  AutomationConfig,
  Conflict,
  ConnectivityResults,
  DatabaseCredentials,
  DeploymentMetadata,
  DeploymentResult,
  DomainAnalysis,
  EmailAccount,
  ProvisionedResource
} from '../types';
import { ConnectivityChecker } from '../verification/connectivity-checker';
import { TlsCertificateVerifier } from '../verification/tls-verifier';
import { DeployOptions, DomainCheck, OrchestratorDependencies } from './types';

export const DNS_INSTRUCTIONS_FILE = 'dns_instructions.txt';

const DATABASE_SECRET_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const DATABASE_SECRET_LENGTH = 24;

export function defaultDependencies(config: AutomationConfig, logger: Logger): OrchestratorDependencies {
  return {
    vmClient: config.provider.apiToken
      ? new DigitalOceanClient({ apiToken: config.provider.apiToken })
      : undefined,
    dnsClient: config.dns.apiToken
      ? new CloudflareDnsClient({ apiToken: config.dns.apiToken, logger })
      : undefined,
    resolver: new Resolver(),
    executor: new SshExecutor({
      user: config.server.sshUser,
      identityFile: config.server.sshIdentityFile,
      sshPath: config.server.sshPath
    }),
    probe: new TcpPortProbe(),
    certificates: new TlsCertificateVerifier(),
    notifier: new WebhookNotifier({ url: config.webhookUrl, logger }),
    accounts: new AccountGenerator({
      secretLength: config.accounts.secretLength,
      submissionPort: config.accounts.submissionPort,
      imapPort: config.accounts.imapPort
    }),
    writeReport,
    generateId: () => uuidv4(),
    now: () => new Date()
  };
}

/**
 * Runs a deployment from DNS checks to the written report. Steps run one
 * after another; whatever was created before a failure is left in place.
 */
export class DeploymentOrchestrator {
  private readonly deps: OrchestratorDependencies;
  private readonly analyzer: DnsAnalyzer;
  private readonly templates = new TemplateEngine();
  private readonly naming: ResourceNamingService;

  constructor(
    private readonly config: AutomationConfig,
    private readonly logger: Logger = silentLogger,
    dependencies: Partial<OrchestratorDependencies> = {}
  ) {
    this.deps = { ...defaultDependencies(config, logger), ...dependencies };
    this.analyzer = new DnsAnalyzer(this.deps.resolver, logger);
    this.naming = new ResourceNamingService(this.deps.now);
  }

  async deploy(options: DeployOptions = {}): Promise<DeploymentResult> {
    const startTime = this.deps.now().getTime();
    const metadata: DeploymentMetadata = {
      deploymentId: this.deps.generateId(),
      timestamp: this.deps.now()
    };
    const { domains } = this.config;

    let conflicts: Conflict[] = [];
    let accounts: EmailAccount[] = [];
    let resource: ProvisionedResource | undefined;
    let address: string | undefined;

    await this.deps.notifier.notify(`🚀 Starting mail server deployment for ${domains.join(', ')}`);

    try {
      // Step 1: DNS conflict analysis
      const checks: DomainCheck[] = this.config.dns.skip ? [] : await this.analyzeDomains();
      conflicts = checks.flatMap(check => check.analysis.conflicts);
      this.guardConflicts(conflicts);
      this.throwIfCancelled(options.signal, 'Deployment');

      // Step 2: Server
      const database: DatabaseCredentials = {
        rootPassword: generateSecret(DATABASE_SECRET_LENGTH, DATABASE_SECRET_ALPHABET),
        mailUserPassword: generateSecret(DATABASE_SECRET_LENGTH, DATABASE_SECRET_ALPHABET)
      };
      const script = this.templates.generate(
        'cloud-init',
        { database, sentinelPath: this.config.server.sentinelPath },
        { validate: true }
      );

      if (this.config.server.address) {
        address = this.config.server.address;
        this.logger.info(`Using existing server ${address}`);
        await this.configurator(address).bootstrap(script);
      } else {
        resource = await this.provision(script, options);
        address = resource.publicAddress;
        if (!address) {
          throw new ProviderError(`Resource ${resource.id} has no public address`);
        }
      }
      this.throwIfCancelled(options.signal, 'Deployment');

      // Step 3: DNS records
      if (!this.config.dns.skip) {
        await this.createDnsRecords(address);
      }

      // Step 4: Mail server and accounts
      accounts = await this.configureMailServer(address);
      this.throwIfCancelled(options.signal, 'Deployment');

      // Step 5: Post-deployment verification
      let testResults: ConnectivityResults | undefined;
      if (!this.config.skipTests) {
        const checker = new ConnectivityChecker(
          this.deps.probe,
          this.deps.certificates,
          this.analyzer,
          this.logger,
          this.config.waits.dns
        );
        testResults = await checker.run(address, domains, { signal: options.signal });
      }

      // Step 6: Report
      const reportDirectory = await this.writeReports(address, accounts, checks, {
        deploymentId: metadata.deploymentId,
        database,
        tests: testResults
      });

      metadata.duration = this.deps.now().getTime() - startTime;
      this.logger.success(`Deployment finished: ${accounts.length} accounts on ${address}`);
      await this.deps.notifier.notify(
        `✅ Mail server ready at ${address}: ${accounts.length} accounts across ${domains.length} domain(s)`
      );

      return {
        success: true,
        resource,
        address,
        conflicts,
        accountCount: accounts.length,
        reportDirectory,
        testResults,
        metadata
      };
    } catch (error) {
      metadata.duration = this.deps.now().getTime() - startTime;
      const deploymentError = toDeploymentError(error);

      this.logger.error(deploymentError.message);
      await this.deps.notifier.notify(`❌ Mail server deployment failed: ${deploymentError.message}`);

      return {
        success: false,
        resource,
        address,
        conflicts,
        accountCount: accounts.length,
        errors: [deploymentError],
        metadata
      };
    }
  }

  async analyzeDomains(): Promise<DomainCheck[]> {
    const checks: DomainCheck[] = [];
    for (const domain of this.config.domains) {
      checks.push({ domain, analysis: await this.analyzer.analyzeDomain(domain) });
    }
    return checks;
  }

  dnsInstructions(address: string, checks: readonly DomainCheck[]): string {
    const byDomain = new Map(checks.map((check): [string, DomainAnalysis] => [check.domain, check.analysis]));
    return this.templates.generate('dns-instructions', {
      address,
      generatedAt: this.deps.now(),
      analyses: this.config.domains.map(domain => ({ domain, analysis: byDomain.get(domain) }))
    });
  }

  private guardConflicts(conflicts: readonly Conflict[]): void {
    const blocking = blockingConflicts(conflicts);
    if (blocking.length === 0) {
      return;
    }

    const affected = [...new Set(blocking.map(conflict => conflict.domain))];
    if (!this.config.dns.force) {
      throw new DnsConflictError(affected);
    }
    this.logger.warn(`Continuing despite mail provider conflicts for ${affected.join(', ')}`);
  }

  private async provision(script: string, options: DeployOptions): Promise<ProvisionedResource> {
    const { vmClient } = this.deps;
    if (!vmClient) {
      throw new ProviderError('No provider API token configured');
    }

    const { provider, server, waits } = this.config;
    const provisioner = new ResourceProvisioner(
      vmClient,
      this.deps.probe,
      this.deps.executor,
      {
        active: waits.active,
        port: waits.port,
        setup: waits.setup,
        managementPort: server.managementPort,
        sentinelPath: server.sentinelPath
      },
      this.logger
    );
    const clock = () => this.deps.now().getTime();

    return provisioner.provision(
      {
        provider: provider.name,
        name: this.naming.serverName(),
        region: provider.region,
        size: provider.size,
        image: provider.image,
        initializationScript: script,
        tags: provider.tags,
        sshKeyIds: provider.sshKeyIds
      },
      {
        signal: options.signal,
        deadline: waits.deadlineMs === undefined ? undefined : clock() + waits.deadlineMs,
        now: clock
      }
    );
  }

  private async createDnsRecords(address: string): Promise<void> {
    const { dnsClient } = this.deps;
    if (!dnsClient) {
      this.logger.warn('No Cloudflare token configured; add the records from the DNS instructions by hand');
      return;
    }

    for (const domain of this.config.domains) {
      const zoneId = this.config.dns.zones[domain] ?? this.config.dns.zoneId;
      if (!zoneId) {
        this.logger.warn(`No Cloudflare zone configured for ${domain}; skipping record creation`);
        continue;
      }

      const plan = suggestRecords(domain, address);
      let created = 0;
      for (const record of [...plan.required, ...plan.optional]) {
        if (await dnsClient.createRecord(zoneId, record)) {
          created++;
        }
      }
      this.logger.info(`${domain}: ${created} DNS record(s) created`);
    }
  }

  private async configureMailServer(address: string): Promise<EmailAccount[]> {
    const configurator = this.configurator(address);
    const [primaryDomain] = this.config.domains;

    await configurator.prepareDatabase();

    const accounts: EmailAccount[] = [];
    for (const domain of this.config.domains) {
      await configurator.registerDomain(domain);
      for (const account of this.deps.accounts.generate(domain, this.config.accounts.perDomain)) {
        await configurator.createMailbox(account);
        accounts.push(account);
      }
    }

    await configurator.issueCertificate(primaryDomain, this.config.adminEmail);
    await configurator.restartServices();
    return accounts;
  }

  private async writeReports(
    address: string,
    accounts: readonly EmailAccount[],
    checks: readonly DomainCheck[],
    extra: { deploymentId: string; database: DatabaseCredentials; tests?: ConnectivityResults }
  ): Promise<string> {
    const report = new ReportGenerator(this.deps.now).generate(accounts, {
      deploymentId: extra.deploymentId,
      address,
      domains: this.config.domains,
      database: extra.database,
      dns: checks.length > 0
        ? Object.fromEntries(checks.map(({ domain, analysis }) => [
          domain,
          { dnsHost: analysis.dnsHost, conflicts: analysis.conflicts }
        ]))
        : undefined,
      tests: extra.tests
    });

    const directory = path.join(this.config.outputDir, this.naming.reportDirectoryName());
    await this.deps.writeReport(report, directory, {
      [DNS_INSTRUCTIONS_FILE]: this.dnsInstructions(address, checks)
    });
    this.logger.success(`Report written to ${directory}`);
    return directory;
  }

  private configurator(address: string): MailServerConfigurator {
    return new MailServerConfigurator(this.deps.executor, address, this.logger);
  }

  private throwIfCancelled(signal: AbortSignal | undefined, what: string): void {
    if (signal?.aborted) {
      throw new CancelledError(what);
    }
  }
}
