// Main entry point for vps-mail-deploy
export * from './types';
export * from './errors';
export { VERSION } from './version';
export { ConsoleLogger, silentLogger, formatTimestamp } from './logging/logger';
export type { Logger } from './logging/logger';

export { AutomationConfigLoader, createConfigLoader, deepMerge, substituteEnvironmentVariables } from './config/loader';
export { validateConfig, validateAndNormalizeConfig, validateDomains } from './config/validator';
export { ResourceNamingService } from './config/naming';
export { starterConfig } from './config/starter';
export type { RawConfig, ConfigValidationResult } from './config/types';

export { waitFor, ready, notReady } from './provisioning/wait';
export type { WaitOptions, PollOutcome } from './provisioning/wait';
export { command, withStdin, renderCommand, quoteArgument } from './provisioning/remote-command';
export type { RemoteCommand } from './provisioning/remote-command';
export { ResourceProvisioner, DEFAULT_PROVISIONER_SETTINGS } from './provisioning/resource-provisioner';
export { DigitalOceanClient } from './provisioning/digitalocean-client';
export { SshExecutor } from './provisioning/ssh-executor';
export { TcpPortProbe } from './provisioning/port-probe';
export type { VmProviderClient, RemoteExecutor, PortProbe, CommandResult } from './provisioning/types';

export { DnsAnalyzer, detectConflicts, detectDnsHost, blockingConflicts, describeConflict } from './dns/dns-analyzer';
export type { DnsResolver } from './dns/dns-analyzer';
export { MAIL_PROVIDER_TABLE } from './dns/conflict-table';
export { suggestRecords } from './dns/record-plan';
export { CloudflareDnsClient } from './dns/cloudflare-client';

export { AccountGenerator, generateSecret } from './mailserver/account-generator';
export { MailServerConfigurator } from './mailserver/mail-server-configurator';
export { ReportGenerator, writeReport, toCsv } from './reporting/report-generator';
export type { Report, DeploymentReport } from './reporting/report-generator';
export { WebhookNotifier } from './notifications/webhook-notifier';
export { ConnectivityChecker } from './verification/connectivity-checker';
export { TlsCertificateVerifier } from './verification/tls-verifier';
export type { CertificateVerifier } from './verification/tls-verifier';
export { TemplateEngine } from './templates/template-engine';

export { DeploymentOrchestrator } from './orchestration/deployment-orchestrator';
export type { OrchestratorDependencies, DeployOptions } from './orchestration/types';
