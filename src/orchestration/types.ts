// Orchestration-specific types
import { CloudflareDnsClient } from '../dns/cloudflare-client';
import { DnsResolver } from '../dns/dns-analyzer';
import { AccountGenerator } from '../mailserver/account-generator';
import { Notifier } from '../notifications/webhook-notifier';
import { PortProbe, RemoteExecutor, VmProviderClient } from '../provisioning/types';
import { writeReport } from '../reporting/report-generator';
import { DomainAnalysis } from '../types';
import { CertificateVerifier } from '../verification/tls-verifier';

export type DnsRecordWriter = Pick<CloudflareDnsClient, 'createRecord'>;

/**
 * Collaborators of the orchestrator. Anything left out is built from the
 * configuration.
 */
export interface OrchestratorDependencies {
  vmClient?: VmProviderClient;
  dnsClient?: DnsRecordWriter;
  resolver: DnsResolver;
  executor: RemoteExecutor;
  probe: PortProbe;
  certificates: CertificateVerifier;
  notifier: Notifier;
  accounts: AccountGenerator;
  writeReport: typeof writeReport;
  generateId: () => string;
  now: () => Date;
}

export interface DeployOptions {
  signal?: AbortSignal;
}

export interface DomainCheck {
  domain: string;
  analysis: DomainAnalysis;
}
