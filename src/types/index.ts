// Core type definitions for the VPS mail deployment

export type VmProviderName = 'digitalocean';
export type DnsProviderName = 'cloudflare';

export interface WaitBudget {
  maxAttempts: number;
  intervalMs: number;
}

export interface ProviderSettings {
  name: VmProviderName;
  apiToken?: string;
  region: string;
  size: string;
  image: string;
  sshKeyIds: readonly string[];
  tags: readonly string[];
}

export interface DnsSettings {
  provider: DnsProviderName;
  apiToken?: string;
  zoneId?: string;
  /** Per-domain zone ids, falling back to `zoneId` */
  zones: Readonly<Record<string, string>>;
  skip: boolean;
  force: boolean;
}

export interface ServerSettings {
  /** Use an already running server instead of provisioning one */
  address?: string;
  sshUser: string;
  managementPort: number;
  sentinelPath: string;
  sshIdentityFile?: string;
  sshPath: string;
}

export interface AccountSettings {
  perDomain: number;
  secretLength: number;
  submissionPort: number;
  imapPort: number;
}

export interface WaitSettings {
  active: WaitBudget;
  port: WaitBudget;
  setup: WaitBudget;
  /** MX propagation before the record check fails */
  dns: WaitBudget;
  deadlineMs?: number;
}

export interface AutomationConfig {
  domains: readonly string[];
  adminEmail: string;
  provider: ProviderSettings;
  dns: DnsSettings;
  server: ServerSettings;
  accounts: AccountSettings;
  waits: WaitSettings;
  webhookUrl?: string;
  outputDir: string;
  skipTests: boolean;
  verbose: boolean;
}

export type ResourceStatus = 'pending' | 'active' | 'failed';

export interface ProvisionRequest {
  readonly provider: VmProviderName;
  readonly name: string;
  readonly region: string;
  readonly size: string;
  readonly image: string;
  readonly initializationScript: string;
  readonly tags: readonly string[];
  readonly sshKeyIds: readonly string[];
}

export interface ProvisionedResource {
  id: string;
  publicAddress?: string;
  status: ResourceStatus;
}

export interface DomainRecordSet {
  readonly domain: string;
  /** MX hostnames ordered by ascending priority */
  readonly mxRecords: readonly string[];
  readonly hasMailARecord: boolean;
  readonly hasSpfRecord: boolean;
  readonly nameservers: readonly string[];
}

export type MailProviderId = 'ovh-mx-plan' | 'google-workspace' | 'microsoft-365';

export interface MxProviderConflict {
  kind: 'mx-provider';
  severity: 'blocking';
  domain: string;
  provider: MailProviderId;
  providerName: string;
  evidenceHostname: string;
  matchedPattern: string;
  remediation: string;
}

export interface MissingMailRecordConflict {
  kind: 'missing-mail-a-record';
  severity: 'advisory';
  domain: string;
  expectedHostname: string;
  remediation: string;
}

export interface MissingSpfConflict {
  kind: 'missing-spf-record';
  severity: 'advisory';
  domain: string;
  remediation: string;
}

export type Conflict = MxProviderConflict | MissingMailRecordConflict | MissingSpfConflict;

export type DnsHost = 'ovh' | 'cloudflare' | 'digitalocean' | 'route53' | 'namecheap' | 'unknown';

export type DnsRecordType = 'A' | 'MX' | 'TXT' | 'CNAME';

export interface DnsRecord {
  type: DnsRecordType;
  name: string;
  content: string;
  ttl: number;
  priority?: number;
}

export interface DomainAnalysis {
  recordSet: DomainRecordSet;
  dnsHost: DnsHost;
  conflicts: Conflict[];
}

export interface EmailAccount {
  readonly address: string;
  readonly domain: string;
  readonly username: string;
  readonly secret: string;
  readonly mailHost: string;
  readonly submissionPort: number;
  readonly imapPort: number;
}

export interface DatabaseCredentials {
  rootPassword: string;
  mailUserPassword: string;
}

export type CheckOutcome = 'PASS' | 'FAIL';

export type ConnectivityResults = Record<string, CheckOutcome>;

export interface DeploymentError {
  code: string;
  message: string;
  remediation?: string;
}

export interface DeploymentMetadata {
  deploymentId: string;
  timestamp: Date;
  duration?: number;
}

export interface DeploymentResult {
  success: boolean;
  resource?: ProvisionedResource;
  address?: string;
  conflicts: Conflict[];
  accountCount: number;
  reportDirectory?: string;
  testResults?: ConnectivityResults;
  errors?: DeploymentError[];
  metadata: DeploymentMetadata;
}
