import { DnsHost, MailProviderId } from '../types';

export interface MailProviderEntry {
  provider: MailProviderId;
  providerName: string;
  /** Substrings of an MX hostname that identify the provider */
  patterns: readonly string[];
  remediation: string;
}

export const MAIL_PROVIDER_TABLE: readonly MailProviderEntry[] = [
  {
    provider: 'ovh-mx-plan',
    providerName: 'OVH MX Plan',
    patterns: ['mail.ovh.net'],
    remediation: 'Delete the OVH MX records or suspend the MX Plan service'
  },
  {
    provider: 'google-workspace',
    providerName: 'Google Workspace',
    patterns: ['google.com', 'googlemail.com'],
    remediation: 'Disable Google Workspace mail for this domain or use a subdomain'
  },
  {
    provider: 'microsoft-365',
    providerName: 'Microsoft 365',
    patterns: ['outlook.com', 'protection.outlook.com'],
    remediation: 'Disable Microsoft 365 mail for this domain or use a subdomain'
  }
];

export const DNS_HOST_PATTERNS: ReadonlyArray<{ host: Exclude<DnsHost, 'unknown'>; patterns: readonly string[] }> = [
  { host: 'ovh', patterns: ['ovh.net'] },
  { host: 'cloudflare', patterns: ['cloudflare.com'] },
  { host: 'digitalocean', patterns: ['digitalocean.com'] },
  { host: 'route53', patterns: ['route53', 'amazonaws.com', 'awsdns'] },
  { host: 'namecheap', patterns: ['namecheap.com', 'registrar-servers.com'] }
];

export const MISSING_MAIL_RECORD_REMEDIATION = 'Add an A record for the mail host pointing at the server address';
export const MISSING_SPF_REMEDIATION = 'Add a TXT record "v=spf1 mx a ip4:<server address> ~all"';
