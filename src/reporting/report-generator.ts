import { promises as fs } from 'fs';
import path from 'path';
import {
  Conflict,
  ConnectivityResults,
  DatabaseCredentials,
  DnsHost,
  EmailAccount
} from '../types';

export const REPORT_FILE = 'deployment_report.json';
export const CREDENTIALS_FILE = 'email_credentials.csv';
export const CSV_HEADER = ['Email', 'Password', 'SMTP_Host', 'SMTP_Port', 'IMAP_Host', 'IMAP_Port'] as const;

export interface DomainDnsSummary {
  dnsHost: DnsHost;
  conflicts: Conflict[];
}

export interface ReportContext {
  deploymentId: string;
  address: string;
  domains: readonly string[];
  database?: DatabaseCredentials;
  dns?: Record<string, DomainDnsSummary>;
  tests?: ConnectivityResults;
}

export interface ReportedAccount {
  email: string;
  password: string;
  smtp: { host: string; port: number };
  imap: { host: string; port: number };
}

export interface DeploymentReport {
  deploymentInfo: {
    deploymentId: string;
    timestamp: string;
    address: string;
    domains: string[];
    totalAccounts: number;
  };
  emailAccounts: ReportedAccount[];
  serverDetails?: DatabaseCredentials;
  dns?: Record<string, DomainDnsSummary>;
  tests?: ConnectivityResults;
}

export interface Report {
  structured: DeploymentReport;
  tabular: string;
}

export function escapeCsvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(accounts: readonly EmailAccount[]): string {
  const rows = accounts.map(account => [
    account.address,
    account.secret,
    account.mailHost,
    account.submissionPort,
    account.mailHost,
    account.imapPort
  ]);
  const table: ReadonlyArray<ReadonlyArray<string | number>> = [CSV_HEADER, ...rows];
  return table
    .map(row => row.map(escapeCsvField).join(','))
    .join('\n') + '\n';
}

export class ReportGenerator {
  constructor(private readonly now: () => Date = () => new Date()) {}

  generate(accounts: readonly EmailAccount[], context: ReportContext): Report {
    const structured: DeploymentReport = {
      deploymentInfo: {
        deploymentId: context.deploymentId,
        timestamp: this.now().toISOString(),
        address: context.address,
        domains: [...context.domains],
        totalAccounts: accounts.length
      },
      emailAccounts: accounts.map(account => ({
        email: account.address,
        password: account.secret,
        smtp: { host: account.mailHost, port: account.submissionPort },
        imap: { host: account.mailHost, port: account.imapPort }
      }))
    };

    if (context.database) {
      structured.serverDetails = { ...context.database };
    }
    if (context.dns) {
      structured.dns = context.dns;
    }
    if (context.tests) {
      structured.tests = { ...context.tests };
    }

    return { structured, tabular: toCsv(accounts) };
  }
}

/**
 * Writes the report files into `directory`, creating it when needed. Every file
 * is readable by the owner only.
 *
 * @param extraFiles additional text files keyed by file name
 * @returns the written paths
 */
export async function writeReport(
  report: Report,
  directory: string,
  extraFiles: Readonly<Record<string, string>> = {}
): Promise<string[]> {
  await fs.mkdir(directory, { recursive: true, mode: 0o700 });

  const files: Array<[string, string]> = [
    [REPORT_FILE, JSON.stringify(report.structured, null, 2) + '\n'],
    [CREDENTIALS_FILE, report.tabular],
    ...Object.entries(extraFiles)
  ];

  const written: string[] = [];
  for (const [name, content] of files) {
    const target = path.join(directory, name);
    await fs.writeFile(target, content, { encoding: 'utf8', mode: 0o600 });
    // writeFile only applies the mode when it creates the file
    await fs.chmod(target, 0o600);
    written.push(target);
  }
  return written;
}
