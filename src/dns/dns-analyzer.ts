import { Resolver } from 'dns/promises';
import type { MxRecord } from 'dns';
import { DnsLookupError } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { Conflict, DnsHost, DomainAnalysis, DomainRecordSet } from '../types';
import {
  DNS_HOST_PATTERNS,
  MAIL_PROVIDER_TABLE,
  MailProviderEntry,
  MISSING_MAIL_RECORD_REMEDIATION,
  MISSING_SPF_REMEDIATION
} from './conflict-table';

export interface DnsResolver {
  resolveMx(hostname: string): Promise<MxRecord[]>;
  resolve4(hostname: string): Promise<string[]>;
  resolveTxt(hostname: string): Promise<string[][]>;
  resolveNs(hostname: string): Promise<string[]>;
}

const EMPTY_ANSWER_CODES = new Set(['ENODATA', 'ENOTFOUND']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.$/, '');
}

export function mailHostFor(domain: string): string {
  return `mail.${domain}`;
}

/**
 * Matches every MX hostname against every provider of the table. A hostname
 * yields one blocking conflict per provider it matches, so a hostname that
 * matches two providers surfaces both.
 */
export function detectConflicts(
  recordSet: DomainRecordSet,
  table: readonly MailProviderEntry[] = MAIL_PROVIDER_TABLE
): Conflict[] {
  const conflicts: Conflict[] = [];

  for (const hostname of recordSet.mxRecords) {
    const candidate = hostname.toLowerCase();
    for (const entry of table) {
      const matchedPattern = entry.patterns.find(pattern => candidate.includes(pattern));
      if (matchedPattern === undefined) {
        continue;
      }
      conflicts.push({
        kind: 'mx-provider',
        severity: 'blocking',
        domain: recordSet.domain,
        provider: entry.provider,
        providerName: entry.providerName,
        evidenceHostname: hostname,
        matchedPattern,
        remediation: entry.remediation
      });
    }
  }

  if (!recordSet.hasMailARecord) {
    conflicts.push({
      kind: 'missing-mail-a-record',
      severity: 'advisory',
      domain: recordSet.domain,
      expectedHostname: mailHostFor(recordSet.domain),
      remediation: MISSING_MAIL_RECORD_REMEDIATION
    });
  }

  if (!recordSet.hasSpfRecord) {
    conflicts.push({
      kind: 'missing-spf-record',
      severity: 'advisory',
      domain: recordSet.domain,
      remediation: MISSING_SPF_REMEDIATION
    });
  }

  return conflicts;
}

export function blockingConflicts(conflicts: readonly Conflict[]): Conflict[] {
  return conflicts.filter(conflict => conflict.severity === 'blocking');
}

export function describeConflict(conflict: Conflict): string {
  switch (conflict.kind) {
    case 'mx-provider':
      return `${conflict.providerName} detected (${conflict.evidenceHostname})`;
    case 'missing-mail-a-record':
      return `No A record for ${conflict.expectedHostname}`;
    case 'missing-spf-record':
      return `No SPF record for ${conflict.domain}`;
  }
}

export function detectDnsHost(nameservers: readonly string[]): DnsHost {
  for (const nameserver of nameservers) {
    const candidate = nameserver.toLowerCase();
    const match = DNS_HOST_PATTERNS.find(entry => entry.patterns.some(pattern => candidate.includes(pattern)));
    if (match) {
      return match.host;
    }
  }
  return 'unknown';
}

/**
 * Reads the mail-relevant records of a domain, one lookup after another.
 */
export class DnsAnalyzer {
  constructor(
    private readonly resolver: DnsResolver = new Resolver(),
    private readonly logger: Logger = silentLogger
  ) {}

  async analyze(domain: string): Promise<DomainRecordSet> {
    const mx = await this.lookup(domain, 'MX', () => this.resolver.resolveMx(domain));
    const mxRecords = [...mx]
      .sort((a, b) => a.priority - b.priority)
      .map(record => normalizeHostname(record.exchange))
      .filter(hostname => hostname.length > 0);

    const mailHost = mailHostFor(domain);
    const mailAddresses = await this.lookup(mailHost, 'A', () => this.resolver.resolve4(mailHost));

    const txt = await this.lookup(domain, 'TXT', () => this.resolver.resolveTxt(domain));
    const hasSpfRecord = txt
      .map(chunks => chunks.join(''))
      .some(record => record.trim().toLowerCase().startsWith('v=spf1'));

    const ns = await this.lookup(domain, 'NS', () => this.resolver.resolveNs(domain));

    return {
      domain,
      mxRecords,
      hasMailARecord: mailAddresses.length > 0,
      hasSpfRecord,
      nameservers: ns.map(normalizeHostname)
    };
  }

  detectConflicts(recordSet: DomainRecordSet): Conflict[] {
    return detectConflicts(recordSet);
  }

  async analyzeDomain(domain: string): Promise<DomainAnalysis> {
    const recordSet = await this.analyze(domain);
    const analysis: DomainAnalysis = {
      recordSet,
      dnsHost: detectDnsHost(recordSet.nameservers),
      conflicts: detectConflicts(recordSet)
    };

    this.logger.info(`${domain}: DNS host ${analysis.dnsHost}, ${recordSet.mxRecords.length} MX record(s)`);
    for (const hostname of recordSet.mxRecords) {
      this.logger.debug(`  MX ${hostname}`);
    }
    for (const conflict of analysis.conflicts) {
      this.logger.warn(`${domain}: ${describeConflict(conflict)}. ${conflict.remediation}`);
    }

    return analysis;
  }

  private async lookup<T>(hostname: string, recordType: string, resolve: () => Promise<T[]>): Promise<T[]> {
    try {
      return await resolve();
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && EMPTY_ANSWER_CODES.has(code)) {
        this.logger.debug(`No ${recordType} records for ${hostname}`);
        return [];
      }
      throw new DnsLookupError(hostname, recordType, error);
    }
  }
}
