import { DnsRecord } from '../types';
import { mailHostFor } from './dns-analyzer';

export const DEFAULT_TTL = 3600;
export const MX_PRIORITY = 10;

export interface RecordPlan {
  required: DnsRecord[];
  optional: DnsRecord[];
}

export function spfRecordFor(address: string): string {
  return `v=spf1 mx a ip4:${address} ~all`;
}

/**
 * The records a domain needs to receive mail on the server at `address`.
 * Names are fully qualified.
 */
export function suggestRecords(domain: string, address: string): RecordPlan {
  const mailHost = mailHostFor(domain);

  return {
    required: [
      { type: 'A', name: mailHost, content: address, ttl: DEFAULT_TTL },
      { type: 'MX', name: domain, content: mailHost, ttl: DEFAULT_TTL, priority: MX_PRIORITY },
      { type: 'TXT', name: domain, content: spfRecordFor(address), ttl: DEFAULT_TTL }
    ],
    optional: [
      {
        type: 'TXT',
        name: `_dmarc.${domain}`,
        content: `v=DMARC1; p=quarantine; rua=mailto:dmarc@${domain}`,
        ttl: DEFAULT_TTL
      },
      { type: 'CNAME', name: `autoconfig.${domain}`, content: mailHost, ttl: DEFAULT_TTL },
      { type: 'CNAME', name: `autodiscover.${domain}`, content: mailHost, ttl: DEFAULT_TTL }
    ]
  };
}
