import { describeConflict } from '../dns/dns-analyzer';
import { suggestRecords } from '../dns/record-plan';
import { formatTimestamp } from '../logging/logger';
import { DnsRecord } from '../types';
import { DnsInstructionsContext, ProviderInstructions, TemplateGenerator } from './types';

const PROVIDER_INSTRUCTIONS: ProviderInstructions = {
  ovh: (domain) => [
    'Go to https://www.ovh.com/manager/',
    `Web Cloud → Domain names → ${domain}`,
    'Open the DNS Zone tab',
    'Delete the existing MX records (mail.ovh.net entries)',
    'Add the required records above',
    "Click 'Apply Configuration' if prompted"
  ],
  cloudflare: (domain) => [
    'Go to https://dash.cloudflare.com/',
    `Select ${domain}`,
    'DNS → Records',
    'Add the required records above',
    "Set the proxy status to 'DNS only' for mail records"
  ],
  digitalocean: (domain) => [
    'Go to https://cloud.digitalocean.com/networking/domains',
    `Select ${domain}`,
    'Add the required records above'
  ],
  route53: (domain) => [
    'Open the Route 53 console → Hosted zones',
    `Select ${domain}`,
    'Create the required records above'
  ],
  namecheap: (domain) => [
    'Open Domain List → Manage → Advanced DNS',
    `Edit the host records of ${domain}`,
    'Add the required records above'
  ],
  unknown: (domain) => [
    "Open your DNS provider's control panel",
    `Navigate to DNS management for ${domain}`,
    'Add the required records listed above',
    'Save or apply the changes'
  ]
};

export function formatRecord(record: DnsRecord): string {
  const line = `  ${record.type.padEnd(5)} ${record.name.padEnd(30)} → ${record.content}`;
  return record.priority === undefined ? line : `${line} (priority ${record.priority})`;
}

export class DnsInstructionsGenerator implements TemplateGenerator<DnsInstructionsContext> {
  generate(context: DnsInstructionsContext): string {
    const lines = [
      'DNS CONFIGURATION INSTRUCTIONS',
      '='.repeat(50),
      '',
      `Server address: ${context.address}`,
      `Generated: ${formatTimestamp(context.generatedAt)}`
    ];

    for (const { domain, analysis } of context.analyses) {
      const plan = suggestRecords(domain, context.address);
      lines.push('', `DOMAIN: ${domain}`, '-'.repeat(30));

      const dnsHost = analysis?.dnsHost ?? 'unknown';
      lines.push(`DNS provider: ${dnsHost}`);

      if (analysis && analysis.conflicts.length > 0) {
        lines.push('', 'CONFLICTS DETECTED:');
        for (const conflict of analysis.conflicts) {
          lines.push(`  - [${conflict.severity}] ${describeConflict(conflict)}`);
          lines.push(`    Solution: ${conflict.remediation}`);
        }
      }

      lines.push('', 'Required DNS records:', ...plan.required.map(formatRecord));
      lines.push('', 'Optional DNS records (recommended):', ...plan.optional.map(formatRecord));
      lines.push('', `${dnsHost.toUpperCase()} steps:`);
      PROVIDER_INSTRUCTIONS[dnsHost](domain).forEach((step, index) => {
        lines.push(`  ${index + 1}. ${step}`);
      });
    }

    lines.push('', 'DNS propagation time: 15 minutes to 24 hours', '');
    return lines.join('\n');
  }
}
