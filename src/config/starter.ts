import { RawConfig } from './types';

/**
 * The configuration `init` writes. Tokens are read from the environment when
 * the file is loaded.
 */
export function starterConfig(domains: readonly string[] = ['example.com']): RawConfig {
  return {
    domains: [...domains],
    admin_email: `admin@${domains[0] ?? 'example.com'}`,
    provider: {
      name: 'digitalocean',
      api_token: '${DIGITALOCEAN_TOKEN:-}',
      region: 'fra1',
      size: 's-2vcpu-4gb',
      image: 'ubuntu-22-04-x64',
      ssh_key_ids: [],
      tags: ['mail-server', 'automated']
    },
    dns: {
      provider: 'cloudflare',
      api_token: '${CLOUDFLARE_API_TOKEN:-}',
      zone_id: '${CLOUDFLARE_ZONE_ID:-}',
      zones: {},
      skip: false,
      force: false
    },
    server: {
      ssh_user: 'root',
      management_port: 22,
      sentinel_path: '/tmp/cloud-init-complete',
      ssh_identity_file: '${SSH_IDENTITY_FILE:-}',
      ssh_path: 'ssh'
    },
    accounts: {
      per_domain: 3,
      secret_length: 16,
      submission_port: 587,
      imap_port: 993
    },
    waits: {
      active: { max_attempts: 40, interval_seconds: 15 },
      port: { max_attempts: 60, interval_seconds: 10 },
      setup: { max_attempts: 60, interval_seconds: 30 },
      dns: { max_attempts: 60, interval_seconds: 30 }
    },
    webhook_url: '${WEBHOOK_URL:-}',
    output_dir: '.',
    skip_tests: false,
    verbose: false
  };
}
