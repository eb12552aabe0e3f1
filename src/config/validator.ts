import Joi from 'joi';
import { ValidationError } from '../errors';
import { AutomationConfig, WaitBudget } from '../types';
import { ConfigValidationResult } from './types';

/** Treat empty strings and YAML nulls as absent */
const blank = Joi.valid('', null);

const optionalString = () => Joi.string().trim().empty(blank);

const waitBudgetSchema = (maxAttempts: number, intervalSeconds: number) => Joi.object({
  max_attempts: Joi.number()
    .integer()
    .min(1)
    .default(maxAttempts)
    .messages({
      'number.min': 'Wait attempts must be at least 1'
    }),
  interval_seconds: Joi.number()
    .min(0)
    .default(intervalSeconds)
    .messages({
      'number.min': 'Wait interval cannot be negative'
    })
}).default();

const portSchema = (defaultPort: number) => Joi.number().integer().min(1).max(65535).default(defaultPort);

const domainsSchema = Joi.array<string[]>()
  .items(Joi.string().trim().lowercase().domain().messages({
    'string.domain': 'Domain must be a valid domain name'
  }))
  .min(1)
  .unique()
  .required()
  .messages({
    'any.required': 'At least one domain is required',
    'array.min': 'At least one domain is required',
    'array.unique': 'Domains must not repeat'
  });

interface ValidatedWaitBudget {
  max_attempts: number;
  interval_seconds: number;
}

interface ValidatedConfig {
  domains: string[];
  admin_email?: string;
  provider: {
    name: 'digitalocean';
    api_token?: string;
    region: string;
    size: string;
    image: string;
    ssh_key_ids: Array<string | number>;
    tags: string[];
  };
  dns: {
    provider: 'cloudflare';
    api_token?: string;
    zone_id?: string;
    zones: Record<string, string>;
    skip: boolean;
    force: boolean;
  };
  server: {
    address?: string;
    ssh_user: string;
    management_port: number;
    sentinel_path: string;
    ssh_identity_file?: string;
    ssh_path: string;
  };
  accounts: {
    per_domain: number;
    secret_length: number;
    submission_port: number;
    imap_port: number;
  };
  waits: {
    active: ValidatedWaitBudget;
    port: ValidatedWaitBudget;
    setup: ValidatedWaitBudget;
    dns: ValidatedWaitBudget;
    deadline_minutes?: number;
  };
  webhook_url?: string;
  output_dir: string;
  skip_tests: boolean;
  verbose: boolean;
}

const automationConfigSchema = Joi.object<ValidatedConfig>({
  domains: domainsSchema,
  admin_email: optionalString().email().messages({
    'string.email': 'Admin email must be a valid email address'
  }),
  provider: Joi.object({
    name: Joi.string()
      .valid('digitalocean')
      .default('digitalocean')
      .messages({
        'any.only': 'Provider must be one of: digitalocean'
      }),
    api_token: optionalString(),
    region: Joi.string().pattern(/^[a-z0-9-]+$/).default('fra1').messages({
      'string.pattern.base': 'Region must be a valid region slug'
    }),
    size: Joi.string().default('s-2vcpu-4gb'),
    image: Joi.string().default('ubuntu-22-04-x64'),
    ssh_key_ids: Joi.array().items(Joi.alternatives(Joi.string(), Joi.number().integer())).default([]),
    tags: Joi.array().items(Joi.string().pattern(/^[A-Za-z0-9:_-]+$/)).default(['mail-server', 'automated']).messages({
      'string.pattern.base': 'Tags may contain letters, digits, colons, underscores and hyphens'
    })
  }).default(),
  dns: Joi.object({
    provider: Joi.string().valid('cloudflare').default('cloudflare').messages({
      'any.only': 'DNS provider must be one of: cloudflare'
    }),
    api_token: optionalString(),
    zone_id: optionalString(),
    zones: Joi.object().pattern(Joi.string(), Joi.string()).default({}),
    skip: Joi.boolean().default(false),
    force: Joi.boolean().default(false)
  }).default(),
  server: Joi.object({
    address: optionalString().ip({ version: ['ipv4', 'ipv6'] }).messages({
      'string.ip': 'Server address must be an IP address'
    }),
    ssh_user: Joi.string().default('root'),
    management_port: portSchema(22),
    sentinel_path: Joi.string().pattern(/^\//).default('/tmp/cloud-init-complete').messages({
      'string.pattern.base': 'Sentinel path must be absolute'
    }),
    ssh_identity_file: optionalString(),
    ssh_path: Joi.string().trim().default('ssh')
  }).default(),
  accounts: Joi.object({
    per_domain: Joi.number().integer().min(1).max(100).default(3).messages({
      'number.min': 'At least one account per domain is required',
      'number.max': 'No more than 100 accounts per domain'
    }),
    secret_length: Joi.number().integer().min(8).max(128).default(16).messages({
      'number.min': 'Secrets must be at least 8 characters long'
    }),
    submission_port: portSchema(587),
    imap_port: portSchema(993)
  }).default(),
  waits: Joi.object({
    active: waitBudgetSchema(40, 15),
    port: waitBudgetSchema(60, 10),
    setup: waitBudgetSchema(60, 30),
    dns: waitBudgetSchema(60, 30),
    deadline_minutes: Joi.number().positive().messages({
      'number.positive': 'Deadline must be a positive number of minutes'
    })
  }).default(),
  webhook_url: optionalString().uri({ scheme: ['http', 'https'] }).messages({
    'string.uri': 'Webhook URL must be an http(s) URL',
    'string.uriCustomScheme': 'Webhook URL must be an http(s) URL'
  }),
  output_dir: Joi.string().default('.'),
  skip_tests: Joi.boolean().default(false),
  verbose: Joi.boolean().default(false)
}).unknown(false);

const MISSING_TOKEN = 'A provider API token is required unless a server address is given';

function schemaErrors(raw: unknown): { errors: string[]; value?: ValidatedConfig } {
  const { error, value } = automationConfigSchema.validate(raw, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  const errors = error ? error.details.map(detail => detail.message) : [];
  // value is returned alongside the error too, with defaults applied where possible
  const address = value?.server?.address;
  const token = value?.provider?.api_token;
  if (!address && !token) {
    errors.push(MISSING_TOKEN);
  }
  return errors.length > 0 || !value ? { errors } : { errors, value };
}

/**
 * Checks a domain list on its own, for commands that need no server settings
 *
 * @returns the trimmed, lower-cased domains
 */
export function validateDomains(domains: unknown): string[] {
  const { error, value } = domainsSchema.validate(domains, { abortEarly: false });
  if (error) {
    throw new ValidationError(error.details.map(detail => detail.message));
  }
  return value;
}

/**
 * Validates a raw configuration object against the schema
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const { errors } = schemaErrors(raw);
  return { valid: errors.length === 0, errors };
}

/**
 * Validates, applies defaults and converts a raw configuration into the frozen
 * {@link AutomationConfig} every component receives.
 *
 * @throws ValidationError listing every problem found
 */
export function validateAndNormalizeConfig(raw: unknown): AutomationConfig {
  const { errors, value } = schemaErrors(raw);
  if (errors.length > 0 || !value) {
    throw new ValidationError(errors);
  }
  return deepFreeze(toAutomationConfig(value));
}

function toWaitBudget(budget: ValidatedWaitBudget): WaitBudget {
  return {
    maxAttempts: budget.max_attempts,
    intervalMs: Math.round(budget.interval_seconds * 1000)
  };
}

function toAutomationConfig(value: ValidatedConfig): AutomationConfig {
  return {
    domains: value.domains,
    adminEmail: value.admin_email ?? `admin@${value.domains[0]}`,
    provider: {
      name: value.provider.name,
      apiToken: value.provider.api_token,
      region: value.provider.region,
      size: value.provider.size,
      image: value.provider.image,
      sshKeyIds: value.provider.ssh_key_ids.map(String),
      tags: value.provider.tags
    },
    dns: {
      provider: value.dns.provider,
      apiToken: value.dns.api_token,
      zoneId: value.dns.zone_id,
      zones: value.dns.zones,
      skip: value.dns.skip,
      force: value.dns.force
    },
    server: {
      address: value.server.address,
      sshUser: value.server.ssh_user,
      managementPort: value.server.management_port,
      sentinelPath: value.server.sentinel_path,
      sshIdentityFile: value.server.ssh_identity_file,
      sshPath: value.server.ssh_path
    },
    accounts: {
      perDomain: value.accounts.per_domain,
      secretLength: value.accounts.secret_length,
      submissionPort: value.accounts.submission_port,
      imapPort: value.accounts.imap_port
    },
    waits: {
      active: toWaitBudget(value.waits.active),
      port: toWaitBudget(value.waits.port),
      setup: toWaitBudget(value.waits.setup),
      dns: toWaitBudget(value.waits.dns),
      deadlineMs: value.waits.deadline_minutes === undefined
        ? undefined
        : Math.round(value.waits.deadline_minutes * 60000)
    },
    webhookUrl: value.webhook_url,
    outputDir: value.output_dir,
    skipTests: value.skip_tests,
    verbose: value.verbose
  };
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Gets the Joi schema for the configuration (useful for testing)
 */
export function getConfigSchema(): Joi.ObjectSchema<ValidatedConfig> {
  return automationConfigSchema;
}
