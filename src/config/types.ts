// Configuration file shape, as written by users (snake_case keys)

export interface RawWaitBudget {
  max_attempts?: number;
  interval_seconds?: number;
}

// a type alias, so it can be merged as a plain record
export type RawConfig = {
  domains?: string[];
  admin_email?: string;
  provider?: {
    name?: string;
    api_token?: string;
    region?: string;
    size?: string;
    image?: string;
    ssh_key_ids?: Array<string | number>;
    tags?: string[];
  };
  dns?: {
    provider?: string;
    api_token?: string;
    zone_id?: string;
    zones?: Record<string, string>;
    skip?: boolean;
    force?: boolean;
  };
  server?: {
    address?: string;
    ssh_user?: string;
    management_port?: number;
    sentinel_path?: string;
    ssh_identity_file?: string;
    ssh_path?: string;
  };
  accounts?: {
    per_domain?: number;
    secret_length?: number;
    submission_port?: number;
    imap_port?: number;
  };
  waits?: {
    active?: RawWaitBudget;
    port?: RawWaitBudget;
    setup?: RawWaitBudget;
    dns?: RawWaitBudget;
    /** Overall limit on the provisioning waits */
    deadline_minutes?: number;
  };
  webhook_url?: string;
  output_dir?: string;
  skip_tests?: boolean;
  verbose?: boolean;
};

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoadOptions {
  /** YAML or JSON file; omitted means defaults plus overrides only */
  path?: string;
  /** Values that win over the file, typically from CLI flags */
  overrides?: RawConfig;
  env?: NodeJS.ProcessEnv;
}
