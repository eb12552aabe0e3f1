import { DeploymentError } from './types';

/**
 * Base class for every failure the deployment surfaces to the top level.
 * `code` and `remediation` map one-to-one onto a {@link DeploymentError}.
 */
export abstract class AutomationError extends Error {
  abstract readonly code: string;
  readonly remediation?: string;

  constructor(message: string, remediation?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.remediation = remediation;
  }

  toDeploymentError(): DeploymentError {
    return {
      code: this.code,
      message: this.message,
      remediation: this.remediation
    };
  }
}

export class ProviderError extends AutomationError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    message: string,
    readonly status?: number,
    readonly body?: unknown,
    cause?: unknown
  ) {
    super(message, 'Check the provider API token and the request parameters', { cause });
  }
}

export class TimeoutError extends AutomationError {
  readonly code = 'RESOURCE_TIMEOUT';

  constructor(readonly resourceId: string, readonly attempts: number) {
    super(
      `Resource ${resourceId} did not become active after ${attempts} attempts`,
      'The server is left running; check it in the provider console and delete it if needed'
    );
  }
}

export class UnreachableError extends AutomationError {
  readonly code = 'RESOURCE_UNREACHABLE';

  constructor(readonly address: string, readonly port: number, readonly attempts: number) {
    super(
      `Port ${port} on ${address} was not reachable after ${attempts} attempts`,
      'Check the firewall rules and that the image starts an SSH server'
    );
  }
}

export class SetupTimeoutError extends AutomationError {
  readonly code = 'SETUP_TIMEOUT';

  constructor(readonly address: string, readonly sentinelPath: string, readonly attempts: number) {
    super(
      `Initialization on ${address} did not finish: ${sentinelPath} missing after ${attempts} attempts`,
      'Inspect /var/log/cloud-init-output.log on the server'
    );
  }
}

export class ValidationError extends AutomationError {
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'Run with --help to see the available options');
  }
}

export class CancelledError extends AutomationError {
  readonly code = 'CANCELLED';

  constructor(what: string) {
    super(`${what} was cancelled`);
  }
}

export class DnsLookupError extends AutomationError {
  readonly code = 'DNS_LOOKUP_FAILED';

  constructor(readonly hostname: string, readonly recordType: string, cause: unknown) {
    super(
      `${recordType} lookup for ${hostname} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'Check the local resolver, or rerun with --skip-dns',
      { cause }
    );
  }
}

export class DnsConflictError extends AutomationError {
  readonly code = 'DNS_CONFLICT';

  constructor(readonly domains: string[]) {
    super(
      `Existing mail providers detected for: ${domains.join(', ')}`,
      'Resolve the conflicts listed above, or rerun with --force-dns to continue anyway'
    );
  }
}

export class RemoteCommandError extends AutomationError {
  readonly code = 'REMOTE_COMMAND_FAILED';

  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    super(`Remote command "${command}" exited with status ${exitCode}: ${stderr.trim()}`);
  }
}

export class SshUnavailableError extends AutomationError {
  readonly code = 'SSH_UNAVAILABLE';

  constructor(readonly sshPath: string, cause: unknown) {
    super(
      `Failed to start ${sshPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'Install an OpenSSH client or set server.ssh_path to its location',
      { cause }
    );
  }
}

export class DnsPropagationError extends AutomationError {
  readonly code = 'DNS_PROPAGATION_TIMEOUT';

  constructor(readonly domain: string, readonly attempts: number) {
    super(
      `MX record for ${domain} did not point at mail.${domain} after ${attempts} attempts`,
      'Check the MX record at the DNS host; propagation can take up to an hour'
    );
  }
}

export function toDeploymentError(error: unknown): DeploymentError {
  if (error instanceof AutomationError) {
    return error.toDeploymentError();
  }

  return {
    code: 'DEPLOYMENT_FAILED',
    message: error instanceof Error ? error.message : 'Unknown deployment error'
  };
}
