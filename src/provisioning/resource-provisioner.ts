import { ProviderError, SetupTimeoutError, TimeoutError, UnreachableError } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { ProvisionedResource, ProvisionRequest, WaitBudget } from '../types';
import { command } from './remote-command';
import { PortProbe, RemoteExecutor, VmProviderClient } from './types';
import { notReady, ready, waitFor } from './wait';

export interface ProvisionerSettings {
  active: WaitBudget;
  port: WaitBudget;
  setup: WaitBudget;
  managementPort: number;
  sentinelPath: string;
}

export interface ProvisionOptions {
  signal?: AbortSignal;
  /** Overall deadline shared by the three waits, in epoch milliseconds */
  deadline?: number;
  /** Clock the deadline is measured against */
  now?: () => number;
}

export const DEFAULT_PROVISIONER_SETTINGS: ProvisionerSettings = {
  active: { maxAttempts: 40, intervalMs: 15000 },
  port: { maxAttempts: 60, intervalMs: 10000 },
  setup: { maxAttempts: 60, intervalMs: 30000 },
  managementPort: 22,
  sentinelPath: '/tmp/cloud-init-complete'
};

/**
 * Creates a machine and waits, in order, for it to become active, for its
 * management port to accept connections and for the initialization script
 * to drop its sentinel file.
 */
export class ResourceProvisioner {
  constructor(
    private readonly client: VmProviderClient,
    private readonly probe: PortProbe,
    private readonly executor: RemoteExecutor,
    private readonly settings: ProvisionerSettings = DEFAULT_PROVISIONER_SETTINGS,
    private readonly logger: Logger = silentLogger
  ) {}

  async provision(request: ProvisionRequest, options: ProvisionOptions = {}): Promise<ProvisionedResource> {
    const created = await this.client.create(request);
    this.logger.info(`Created ${request.provider} resource ${created.id} (${request.name})`);

    const active = await this.waitUntilActive(created.id, options);
    const address = active.publicAddress;
    if (address === undefined) {
      throw new ProviderError(`Resource ${active.id} is active without a public address`);
    }
    this.logger.success(`Resource ${active.id} is active at ${address}`);

    await this.waitUntilReachable(address, options);
    this.logger.success(`Port ${this.settings.managementPort} is open on ${address}`);

    await this.waitUntilInitialized(address, options);
    this.logger.success(`Initialization finished on ${address}`);

    return active;
  }

  async waitUntilActive(resourceId: string, options: ProvisionOptions = {}): Promise<ProvisionedResource> {
    this.logger.info(`Waiting for resource ${resourceId} to become active...`);

    return waitFor(
      async (attempt) => {
        const resource = await this.client.get(resourceId);
        this.logger.debug(`Poll ${attempt}: ${resourceId} is ${resource.status}`);

        if (resource.status === 'failed') {
          throw new ProviderError(`Resource ${resourceId} entered the failed state`);
        }
        // an active droplet can briefly report no public network yet
        if (resource.status === 'active' && resource.publicAddress) {
          return ready(resource);
        }
        return notReady;
      },
      { ...this.settings.active, ...options, label: `Waiting for resource ${resourceId}` },
      (attempts) => new TimeoutError(resourceId, attempts)
    );
  }

  async waitUntilReachable(address: string, options: ProvisionOptions = {}): Promise<void> {
    const port = this.settings.managementPort;
    this.logger.info(`Waiting for port ${port} on ${address}...`);

    await waitFor(
      async (attempt) => {
        const open = await this.probe.isOpen(address, port);
        this.logger.debug(`Connect ${attempt}: ${address}:${port} ${open ? 'open' : 'closed'}`);
        return open ? ready(true) : notReady;
      },
      { ...this.settings.port, ...options, label: `Waiting for ${address}:${port}` },
      (attempts) => new UnreachableError(address, port, attempts)
    );
  }

  async waitUntilInitialized(address: string, options: ProvisionOptions = {}): Promise<void> {
    const sentinel = this.settings.sentinelPath;
    this.logger.info(`Waiting for ${sentinel} on ${address}...`);

    await waitFor(
      async (attempt) => {
        // exit status 255 is a failed connection and counts as not ready; a rejection is fatal
        const result = await this.executor.run(address, command('test', '-f', sentinel));
        this.logger.debug(`Check ${attempt}: ${sentinel} exit status ${result.exitCode}`);
        return result.exitCode === 0 ? ready(true) : notReady;
      },
      { ...this.settings.setup, ...options, label: `Waiting for ${sentinel}` },
      (attempts) => new SetupTimeoutError(address, sentinel, attempts)
    );
  }
}
