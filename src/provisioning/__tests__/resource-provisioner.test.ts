import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ResourceProvisioner, ProvisionerSettings } from '../resource-provisioner';
import { CommandResult, PortProbe, RemoteExecutor, VmProviderClient } from '../types';
import { RemoteCommand } from '../remote-command';
import {
  CancelledError,
  ProviderError,
  SetupTimeoutError,
  SshUnavailableError,
  TimeoutError,
  UnreachableError
} from '../../errors';
import { ProvisionedResource, ProvisionRequest } from '../../types';

const request: ProvisionRequest = {
  provider: 'digitalocean',
  name: 'mail-server-1700000000',
  region: 'fra1',
  size: 's-2vcpu-4gb',
  image: 'ubuntu-22-04-x64',
  initializationScript: '#!/bin/bash\ntouch /tmp/cloud-init-complete\n',
  tags: ['mail-server'],
  sshKeyIds: []
};

const settings: ProvisionerSettings = {
  active: { maxAttempts: 5, intervalMs: 0 },
  port: { maxAttempts: 4, intervalMs: 0 },
  setup: { maxAttempts: 3, intervalMs: 0 },
  managementPort: 22,
  sentinelPath: '/tmp/cloud-init-complete'
};

const pending: ProvisionedResource = { id: '42', status: 'pending' };
const active: ProvisionedResource = { id: '42', status: 'active', publicAddress: '203.0.113.10' };
const ok: CommandResult = { stdout: '', stderr: '', exitCode: 0 };
const missing: CommandResult = { stdout: '', stderr: '', exitCode: 1 };
const refused: CommandResult = {
  stdout: '',
  stderr: 'ssh: connect to host 203.0.113.10 port 22: Connection refused\n',
  exitCode: 255
};

describe('ResourceProvisioner', () => {
  let client: { create: ReturnType<typeof vi.fn>; get: ReturnType<typeof vi.fn> };
  let probe: { isOpen: ReturnType<typeof vi.fn> };
  let executor: { run: ReturnType<typeof vi.fn> };
  let provisioner: ResourceProvisioner;

  beforeEach(() => {
    client = {
      create: vi.fn(async (): Promise<ProvisionedResource> => pending),
      get: vi.fn(async (): Promise<ProvisionedResource> => active)
    };
    probe = { isOpen: vi.fn(async (): Promise<boolean> => true) };
    executor = { run: vi.fn(async (): Promise<CommandResult> => ok) };

    const vmClient: VmProviderClient = client;
    const portProbe: PortProbe = probe;
    const remote: RemoteExecutor = executor;
    provisioner = new ResourceProvisioner(vmClient, portProbe, remote, settings);
  });

  describe('provision', () => {
    it('should create the resource and return it once every wait passes', async () => {
      const resource = await provisioner.provision(request);

      expect(client.create).toHaveBeenCalledWith(request);
      expect(resource).toEqual(active);
      expect(probe.isOpen).toHaveBeenCalledWith('203.0.113.10', 22);
      const [host, remote] = executor.run.mock.calls[0];
      expect(host).toBe('203.0.113.10');
      expect(remote).toEqual<RemoteCommand>({ program: 'test', args: ['-f', '/tmp/cloud-init-complete'] });
    });

    it('should poll exactly k times when the resource becomes active at poll k', async () => {
      client.get
        .mockResolvedValueOnce(pending)
        .mockResolvedValueOnce(pending)
        .mockResolvedValueOnce(active);

      await provisioner.provision(request);

      expect(client.get).toHaveBeenCalledTimes(3);
      expect(client.get).toHaveBeenCalledWith('42');
    });

    it('should fail with TimeoutError after exactly maxAttempts polls', async () => {
      client.get.mockResolvedValue(pending);

      const error = await provisioner.provision(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ code: 'RESOURCE_TIMEOUT', attempts: 5, resourceId: '42' });
      expect(client.get).toHaveBeenCalledTimes(5);
      expect(probe.isOpen).not.toHaveBeenCalled();
    });

    it('should keep polling while an active resource has no address', async () => {
      client.get
        .mockResolvedValueOnce({ id: '42', status: 'active' })
        .mockResolvedValueOnce(active);

      await provisioner.provision(request);

      expect(client.get).toHaveBeenCalledTimes(2);
    });

    it('should fail with ProviderError when the resource fails', async () => {
      client.get.mockResolvedValueOnce(pending).mockResolvedValueOnce({ id: '42', status: 'failed' });

      await expect(provisioner.provision(request)).rejects.toThrow(
        new ProviderError('Resource 42 entered the failed state')
      );
      expect(client.get).toHaveBeenCalledTimes(2);
    });

    it('should propagate provider errors from create', async () => {
      client.create.mockRejectedValue(new ProviderError('Failed to create droplet (HTTP 422): {}', 422));

      await expect(provisioner.provision(request)).rejects.toMatchObject({ code: 'PROVIDER_ERROR', status: 422 });
      expect(client.get).not.toHaveBeenCalled();
    });

    it('should fail with UnreachableError when the port never opens', async () => {
      probe.isOpen.mockResolvedValue(false);

      const error = await provisioner.provision(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnreachableError);
      expect(error).toMatchObject({ address: '203.0.113.10', port: 22, attempts: 4 });
      expect(probe.isOpen).toHaveBeenCalledTimes(4);
      expect(executor.run).not.toHaveBeenCalled();
    });

    it('should count failed SSH invocations as not ready', async () => {
      executor.run
        .mockResolvedValueOnce(refused)
        .mockResolvedValueOnce(missing)
        .mockResolvedValueOnce(ok);

      await provisioner.provision(request);

      expect(executor.run).toHaveBeenCalledTimes(3);
    });

    it('should stop at once when the ssh client cannot be started', async () => {
      const spawnError = Object.assign(new Error('spawn ssh ENOENT'), { code: 'ENOENT' });
      executor.run.mockRejectedValue(new SshUnavailableError('ssh', spawnError));

      const error = await provisioner.provision(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SshUnavailableError);
      expect(error).toMatchObject({
        code: 'SSH_UNAVAILABLE',
        message: 'Failed to start ssh: spawn ssh ENOENT'
      });
      expect(executor.run).toHaveBeenCalledTimes(1);
    });

    it('should pass a provider transport failure through the active wait', async () => {
      client.get
        .mockResolvedValueOnce(pending)
        .mockRejectedValueOnce(new ProviderError('Failed to fetch droplet 42: socket hang up'));

      const error = await provisioner.provision(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(client.get).toHaveBeenCalledTimes(2);
      expect(probe.isOpen).not.toHaveBeenCalled();
    });

    it('should fail with SetupTimeoutError when the sentinel never appears', async () => {
      executor.run.mockResolvedValue(missing);

      const error = await provisioner.provision(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SetupTimeoutError);
      expect(error).toMatchObject({ code: 'SETUP_TIMEOUT', attempts: 3, sentinelPath: '/tmp/cloud-init-complete' });
      expect(executor.run).toHaveBeenCalledTimes(3);
    });

    it('should stop with CancelledError when aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(provisioner.provision(request, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
      expect(client.create).toHaveBeenCalledTimes(1);
      expect(client.get).not.toHaveBeenCalled();
    });
  });
});
