// Provisioning-specific types
import { ProvisionedResource, ProvisionRequest } from '../types';
import { RemoteCommand } from './remote-command';

export interface VmProviderClient {
  create(request: ProvisionRequest): Promise<ProvisionedResource>;
  get(resourceId: string): Promise<ProvisionedResource>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RemoteExecutor {
  run(host: string, command: RemoteCommand): Promise<CommandResult>;
}

export interface PortProbe {
  isOpen(host: string, port: number): Promise<boolean>;
}
