import { spawn } from 'child_process';
import { SshUnavailableError } from '../errors';
import { CommandResult, RemoteExecutor } from './types';
import { RemoteCommand, renderCommand } from './remote-command';

export interface SshExecutorOptions {
  user?: string;
  connectTimeoutSeconds?: number;
  /** Path of the ssh binary */
  sshPath?: string;
  identityFile?: string;
}

/**
 * Runs typed commands through the system `ssh` client in batch mode.
 * A failed connection is reported as exit status 255, like ssh itself does;
 * a client that cannot be started rejects with {@link SshUnavailableError}.
 */
export class SshExecutor implements RemoteExecutor {
  private readonly user: string;
  private readonly connectTimeoutSeconds: number;
  private readonly sshPath: string;
  private readonly identityFile?: string;

  constructor(options: SshExecutorOptions = {}) {
    this.user = options.user ?? 'root';
    this.connectTimeoutSeconds = options.connectTimeoutSeconds ?? 10;
    this.sshPath = options.sshPath ?? 'ssh';
    this.identityFile = options.identityFile;
  }

  buildArguments(host: string, remote: RemoteCommand): string[] {
    const args = [
      '-o', 'BatchMode=yes',
      '-o', 'StrictHostKeyChecking=no',
      '-o', `ConnectTimeout=${this.connectTimeoutSeconds}`
    ];
    if (this.identityFile) {
      args.push('-i', this.identityFile);
    }
    args.push(`${this.user}@${host}`, '--', renderCommand(remote));
    return args;
  }

  run(host: string, remote: RemoteCommand): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.sshPath, this.buildArguments(host, remote), {
        stdio: ['pipe', 'pipe', 'pipe']
      });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => { stdout += chunk; });
      child.stderr.on('data', (chunk: string) => { stderr += chunk; });

      child.on('error', (error) => {
        reject(new SshUnavailableError(this.sshPath, error));
      });
      child.on('close', (code) => {
        resolve({ stdout, stderr, exitCode: code ?? 255 });
      });

      // ssh can exit before reading all of stdin; its exit status carries the failure
      child.stdin.on('error', (error) => {
        stderr += `${error.message}\n`;
      });
      child.stdin.end(remote.stdin ?? '');
    });
  }
}
