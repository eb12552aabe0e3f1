import { createConnection } from 'net';
import { PortProbe } from './types';

/**
 * Opens (and immediately closes) a raw TCP connection to check a port.
 */
export class TcpPortProbe implements PortProbe {
  constructor(private readonly timeoutMs: number = 5000) {}

  isOpen(host: string, port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = createConnection({ host, port });
      const finish = (open: boolean) => {
        socket.removeAllListeners();
        socket.destroy();
        resolve(open);
      };

      socket.setTimeout(this.timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
    });
  }
}
