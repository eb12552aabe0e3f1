import { connect } from 'tls';

export interface CertificateVerifier {
  /** Resolves true when the certificate served for `servername` verifies */
  isTrusted(host: string, port: number, servername: string): Promise<boolean>;
}

export interface TlsCertificateVerifierOptions {
  timeoutMs?: number;
  /** Trusted roots in place of the system ones */
  ca?: string | Buffer;
}

/**
 * Completes a TLS handshake and reports whether the peer certificate chains
 * to a trusted root and matches the server name.
 */
export class TlsCertificateVerifier implements CertificateVerifier {
  private readonly timeoutMs: number;
  private readonly ca?: string | Buffer;

  constructor(options: TlsCertificateVerifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.ca = options.ca;
  }

  isTrusted(host: string, port: number, servername: string): Promise<boolean> {
    return new Promise((resolve) => {
      // verification failures are read from `authorized` instead of aborting the handshake
      const socket = connect({ host, port, servername, ca: this.ca, rejectUnauthorized: false });
      const finish = (trusted: boolean) => {
        socket.removeAllListeners();
        socket.destroy();
        resolve(trusted);
      };

      socket.setTimeout(this.timeoutMs);
      socket.once('secureConnect', () => finish(socket.authorized));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
    });
  }
}
