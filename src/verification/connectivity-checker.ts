import { DnsAnalyzer, mailHostFor } from '../dns/dns-analyzer';
import { DnsPropagationError } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { PortProbe } from '../provisioning/types';
import { notReady, ready, waitFor } from '../provisioning/wait';
import { CheckOutcome, ConnectivityResults, WaitBudget } from '../types';
import { CertificateVerifier } from './tls-verifier';

export const MAIL_PORTS = [
  { name: 'smtp', port: 25 },
  { name: 'submission', port: 587 },
  { name: 'imaps', port: 993 }
] as const;

export const IMAPS_PORT = 993;

/** A single lookup, for callers that do not wait for propagation */
export const SINGLE_LOOKUP: WaitBudget = { maxAttempts: 1, intervalMs: 0 };

export interface CheckOptions {
  signal?: AbortSignal;
}

export class ConnectivityChecker {
  constructor(
    private readonly probe: PortProbe,
    private readonly certificates: CertificateVerifier,
    private readonly analyzer: Pick<DnsAnalyzer, 'analyze'>,
    private readonly logger: Logger = silentLogger,
    private readonly propagation: WaitBudget = SINGLE_LOOKUP
  ) {}

  async run(address: string, domains: readonly string[], options: CheckOptions = {}): Promise<ConnectivityResults> {
    this.logger.info('Running connectivity checks...');
    const results: ConnectivityResults = {};

    for (const { name, port } of MAIL_PORTS) {
      results[`port_${port}_${name}`] = outcome(await this.probe.isOpen(address, port));
    }
    for (const domain of domains) {
      results[`mx_${domain}`] = await this.checkMx(domain, options);
    }
    const [primary] = domains;
    if (primary) {
      const mailHost = mailHostFor(primary);
      results[`ssl_${mailHost}`] = await this.checkCertificate(address, mailHost);
    }

    for (const [check, result] of Object.entries(results)) {
      if (result === 'PASS') {
        this.logger.success(`${check}: PASS`);
      } else {
        this.logger.warn(`${check}: FAIL`);
      }
    }
    return results;
  }

  /**
   * PASS once `mail.<domain>` is published as an MX host. Lookups repeat
   * within the propagation budget; a failed lookup counts as not propagated.
   */
  async checkMx(domain: string, options: CheckOptions = {}): Promise<CheckOutcome> {
    const mailHost = mailHostFor(domain);

    try {
      return await waitFor(
        async (attempt) => {
          try {
            const recordSet = await this.analyzer.analyze(domain);
            return recordSet.mxRecords.includes(mailHost) ? ready<CheckOutcome>('PASS') : notReady;
          } catch (error) {
            this.logger.debug(`MX lookup ${attempt} for ${domain} failed: ${error instanceof Error ? error.message : String(error)}`);
            return notReady;
          }
        },
        { ...this.propagation, signal: options.signal, label: `Waiting for the MX record of ${domain}` },
        (attempts) => new DnsPropagationError(domain, attempts)
      );
    } catch (error) {
      if (error instanceof DnsPropagationError) {
        this.logger.debug(error.message);
        return 'FAIL';
      }
      throw error;
    }
  }

  /** PASS when the IMAPS certificate verifies for `servername` */
  async checkCertificate(address: string, servername: string): Promise<CheckOutcome> {
    return outcome(await this.certificates.isTrusted(address, IMAPS_PORT, servername));
  }
}

function outcome(passed: boolean): CheckOutcome {
  return passed ? 'PASS' : 'FAIL';
}
