import { describe, it, expect, vi } from 'vitest';
import { ConnectivityChecker } from '../connectivity-checker';
import { CancelledError, DnsLookupError } from '../../errors';
import { DomainRecordSet } from '../../types';

const recordSet = (domain: string, mxRecords: string[]): DomainRecordSet => ({
  domain,
  mxRecords,
  hasMailARecord: true,
  hasSpfRecord: true,
  nameservers: []
});

const trusted = () => ({ isTrusted: vi.fn(async () => true) });

describe('ConnectivityChecker', () => {
  it('should check the mail ports, each MX record and the certificate', async () => {
    const probe = { isOpen: vi.fn(async (_host: string, port: number) => port !== 25) };
    const analyzer = {
      analyze: vi.fn(async (domain: string) =>
        recordSet(domain, domain === 'example.com' ? ['mail.example.com'] : ['mx1.mail.ovh.net']))
    };

    const certificates = trusted();

    const results = await new ConnectivityChecker(probe, certificates, analyzer).run('203.0.113.10', ['example.com', 'example.org']);

    expect(results).toEqual({
      port_25_smtp: 'FAIL',
      port_587_submission: 'PASS',
      port_993_imaps: 'PASS',
      'mx_example.com': 'PASS',
      'mx_example.org': 'FAIL',
      'ssl_mail.example.com': 'PASS'
    });
    expect(certificates.isTrusted.mock.calls).toEqual([['203.0.113.10', 993, 'mail.example.com']]);
    expect(probe.isOpen.mock.calls).toEqual([
      ['203.0.113.10', 25],
      ['203.0.113.10', 587],
      ['203.0.113.10', 993]
    ]);
  });

  it('should log passing checks as success and failing ones as warnings', async () => {
    const probe = { isOpen: vi.fn(async () => true) };
    const analyzer = { analyze: vi.fn(async (domain: string) => recordSet(domain, [])) };
    const logger = { debug: vi.fn(), info: vi.fn(), success: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const certificates = { isTrusted: vi.fn(async () => false) };

    await new ConnectivityChecker(probe, certificates, analyzer, logger).run('203.0.113.10', ['example.com']);

    expect(logger.success.mock.calls.map(([line]) => line)).toEqual([
      'port_25_smtp: PASS',
      'port_587_submission: PASS',
      'port_993_imaps: PASS'
    ]);
    expect(logger.warn.mock.calls.map(([line]) => line)).toEqual([
      'mx_example.com: FAIL',
      'ssl_mail.example.com: FAIL'
    ]);
  });

  it('should fail the MX check when the lookup fails', async () => {
    const analyzer = {
      analyze: vi.fn(async (domain: string): Promise<DomainRecordSet> => {
        throw new DnsLookupError(domain, 'MX', new Error('queryMx ESERVFAIL'));
      })
    };

    const checker = new ConnectivityChecker({ isOpen: vi.fn(async () => true) }, trusted(), analyzer);

    await expect(checker.checkMx('example.com')).resolves.toBe('FAIL');
  });

  it('should skip the certificate check without domains', async () => {
    const certificates = trusted();
    const analyzer = { analyze: vi.fn(async (domain: string) => recordSet(domain, [])) };

    const results = await new ConnectivityChecker({ isOpen: vi.fn(async () => true) }, certificates, analyzer)
      .run('203.0.113.10', []);

    expect(Object.keys(results)).toEqual(['port_25_smtp', 'port_587_submission', 'port_993_imaps']);
    expect(certificates.isTrusted).not.toHaveBeenCalled();
  });

  describe('MX propagation', () => {
    const budget = { maxAttempts: 5, intervalMs: 0 };

    it('should pass on the lookup where the MX record appears', async () => {
      let lookups = 0;
      const analyzer = {
        analyze: vi.fn(async (domain: string) => {
          lookups++;
          return recordSet(domain, lookups >= 3 ? ['mail.example.com'] : ['mx1.mail.ovh.net']);
        })
      };
      const checker = new ConnectivityChecker({ isOpen: vi.fn(async () => true) }, trusted(), analyzer, undefined, budget);

      await expect(checker.checkMx('example.com')).resolves.toBe('PASS');
      expect(analyzer.analyze).toHaveBeenCalledTimes(3);
    });

    it('should keep waiting after a failed lookup', async () => {
      const analyzer = {
        analyze: vi.fn(async (domain: string) => recordSet(domain, ['mail.example.com']))
      };
      analyzer.analyze.mockRejectedValueOnce(new DnsLookupError('example.com', 'MX', new Error('queryMx ETIMEOUT')));
      const checker = new ConnectivityChecker({ isOpen: vi.fn(async () => true) }, trusted(), analyzer, undefined, budget);

      await expect(checker.checkMx('example.com')).resolves.toBe('PASS');
      expect(analyzer.analyze).toHaveBeenCalledTimes(2);
    });

    it('should fail once the budget is spent', async () => {
      const analyzer = { analyze: vi.fn(async (domain: string) => recordSet(domain, ['mx1.mail.ovh.net'])) };
      const checker = new ConnectivityChecker({ isOpen: vi.fn(async () => true) }, trusted(), analyzer, undefined, budget);

      await expect(checker.checkMx('example.com')).resolves.toBe('FAIL');
      expect(analyzer.analyze).toHaveBeenCalledTimes(5);
    });

    it('should stop waiting when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const analyzer = { analyze: vi.fn(async (domain: string) => recordSet(domain, [])) };
      const checker = new ConnectivityChecker({ isOpen: vi.fn(async () => true) }, trusted(), analyzer, undefined, budget);

      await expect(checker.checkMx('example.com', { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
      expect(analyzer.analyze).not.toHaveBeenCalled();
    });
  });
});
