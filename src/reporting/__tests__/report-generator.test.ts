import { describe, it, expect, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  CREDENTIALS_FILE,
  escapeCsvField,
  REPORT_FILE,
  ReportGenerator,
  toCsv,
  writeReport
} from '../report-generator';
import { EmailAccount } from '../../types';

const account = (address: string, secret: string): EmailAccount => {
  const [username, domain] = address.split('@');
  return {
    address,
    domain,
    username,
    secret,
    mailHost: `mail.${domain}`,
    submissionPort: 587,
    imapPort: 993
  };
};

const accounts = [
  account('alex.smith@example.com', 'test-secret-1'),
  account('sam.lee@example.org', 'test-secret-2')
];

const fixedNow = () => new Date('2024-03-05T07:08:09.000Z');

describe('toCsv', () => {
  it('should write the header and one row per account', () => {
    expect(toCsv(accounts)).toBe(
      'Email,Password,SMTP_Host,SMTP_Port,IMAP_Host,IMAP_Port\n' +
      'alex.smith@example.com,test-secret-1,mail.example.com,587,mail.example.com,993\n' +
      'sam.lee@example.org,test-secret-2,mail.example.org,587,mail.example.org,993\n'
    );
  });

  it('should write only the header without accounts', () => {
    expect(toCsv([])).toBe('Email,Password,SMTP_Host,SMTP_Port,IMAP_Host,IMAP_Port\n');
  });

  it('should quote secrets that contain separators', () => {
    const [, row] = toCsv([account('alex.smith@example.com', 'a,b"c')]).split('\n');

    expect(row).toBe('alex.smith@example.com,"a,b""c",mail.example.com,587,mail.example.com,993');
  });
});

describe('escapeCsvField', () => {
  it('should leave plain fields alone', () => {
    expect(escapeCsvField('test-secret')).toBe('test-secret');
    expect(escapeCsvField(587)).toBe('587');
  });

  it('should quote line breaks', () => {
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('ReportGenerator', () => {
  it('should describe the deployment and every account', () => {
    const report = new ReportGenerator(fixedNow).generate(accounts, {
      deploymentId: 'deployment-1',
      address: '203.0.113.10',
      domains: ['example.com', 'example.org']
    });

    expect(report.structured).toEqual({
      deploymentInfo: {
        deploymentId: 'deployment-1',
        timestamp: '2024-03-05T07:08:09.000Z',
        address: '203.0.113.10',
        domains: ['example.com', 'example.org'],
        totalAccounts: 2
      },
      emailAccounts: [
        {
          email: 'alex.smith@example.com',
          password: 'test-secret-1',
          smtp: { host: 'mail.example.com', port: 587 },
          imap: { host: 'mail.example.com', port: 993 }
        },
        {
          email: 'sam.lee@example.org',
          password: 'test-secret-2',
          smtp: { host: 'mail.example.org', port: 587 },
          imap: { host: 'mail.example.org', port: 993 }
        }
      ]
    });
    expect(report.tabular).toBe(toCsv(accounts));
  });

  it('should include database credentials and check results when given', () => {
    const report = new ReportGenerator(fixedNow).generate([], {
      deploymentId: 'deployment-1',
      address: '203.0.113.10',
      domains: ['example.com'],
      database: { rootPassword: 'test-root-secret', mailUserPassword: 'test-secret' },
      tests: { port_25_smtp: 'PASS', 'mx_example.com': 'FAIL' }
    });

    expect(report.structured.deploymentInfo.totalAccounts).toBe(0);
    expect(report.structured.serverDetails).toEqual({ rootPassword: 'test-root-secret', mailUserPassword: 'test-secret' });
    expect(report.structured.tests).toEqual({ port_25_smtp: 'PASS', 'mx_example.com': 'FAIL' });
    expect(report.structured.dns).toBeUndefined();
  });

  it('should produce identical output for identical input', () => {
    const generator = new ReportGenerator(fixedNow);
    const context = { deploymentId: 'deployment-1', address: '203.0.113.10', domains: ['example.com'] };

    expect(generator.generate(accounts, context)).toEqual(generator.generate(accounts, context));
  });
});

describe('writeReport', () => {
  let directory: string | undefined;

  afterEach(async () => {
    if (directory) {
      await fs.rm(directory, { recursive: true, force: true });
      directory = undefined;
    }
  });

  it('should write owner-only files into a new directory', async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'mail-report-'));
    const target = path.join(directory, 'vps_email_deployment_20240305_070809');
    const report = new ReportGenerator(fixedNow).generate(accounts, {
      deploymentId: 'deployment-1',
      address: '203.0.113.10',
      domains: ['example.com']
    });

    const written = await writeReport(report, target, { 'dns_instructions.txt': 'DNS\n' });

    expect(written).toEqual([
      path.join(target, REPORT_FILE),
      path.join(target, CREDENTIALS_FILE),
      path.join(target, 'dns_instructions.txt')
    ]);
    for (const file of written) {
      expect((await fs.stat(file)).mode & 0o777).toBe(0o600);
    }
    expect(JSON.parse(await fs.readFile(written[0], 'utf8'))).toEqual(report.structured);
    expect(await fs.readFile(written[1], 'utf8')).toBe(report.tabular);
    expect(await fs.readFile(written[2], 'utf8')).toBe('DNS\n');
  });

  it('should tighten permissions on files that already exist', async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'mail-report-'));
    const existing = path.join(directory, CREDENTIALS_FILE);
    await fs.writeFile(existing, 'old', { mode: 0o644 });
    const report = new ReportGenerator(fixedNow).generate([], {
      deploymentId: 'deployment-1',
      address: '203.0.113.10',
      domains: ['example.com']
    });

    await writeReport(report, directory);

    expect((await fs.stat(existing)).mode & 0o777).toBe(0o600);
    expect(await fs.readFile(existing, 'utf8')).toBe('Email,Password,SMTP_Host,SMTP_Port,IMAP_Host,IMAP_Port\n');
  });
});
