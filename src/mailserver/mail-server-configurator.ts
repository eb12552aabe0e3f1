import { mailHostFor } from '../dns/dns-analyzer';
import { RemoteCommandError } from '../errors';
import { Logger, silentLogger } from '../logging/logger';
import { command, RemoteCommand, renderCommand, sqlLiteral, withStdin } from '../provisioning/remote-command';
import { CommandResult, RemoteExecutor } from '../provisioning/types';
import { EmailAccount } from '../types';

export const MAIL_DATABASE = 'mailserver';
export const MAILDIR_ROOT = '/var/mail/vhosts';

export const MAIL_SCHEMA_SQL = `CREATE TABLE IF NOT EXISTS domains (
  id INT AUTO_INCREMENT PRIMARY KEY,
  domain VARCHAR(255) NOT NULL UNIQUE,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS users (
  id INT AUTO_INCREMENT PRIMARY KEY,
  domain_id INT,
  email VARCHAR(255) NOT NULL UNIQUE,
  password VARCHAR(255) NOT NULL,
  quota INT DEFAULT 1024,
  enabled BOOLEAN DEFAULT TRUE,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (domain_id) REFERENCES domains(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS aliases (
  id INT AUTO_INCREMENT PRIMARY KEY,
  source VARCHAR(255) NOT NULL,
  destination VARCHAR(255) NOT NULL,
  domain_id INT,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (domain_id) REFERENCES domains(id) ON DELETE CASCADE
);
`;

/**
 * Prepares the mail database, mailboxes and TLS certificate on the server
 * through typed remote commands. SQL and secrets travel on stdin.
 */
export class MailServerConfigurator {
  constructor(
    private readonly executor: RemoteExecutor,
    private readonly host: string,
    private readonly logger: Logger = silentLogger
  ) {}

  /** Runs the first-boot script on a server that was not created with it */
  async bootstrap(script: string): Promise<void> {
    this.logger.info(`Running the bootstrap script on ${this.host}...`);
    await this.execute(withStdin(command('bash', '-s'), script));
    this.logger.success('Bootstrap script finished');
  }

  async prepareDatabase(): Promise<void> {
    await this.sql(MAIL_SCHEMA_SQL);
    this.logger.success('Mail database schema is in place');
  }

  async registerDomain(domain: string): Promise<void> {
    await this.sql(`INSERT IGNORE INTO domains (domain) VALUES (${sqlLiteral(domain)});\n`);
    this.logger.info(`Registered domain ${domain}`);
  }

  async createMailbox(account: EmailAccount): Promise<void> {
    const hashed = await this.execute(withStdin(command('openssl', 'passwd', '-6', '-stdin'), `${account.secret}\n`));
    const passwordHash = `{SHA512-CRYPT}${hashed.stdout.trim()}`;

    await this.sql(
      'INSERT INTO users (email, password, domain_id) ' +
      `SELECT ${sqlLiteral(account.address)}, ${sqlLiteral(passwordHash)}, id FROM domains WHERE domain = ${sqlLiteral(account.domain)};\n`
    );

    await this.execute(command('mkdir', '-p', `${MAILDIR_ROOT}/${account.domain}/${account.username}`));
    await this.execute(command('chown', '-R', 'vmail:vmail', `${MAILDIR_ROOT}/${account.domain}`));
    this.logger.success(`Created mailbox ${account.address}`);
  }

  async issueCertificate(primaryDomain: string, adminEmail: string): Promise<void> {
    const mailHost = mailHostFor(primaryDomain);

    const startNginx = command('systemctl', 'start', 'nginx');

    await this.execute(command('systemctl', 'stop', 'nginx'));
    try {
      await this.execute(command(
        'certbot', 'certonly', '--standalone',
        '-d', mailHost,
        '--non-interactive', '--agree-tos',
        '--email', adminEmail
      ));
    } catch (error) {
      // the certbot failure is the one reported
      await this.execute(startNginx).catch((restartError: unknown) => {
        this.logger.error(`Failed to restart nginx: ${restartError instanceof Error ? restartError.message : String(restartError)}`);
      });
      throw error;
    }
    await this.execute(startNginx);
    await this.execute(command('systemctl', 'enable', 'certbot.timer'));
    this.logger.success(`Issued certificate for ${mailHost}`);
  }

  async restartServices(): Promise<void> {
    await this.execute(command('systemctl', 'restart', 'postfix', 'dovecot'));
    this.logger.success('Restarted postfix and dovecot');
  }

  private sql(statements: string): Promise<CommandResult> {
    return this.execute(withStdin(command('mysql', MAIL_DATABASE), statements));
  }

  private async execute(remote: RemoteCommand): Promise<CommandResult> {
    const rendered = renderCommand(remote);
    this.logger.debug(`${this.host}$ ${rendered}`);

    const result = await this.executor.run(this.host, remote);
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(rendered, result.exitCode, result.stderr);
    }
    return result;
  }
}
