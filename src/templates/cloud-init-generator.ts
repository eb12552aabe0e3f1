import { MAIL_DATABASE, MAILDIR_ROOT } from '../mailserver/mail-server-configurator';
import { quoteArgument, sqlLiteral } from '../provisioning/remote-command';
import { CloudInitContext, TemplateGenerator } from './types';

export const MAIL_PACKAGES = [
  'postfix', 'postfix-mysql',
  'dovecot-core', 'dovecot-imapd', 'dovecot-pop3d', 'dovecot-lmtpd', 'dovecot-mysql',
  'mysql-server',
  'nginx',
  'certbot', 'python3-certbot-nginx',
  'fail2ban',
  'ufw'
];

export const FIREWALL_PORTS = [22, 25, 53, 80, 110, 143, 443, 465, 587, 993, 995];

const MAIL_DB_USER = 'mailuser';

/**
 * Renders the user-data script the new machine runs on first boot. The last
 * thing it does is create the sentinel file the provisioner waits for.
 */
export class CloudInitGenerator implements TemplateGenerator<CloudInitContext> {
  generate(context: CloudInitContext): string {
    const packages = [...MAIL_PACKAGES, ...(context.extraPackages ?? [])];

    return [
      '#!/bin/bash',
      '# Mail server bootstrap',
      'set -euo pipefail',
      'export DEBIAN_FRONTEND=noninteractive',
      '',
      'apt-get update && apt-get upgrade -y',
      `apt-get install -y \\\n    ${packages.map(quoteArgument).join(' \\\n    ')}`,
      '',
      this.databaseSection(context),
      '',
      '# Virtual mail owner',
      'groupadd -g 5000 vmail || true',
      `useradd -g vmail -u 5000 vmail -d /var/mail || true`,
      `mkdir -p ${MAILDIR_ROOT}`,
      'chown -R vmail:vmail /var/mail',
      '',
      '# Firewall',
      `ufw allow ${FIREWALL_PORTS.join(',')}/tcp`,
      'ufw --force enable',
      '',
      '# Signal completion',
      `touch ${quoteArgument(context.sentinelPath)}`,
      'echo "Mail server bootstrap completed at $(date)" > /tmp/setup-log.txt',
      ''
    ].join('\n');
  }

  private databaseSection(context: CloudInitContext): string {
    const root = context.database.rootPassword;
    const mail = context.database.mailUserPassword;
    const cnfPassword = root.replace(/\\/g, '\\\\').replace(/"/g, '\\"');

    return [
      '# Database',
      "mysql <<'SQL'",
      `ALTER USER 'root'@'localhost' IDENTIFIED WITH mysql_native_password BY ${sqlLiteral(root)};`,
      `CREATE DATABASE IF NOT EXISTS ${MAIL_DATABASE};`,
      `CREATE USER IF NOT EXISTS '${MAIL_DB_USER}'@'localhost' IDENTIFIED BY ${sqlLiteral(mail)};`,
      `GRANT ALL ON ${MAIL_DATABASE}.* TO '${MAIL_DB_USER}'@'localhost';`,
      'FLUSH PRIVILEGES;',
      'SQL',
      '',
      "cat > /root/.my.cnf <<'CNF'",
      '[client]',
      'user=root',
      `password="${cnfPassword}"`,
      'CNF',
      'chmod 600 /root/.my.cnf'
    ].join('\n');
  }
}
