/**
 * Naming for the server and for the per-run report directory
 */
export class ResourceNamingService {
  /** Droplet names are used as hostnames, so one DNS label */
  private readonly maxServerNameLength = 63;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * `mail-server-<unix seconds>`, or `<prefix>-<unix seconds>`
   */
  serverName(prefix: string = 'mail-server'): string {
    const seconds = Math.floor(this.now().getTime() / 1000);
    const name = this.sanitizeName(`${prefix}-${seconds}`);
    return this.validateAndTruncate(name, this.maxServerNameLength);
  }

  /**
   * `vps_email_deployment_YYYYMMDD_HHMMSS` in local time
   */
  reportDirectoryName(): string {
    const date = this.now();
    const pad = (value: number) => String(value).padStart(2, '0');
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `vps_email_deployment_${day}_${time}`;
  }

  /**
   * Sanitize name to be hostname-compliant
   * - Remove invalid characters
   * - Ensure it starts with a letter
   * - Replace consecutive hyphens with single hyphen
   */
  sanitizeName(name: string): string {
    let sanitized = name.toLowerCase().replace(/[^a-z0-9-]/g, '-');
    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-z]/.test(sanitized)) {
      sanitized = 'mail-' + sanitized;
    }
    if (!sanitized) {
      sanitized = 'mail-server';
    }
    return sanitized;
  }

  /**
   * Truncate to `maxLength`, keeping a hash of the full name for uniqueness
   */
  validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1; // -1 for hyphen
    return name.substring(0, truncatedLength) + '-' + hash;
  }

  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      hash = ((hash << 5) - hash) + input.charCodeAt(i);
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

/**
 * Convenience function to create a new resource naming service
 */
export function createNamingService(now?: () => Date): ResourceNamingService {
  return new ResourceNamingService(now);
}
