import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { Logger, silentLogger } from '../logging/logger';
import { DnsRecord } from '../types';

export const CLOUDFLARE_API_URL = 'https://api.cloudflare.com/client/v4';

interface CloudflareEnvelope {
  success?: boolean;
  errors?: Array<{ code?: number; message?: string }>;
}

export interface CloudflareClientOptions {
  apiToken: string;
  baseURL?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  logger?: Logger;
}

export class CloudflareDnsClient {
  private readonly http: AxiosInstance;
  private readonly requestConfig: AxiosRequestConfig;
  private readonly logger: Logger;

  constructor(options: CloudflareClientOptions) {
    this.http = options.http ?? axios.create({
      baseURL: options.baseURL ?? CLOUDFLARE_API_URL,
      timeout: options.timeoutMs ?? 15000
    });
    this.requestConfig = {
      headers: {
        Authorization: `Bearer ${options.apiToken}`,
        'Content-Type': 'application/json'
      },
      validateStatus: () => true
    };
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @returns whether Cloudflare accepted the record
   */
  async createRecord(zoneId: string, record: DnsRecord): Promise<boolean> {
    const payload: Record<string, string | number> = {
      type: record.type,
      name: record.name,
      content: record.content,
      ttl: record.ttl
    };
    if (record.priority !== undefined) {
      payload.priority = record.priority;
    }

    let response: AxiosResponse<CloudflareEnvelope>;
    try {
      response = await this.http.post<CloudflareEnvelope>(
        `/zones/${encodeURIComponent(zoneId)}/dns_records`,
        payload,
        this.requestConfig
      );
    } catch (error) {
      this.logger.warn(`Failed to create ${record.type} record ${record.name}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }

    const accepted = response.status >= 200 && response.status < 300 && response.data?.success === true;
    if (accepted) {
      this.logger.success(`Created ${record.type} record ${record.name} → ${record.content}`);
    } else {
      const reasons = (response.data?.errors ?? []).map(error => error.message).filter(Boolean).join('; ');
      this.logger.warn(`Failed to create ${record.type} record ${record.name} (HTTP ${response.status})${reasons ? `: ${reasons}` : ''}`);
    }
    return accepted;
  }
}
