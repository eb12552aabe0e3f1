import axios, { AxiosInstance } from 'axios';
import { Logger, silentLogger } from '../logging/logger';

export interface Notifier {
  notify(message: string): Promise<boolean>;
}

export interface WebhookNotifierOptions {
  url?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
  logger?: Logger;
}

/**
 * Posts `{ text }` to a chat-style webhook. Delivery problems are reported as
 * warnings and never reach the caller.
 */
export class WebhookNotifier implements Notifier {
  private readonly url?: string;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: WebhookNotifierOptions = {}) {
    this.url = options.url;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 10000 });
    this.logger = options.logger ?? silentLogger;
  }

  get enabled(): boolean {
    return Boolean(this.url);
  }

  async notify(message: string): Promise<boolean> {
    if (!this.url) {
      return false;
    }

    try {
      const response = await this.http.post(this.url, { text: message }, { validateStatus: () => true });
      if (response.status >= 200 && response.status < 300) {
        return true;
      }
      this.logger.warn(`Webhook notification rejected (HTTP ${response.status})`);
    } catch (error) {
      this.logger.warn(`Webhook notification failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    return false;
  }
}
