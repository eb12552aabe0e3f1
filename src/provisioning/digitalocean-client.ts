import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { ProviderError } from '../errors';
import { ProvisionedResource, ProvisionRequest, ResourceStatus } from '../types';
import { VmProviderClient } from './types';

export const DIGITALOCEAN_API_URL = 'https://api.digitalocean.com/v2';

interface DropletNetwork {
  ip_address: string;
  type: string;
}

interface Droplet {
  id: number | string;
  status: string;
  networks?: {
    v4?: DropletNetwork[];
  };
}

interface DropletEnvelope {
  droplet?: Droplet;
}

export interface DigitalOceanClientOptions {
  apiToken: string;
  baseURL?: string;
  timeoutMs?: number;
  /** Pre-built HTTP client, mainly for tests */
  http?: AxiosInstance;
}

/**
 * Droplet create and lookup against the DigitalOcean v2 API.
 */
export class DigitalOceanClient implements VmProviderClient {
  private readonly http: AxiosInstance;
  private readonly requestConfig: AxiosRequestConfig;

  constructor(options: DigitalOceanClientOptions) {
    this.http = options.http ?? axios.create({
      baseURL: options.baseURL ?? DIGITALOCEAN_API_URL,
      timeout: options.timeoutMs ?? 30000
    });
    this.requestConfig = {
      headers: {
        Authorization: `Bearer ${options.apiToken}`,
        'Content-Type': 'application/json'
      },
      // status codes are mapped by each call
      validateStatus: () => true
    };
  }

  async create(request: ProvisionRequest): Promise<ProvisionedResource> {
    const payload = {
      name: request.name,
      region: request.region,
      size: request.size,
      image: request.image,
      // numeric ids or key fingerprints
      ssh_keys: request.sshKeyIds.map(id => (/^\d+$/.test(id) ? Number(id) : id)),
      user_data: request.initializationScript,
      monitoring: true,
      tags: [...request.tags]
    };

    const response = await this.send('Failed to create droplet', () =>
      this.http.post<DropletEnvelope>('/droplets', payload, this.requestConfig)
    );
    if (!isSuccess(response.status)) {
      throw this.failure('Failed to create droplet', response);
    }

    return this.toResource(response);
  }

  async get(resourceId: string): Promise<ProvisionedResource> {
    const response = await this.send(`Failed to fetch droplet ${resourceId}`, () =>
      this.http.get<DropletEnvelope>(`/droplets/${encodeURIComponent(resourceId)}`, this.requestConfig)
    );
    if (!isSuccess(response.status)) {
      throw this.failure(`Failed to fetch droplet ${resourceId}`, response);
    }

    return this.toResource(response);
  }

  // status codes never throw here, so a rejection is a transport failure
  private async send<T>(message: string, request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await request();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`${message}: ${reason}`, undefined, undefined, error);
    }
  }

  private toResource(response: AxiosResponse<DropletEnvelope>): ProvisionedResource {
    const droplet = response.data?.droplet;
    if (!droplet || droplet.id === undefined) {
      throw new ProviderError('Malformed droplet response', response.status, response.data);
    }

    const publicNetwork = droplet.networks?.v4?.find(network => network.type === 'public');

    return {
      id: String(droplet.id),
      status: mapDropletStatus(droplet.status),
      publicAddress: publicNetwork?.ip_address
    };
  }

  private failure(message: string, response: AxiosResponse<unknown>): ProviderError {
    const detail = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    return new ProviderError(`${message} (HTTP ${response.status}): ${detail}`, response.status, response.data);
  }
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function mapDropletStatus(status: string): ResourceStatus {
  switch (status) {
    case 'new':
      return 'pending';
    case 'active':
      return 'active';
    default:
      return 'failed';
  }
}
