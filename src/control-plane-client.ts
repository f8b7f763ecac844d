import { sleep } from './concurrency.js';
import { logger } from './logger.js';
import { AppVersionsSchema } from './schemas.js';
import type { ApiResponse } from './types.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface ControlPlaneClientOptions {
  apiUrl: string;
  authToken: string;
  apiVersion?: string;
  retryDelayMs?: number;
  fetch?: typeof fetch;
}

export interface RequestOptions {
  params?: Record<string, string | number | boolean>;
  body?: unknown;
  maxRetries?: number;
  /** Retry once more on 502, whatever `maxRetries` says. */
  retryOnBadGateway?: boolean;
  /** Cancels the request in flight and any retry wait. */
  signal?: AbortSignal;
}

const API_VERSION_HEADER = 'X-Neocortix-Cloud-API-Version';
const AUTH_TOKEN_HEADER = 'X-Neocortix-Cloud-API-AuthToken';
const BAD_GATEWAY = 502;

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return {};
  }
}

/**
 * JSON/HTTPS client for the instance control plane.
 *
 * HTTP error statuses are never thrown: they are retried a bounded number of
 * times with a fixed delay and then returned to the caller. Network-level
 * failures (refused connection, DNS) reject.
 */
export class ControlPlaneClient {
  private readonly apiUrl: string;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly headers: Record<string, string>;

  constructor(options: ControlPlaneClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.retryDelayMs = options.retryDelayMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      [API_VERSION_HEADER]: options.apiVersion ?? '1',
      [AUTH_TOKEN_HEADER]: options.authToken,
    };
  }

  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const url = this.buildUrl(path, options.params);
    const body = options.body === undefined ? undefined : JSON.stringify(options.body);
    let retriesLeft = options.maxRetries ?? 1;
    let badGatewayRetryLeft = options.retryOnBadGateway === true;
    let attempt = 0;

    for (;;) {
      attempt++;
      options.signal?.throwIfAborted();
      const resp = await this.fetchImpl(url, { method, headers: this.headers, body, signal: options.signal });
      const text = await resp.text();
      const response: ApiResponse = { content: parseBody(text), statusCode: resp.status };
      if (isSuccess(resp.status)) {
        return response;
      }

      logger.warn({ statusCode: resp.status, method, path, body: text }, 'error code from server');
      if (retriesLeft > 0) {
        retriesLeft--;
      } else if (resp.status === BAD_GATEWAY && badGatewayRetryLeft) {
        badGatewayRetryLeft = false;
      } else {
        return response;
      }

      logger.info({ method, path, attempt, delayMs: this.retryDelayMs }, 'retrying request');
      await sleep(this.retryDelayMs, options.signal);
    }
  }

  async getAppVersions(): Promise<Array<number | string>> {
    const response = await this.request('GET', 'info/mobile-app-versions');
    const parsed = AppVersionsSchema.safeParse(response.content);
    if (!parsed.success) {
      return [];
    }
    const versions = parsed.data.map((v) => v.value);
    logger.debug({ versions }, 'app versions');
    return versions;
  }

  /** Single attempt; a failed launch is recovered by job id in the lifecycle controller. */
  createInstances(body: Record<string, unknown>): Promise<ApiResponse> {
    return this.request('POST', 'instances', { body, maxRetries: 0 });
  }

  listInstances(filter?: Record<string, string>, maxRetries = 1): Promise<ApiResponse> {
    return this.request('GET', 'instances', { params: filter, maxRetries });
  }

  getInstance(instanceId: string, signal?: AbortSignal): Promise<ApiResponse> {
    return this.request('GET', `instances/${encodeURIComponent(instanceId)}`, {
      params: { 'show-device-info': true },
      signal,
    });
  }

  async deleteInstance(instanceId: string): Promise<number> {
    const response = await this.request('DELETE', `instances/${encodeURIComponent(instanceId)}`, {
      maxRetries: 0,
      retryOnBadGateway: true,
    });
    return response.statusCode;
  }

  private buildUrl(path: string, params?: RequestOptions['params']): string {
    const url = new URL(`${this.apiUrl}/${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }
}

export type ControlPlaneApi = Pick<
  ControlPlaneClient,
  'getAppVersions' | 'createInstances' | 'listInstances' | 'getInstance' | 'deleteInstance'
>;
