/**
 * Storage API client
 *
 * Thin wrapper over the provider's cold-storage REST API. Every call carries
 * the bearer token and a fixed User-Agent; non-2xx answers become RemoteError.
 * No retries: a failed call surfaces immediately.
 */

import type { z } from 'zod';
import { RemoteError, describeError } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger();

export const API_PREFIX = 'storage/c14';
export const USER_AGENT = 'coldpipe/0.1.0';

export type RequestParams = Record<string, unknown>;
export type HttpMethod = 'GET' | 'POST';

export interface ApiClientOptions {
  apiUrl: string;
  apiToken: string;
}

export interface StorageApi {
  get(path: string, params?: RequestParams): Promise<unknown>;
  post(path: string, params?: RequestParams): Promise<unknown>;
}

export class ApiClient implements StorageApi {
  private readonly baseUrl: string;
  private readonly apiToken: string;

  constructor(options: ApiClientOptions) {
    this.baseUrl = `${options.apiUrl.replace(/\/+$/, '')}/${API_PREFIX}`;
    this.apiToken = options.apiToken;
  }

  get(path: string, params: RequestParams = {}): Promise<unknown> {
    return this.request('GET', path, params);
  }

  post(path: string, params: RequestParams = {}): Promise<unknown> {
    return this.request('POST', path, params);
  }

  buildUrl(path: string, query?: RequestParams): string {
    const url = `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
    if (!query) {
      return url;
    }

    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined && value !== null) {
        search.append(key, String(value));
      }
    }
    const qs = search.toString();
    return qs ? `${url}?${qs}` : url;
  }

  private async request(method: HttpMethod, path: string, params: RequestParams): Promise<unknown> {
    const url = this.buildUrl(path, method === 'GET' ? params : undefined);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiToken}`,
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
    };

    let body: string | undefined;
    if (method === 'POST') {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(params);
    }

    logger.debug({ method, url, params }, 'API request');

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, { method, headers, body });
      text = await response.text();
    } catch (error) {
      throw new RemoteError(`${method} ${path} failed: ${describeError(error)}`, undefined, { cause: error });
    }

    const payload = parseBody(text);

    logger.debug({ method, url, status: response.status, body: payload }, 'API response');

    if (!response.ok) {
      throw new RemoteError(remoteMessage(payload, response), response.status);
    }

    if (payload instanceof RawBody) {
      throw new RemoteError(`${method} ${path} returned a non-JSON body`, response.status);
    }

    return payload;
  }
}

/**
 * Validate an API payload against the shape the caller expects.
 */
export function decodeResponse<T extends z.ZodTypeAny>(schema: T, payload: unknown, path: string): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new RemoteError(`Unexpected response from ${path}: ${result.error.issues[0]?.message ?? 'invalid payload'}`);
  }
  return result.data;
}

class RawBody {
  constructor(readonly text: string) {}

  toJSON(): string {
    return this.text;
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return new RawBody(text);
  }
}

function remoteMessage(payload: unknown, response: Response): string {
  if (typeof payload === 'object' && payload !== null && 'error' in payload) {
    const { error } = payload;
    if (typeof error === 'string' && error !== '') {
      return error;
    }
  }
  if (payload instanceof RawBody && payload.text.trim() !== '') {
    return payload.text.trim();
  }
  return `HTTP ${response.status} ${response.statusText}`.trim();
}
