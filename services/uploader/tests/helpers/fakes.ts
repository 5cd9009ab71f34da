import type { AccessOptions } from 'basic-ftp';
import type { Readable } from 'stream';
import type { HttpMethod, RequestParams, StorageApi } from '../../src/lib/apiClient.js';
import type { FtpClient } from '../../src/lib/ftpTransfer.js';

export interface RecordedCall {
  method: HttpMethod;
  path: string;
  params: RequestParams;
}

/**
 * In-memory StorageApi. Each route answers from a queue; the last entry
 * repeats once the queue is drained. Error entries are thrown.
 */
export class FakeStorageApi implements StorageApi {
  readonly calls: RecordedCall[] = [];
  private readonly routes: Map<string, unknown[]> = new Map();

  reply(method: HttpMethod, path: string, ...bodies: unknown[]): this {
    this.routes.set(`${method} ${path}`, bodies);
    return this;
  }

  callsTo(method: HttpMethod, path: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && call.path === path);
  }

  async get(path: string, params: RequestParams = {}): Promise<unknown> {
    return this.dispatch('GET', path, params);
  }

  async post(path: string, params: RequestParams = {}): Promise<unknown> {
    return this.dispatch('POST', path, params);
  }

  private dispatch(method: HttpMethod, path: string, params: RequestParams): unknown {
    this.calls.push({ method, path, params });

    const queue = this.routes.get(`${method} ${path}`);
    if (!queue || queue.length === 0) {
      throw new Error(`Unexpected ${method} ${path}`);
    }

    const body = queue.length > 1 ? queue.shift() : queue[0];
    if (body instanceof Error) {
      throw body;
    }
    return body;
  }
}

export class FakeFtpClient implements FtpClient {
  accessed: AccessOptions | null = null;
  uploaded: { path: string; bytes: number } | null = null;
  closed = false;
  accessError: Error | null = null;
  uploadError: Error | null = null;

  async access(options: AccessOptions): Promise<void> {
    if (this.accessError) {
      throw this.accessError;
    }
    this.accessed = options;
  }

  async uploadFrom(source: Readable, toRemotePath: string): Promise<void> {
    if (this.uploadError) {
      throw this.uploadError;
    }

    let bytes = 0;
    for await (const chunk of source) {
      bytes += Buffer.from(chunk).length;
    }
    this.uploaded = { path: toRemotePath, bytes };
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Clock whose sleep advances time instantly.
 */
export function createFakeClock() {
  let current = 0;
  const sleeps: number[] = [];

  return {
    sleeps,
    now: () => current,
    sleep: async (ms: number): Promise<void> => {
      sleeps.push(ms);
      current += ms;
    },
  };
}
