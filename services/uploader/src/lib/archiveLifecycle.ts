/**
 * Archive Lifecycle
 *
 * Drives one archive through the provider's provisioning sequence:
 *
 *   created -> provisioning -> ready -> uploading -> uploaded -> finalized
 *
 * Calls made out of order fail with LifecycleError before anything is sent
 * to the API.
 */

import type { Readable } from 'stream';
import { z } from 'zod';
import { decodeResponse, type StorageApi } from './apiClient.js';
import { LifecycleError, TimeoutError } from './errors.js';
import type { ArchiveUploader } from './ftpTransfer.js';
import { getLogger } from './logger.js';

const logger = getLogger();

export const DEFAULT_TIMEOUT_MS = 300 * 1000;
export const POLL_INTERVAL_MS = 10 * 1000;
export const DEFAULT_RETENTION_DAYS = 2;

export type ArchiveState = 'created' | 'provisioning' | 'ready' | 'uploading' | 'uploaded' | 'finalized';

const JobSchema = z
  .object({
    type: z.string(),
    status: z.string(),
    progress: z.number().min(0).max(100).default(0),
  })
  .passthrough();

const JobListSchema = z.array(JobSchema);

// The create call answers with the bare uuid; some deployments wrap it
const CreatedArchiveSchema = z.union([
  z.string().min(1),
  z.object({ uuid_ref: z.string().min(1) }).transform((archive) => archive.uuid_ref),
]);

export type Job = z.infer<typeof JobSchema>;

export interface ArchiveLifecycleOptions {
  api: StorageApi;
  uploader: ArchiveUploader;
  safeId: string;
  platformId: string;
  retentionDays?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ArchiveLifecycle {
  private readonly api: StorageApi;
  private readonly uploader: ArchiveUploader;
  private readonly safeId: string;
  private readonly platformId: string;
  private readonly retentionDays: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly states: Map<string, ArchiveState> = new Map();

  constructor(options: ArchiveLifecycleOptions) {
    this.api = options.api;
    this.uploader = options.uploader;
    this.safeId = options.safeId;
    this.platformId = options.platformId;
    this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => performance.now());
  }

  stateOf(archiveId: string): ArchiveState | undefined {
    return this.states.get(archiveId);
  }

  async create(name: string, description: string): Promise<string> {
    const path = `safe/${this.safeId}/archive`;
    const response = await this.api.post(path, {
      name,
      description,
      parity: 'standard',
      crypto: 'none',
      protocols: ['FTP'],
      days: this.retentionDays,
      platforms: [this.platformId],
    });

    const archiveId = decodeResponse(CreatedArchiveSchema, response, path);
    this.states.set(archiveId, 'created');

    logger.info({ archiveId, name }, 'Archive created');
    return archiveId;
  }

  async listJobs(archiveId: string): Promise<Job[]> {
    const path = `safe/${this.safeId}/archive/${archiveId}/job`;
    return decodeResponse(JobListSchema, await this.api.get(path), path);
  }

  async listIncompleteJobs(archiveId: string): Promise<Job[]> {
    const jobs = await this.listJobs(archiveId);
    return jobs.filter((job) => job.status !== 'done');
  }

  /**
   * Poll the archive's jobs until none is left incomplete.
   *
   * The deadline is only checked after each sleep, so a run can overshoot
   * `timeoutMs` by up to one poll interval.
   */
  async waitForReady(archiveId: string, timeoutMs: number = DEFAULT_TIMEOUT_MS): Promise<void> {
    const state = this.expectState(archiveId, ['created', 'provisioning', 'ready'], 'wait for');
    if (state === 'ready') {
      return;
    }

    this.states.set(archiveId, 'provisioning');
    const startedAt = this.now();

    for (;;) {
      const incomplete = await this.listIncompleteJobs(archiveId);
      if (incomplete.length === 0) {
        break;
      }

      for (const job of incomplete) {
        logger.info({ archiveId, job: job.type, progress: job.progress }, `Waiting for ${job.type} (${job.progress}%)`);
      }

      await this.sleep(this.pollIntervalMs);

      if (this.now() - startedAt > timeoutMs) {
        throw new TimeoutError(
          `Archive ${archiveId} still has incomplete jobs after ${Math.round(timeoutMs / 1000)}s`,
          timeoutMs
        );
      }
    }

    this.states.set(archiveId, 'ready');
    logger.info({ archiveId }, 'Archive ready');
  }

  async upload(archiveId: string, filename: string, source: Readable): Promise<void> {
    this.expectState(archiveId, ['ready'], 'upload to');

    this.states.set(archiveId, 'uploading');
    await this.uploader.upload(archiveId, filename, source);
    this.states.set(archiveId, 'uploaded');
  }

  async finalize(archiveId: string): Promise<unknown> {
    this.expectState(archiveId, ['uploaded'], 'finalize');

    const result = await this.api.post(`safe/${this.safeId}/archive/${archiveId}/archive`);
    this.states.set(archiveId, 'finalized');

    logger.info({ archiveId }, 'Archive finalized');
    return result;
  }

  private expectState(archiveId: string, allowed: ArchiveState[], action: string): ArchiveState {
    const state = this.states.get(archiveId);

    if (!state) {
      throw new LifecycleError(`Cannot ${action} archive ${archiveId}: it was not created in this run`);
    }
    if (state === 'finalized') {
      throw new LifecycleError(`Cannot ${action} archive ${archiveId}: it is already finalized`);
    }
    if (!allowed.includes(state)) {
      throw new LifecycleError(`Cannot ${action} archive ${archiveId} while it is ${state}`);
    }

    return state;
  }
}
