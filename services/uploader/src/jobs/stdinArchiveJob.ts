/**
 * Stdin Archive Job
 *
 * One run, one archive:
 * 1. Resolve the configured safe by name
 * 2. Create an archive under it
 * 3. Wait for the provider's provisioning jobs to finish
 * 4. Stream the payload to the archive's FTP bucket as `data`
 * 5. Finalize (seal) the archive
 *
 * Nothing is retried or resumed; a failure leaves the remote archive as is.
 */

import type { Readable } from 'stream';
import { ApiClient } from '../lib/apiClient.js';
import { ArchiveLifecycle } from '../lib/archiveLifecycle.js';
import type { ArchiveConfig } from '../lib/config.js';
import { FtpTransfer, type FtpClientFactory } from '../lib/ftpTransfer.js';
import { getLogger } from '../lib/logger.js';
import { SafeResolver } from '../lib/safeResolver.js';

const logger = getLogger();

export const REMOTE_FILENAME = 'data';

export interface StdinArchiveRunOptions {
  config: ArchiveConfig;
  name: string;
  description: string;
  source: Readable;
  timeoutMs?: number;
  createFtpClient?: FtpClientFactory;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface StdinArchiveRunResult {
  safeId: string;
  archiveId: string;
  finalized: unknown;
}

export const stdinArchiveJob = {
  name: 'stdin-archive',
  description: 'Upload standard input into a newly created cold-storage archive',

  async run(options: StdinArchiveRunOptions): Promise<StdinArchiveRunResult> {
    const { config } = options;
    const api = new ApiClient({ apiUrl: config.apiUrl, apiToken: config.apiToken });

    logger.info({ safe: config.safeName, platformId: config.platformId }, 'Stdin archive job: Starting');

    const safeId = await new SafeResolver(api).resolve(config.safeName);

    const lifecycle = new ArchiveLifecycle({
      api,
      uploader: new FtpTransfer(api, safeId, options.createFtpClient),
      safeId,
      platformId: config.platformId,
      retentionDays: config.retentionDays,
      pollIntervalMs: options.pollIntervalMs,
      sleep: options.sleep,
      now: options.now,
    });

    const archiveId = await lifecycle.create(options.name, options.description);
    await lifecycle.waitForReady(archiveId, options.timeoutMs ?? config.pollTimeoutSeconds * 1000);
    await lifecycle.upload(archiveId, REMOTE_FILENAME, options.source);
    const finalized = await lifecycle.finalize(archiveId);

    logger.info({ safeId, archiveId }, 'Stdin archive job: Completed');
    return { safeId, archiveId, finalized };
  },
};
