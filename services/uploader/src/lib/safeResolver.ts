import { z } from 'zod';
import { decodeResponse, type StorageApi } from './apiClient.js';
import { NotFoundError } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger();

const SafeSchema = z
  .object({
    name: z.string(),
    uuid_ref: z.string(),
  })
  .passthrough();

const SafeListSchema = z.array(SafeSchema);

/**
 * Safe Resolver
 *
 * Maps a safe name to its uuid_ref. Safe identifiers never change, so a
 * resolved name is cached for the life of the process.
 */
export class SafeResolver {
  private readonly cache: Map<string, string> = new Map();

  constructor(private readonly api: StorageApi) {}

  async resolve(name: string): Promise<string> {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const safes = decodeResponse(SafeListSchema, await this.api.get('safe'), 'safe');
    const match = safes.find((safe) => safe.name === name);

    if (!match) {
      throw new NotFoundError(`Safe not found: ${name}`);
    }

    logger.debug({ safe: name, safeId: match.uuid_ref }, 'Resolved safe');
    this.cache.set(name, match.uuid_ref);
    return match.uuid_ref;
  }
}
