/**
 * FTP Transfer Connector
 *
 * Fetches the bucket credentials of an archive and streams a payload to it
 * over FTP. One control connection per upload, always closed before
 * returning.
 */

import { Client, type AccessOptions } from 'basic-ftp';
import type { Readable } from 'stream';
import { z } from 'zod';
import { decodeResponse, type StorageApi } from './apiClient.js';
import { ParseError, TransportError, describeError } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger();

// ftp://<userinfo>@<host>:<port>, userinfo is ignored
const FTP_URI_PATTERN = /^ftp:\/\/[^@/]*@([^@:/]+):(\d+)\/?$/;

const CredentialSchema = z
  .object({
    uri: z.string(),
    login: z.string(),
    password: z.string(),
  })
  .passthrough();

const BucketSchema = z
  .object({
    credentials: z.array(CredentialSchema),
  })
  .passthrough();

export type FtpCredential = z.infer<typeof CredentialSchema>;

export interface FtpEndpoint {
  host: string;
  port: number;
}

/**
 * The subset of the basic-ftp client the connector drives.
 */
export interface FtpClient {
  access(options: AccessOptions): Promise<unknown>;
  uploadFrom(source: Readable, toRemotePath: string): Promise<unknown>;
  close(): void;
}

export type FtpClientFactory = () => FtpClient;

export interface ArchiveUploader {
  upload(archiveId: string, filename: string, source: Readable): Promise<void>;
}

export function parseFtpUri(uri: string): FtpEndpoint {
  const match = FTP_URI_PATTERN.exec(uri);
  if (!match) {
    throw new ParseError(`Malformed FTP URI: ${uri}`);
  }

  const [, host, rawPort] = match;
  const port = Number(rawPort);
  if (!host || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ParseError(`Malformed FTP URI: ${uri}`);
  }

  return { host, port };
}

export class FtpTransfer implements ArchiveUploader {
  constructor(
    private readonly api: StorageApi,
    private readonly safeId: string,
    private readonly createClient: FtpClientFactory = () => new Client()
  ) {}

  async getCredential(archiveId: string): Promise<FtpCredential> {
    const path = `safe/${this.safeId}/archive/${archiveId}/bucket`;
    const bucket = decodeResponse(BucketSchema, await this.api.get(path), path);
    const credential = bucket.credentials[0];

    if (!credential) {
      throw new TransportError(`No FTP credentials available for archive ${archiveId}`);
    }

    return credential;
  }

  async upload(archiveId: string, filename: string, source: Readable): Promise<void> {
    const credential = await this.getCredential(archiveId);
    const { host, port } = parseFtpUri(credential.uri);

    const client = this.createClient();
    try {
      try {
        await client.access({
          host,
          port,
          user: credential.login,
          password: credential.password,
          secure: false,
        });
      } catch (error) {
        throw new TransportError(`FTP login to ${host}:${port} failed: ${describeError(error)}`, { cause: error });
      }

      logger.info({ archiveId, host, port, filename }, 'Uploading payload over FTP');

      try {
        await client.uploadFrom(source, filename);
      } catch (error) {
        throw new TransportError(`FTP upload of ${filename} failed: ${describeError(error)}`, { cause: error });
      }

      logger.info({ archiveId, filename }, 'Upload complete');
    } finally {
      client.close();
    }
  }
}
