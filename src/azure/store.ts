import { BlobServiceClient, RestError } from '@azure/storage-blob';
import type { ContainerClient } from '@azure/storage-blob';
import * as fs from 'node:fs/promises';
import { createWriteStream } from 'node:fs';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';

import type { AccountCredentials, BlobStoreOptions, ContainerAccess } from './types.js';
import type { Logger } from '../logging/logger.js';
import type { Tracer } from '../logging/trace.js';
import { sanitize } from '../logging/logger.js';
import { createTracer } from '../logging/trace.js';
import { parseConnectionString } from '../parse/connection-string.js';
import {
  DEFAULT_TOKEN_VALIDITY_DAYS,
  assertValidityDays,
  issueBlobToken,
  issueContainerToken,
  signingCredential,
} from './sas.js';
import { ConfigurationError, CredentialError, TransientStorageError } from '../errors/index.js';

/** Host suffix of public Azure blob endpoints. */
export const DEFAULT_SERVICE_DOMAIN = 'blob.core.windows.net';

/** Number of upload attempts when the caller does not say otherwise. */
export const DEFAULT_RETRY_COUNT = 3;

/**
 * Coerce an upload retry count to an integer.
 *
 * Numbers are truncated; strings must hold an integer. Anything else fails fast.
 *
 * @throws ConfigurationError with parameter='retryCount'.
 */
export function coerceRetryCount(retryCount: number | string): number {
  if (typeof retryCount === 'number' && Number.isFinite(retryCount)) {
    return Math.trunc(retryCount);
  }
  if (typeof retryCount === 'string' && /^\s*[+-]?\d+\s*$/.test(retryCount)) {
    return Number.parseInt(retryCount, 10);
  }
  throw new ConfigurationError(
    `Retry count must be an integer, got "${String(retryCount)}"`,
    'retryCount',
  );
}

/**
 * Local file name for a blob: its last path segment, split on '/' first and '\' otherwise.
 */
export function localFileName(blobPath: string): string {
  if (blobPath.includes('/')) {
    return blobPath.slice(blobPath.lastIndexOf('/') + 1);
  }
  if (blobPath.includes('\\')) {
    return blobPath.slice(blobPath.lastIndexOf('\\') + 1);
  }
  return blobPath;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Shared-key access to one storage account: containers, blob listing, retried
 * uploads with overwrite, downloads, SAS tokens and tokenized URIs.
 *
 * The connection string is parsed once here. Nothing else is cached: every
 * operation builds a fresh service client and re-resolves its container.
 * Operations run one request at a time; the store does no locking.
 */
export class BlobStore {
  private readonly connectionString: string;
  private readonly accountCredentials: AccountCredentials;
  private readonly logger: Logger;
  private readonly serviceDomain: string;
  private readonly tokenValidityDays: number;
  private readonly clock: () => Date;
  private readonly createServiceClient: (connectionString: string) => BlobServiceClient;
  private readonly trace: Tracer;

  /**
   * @param connectionString - Full storage connection string.
   * @param logger - Logger instance for diagnostic output.
   * @param options - Optional overrides, see BlobStoreOptions.
   *
   * @throws ConfigurationError if options.tokenValidityDays is not a positive number.
   */
  constructor(connectionString: string, logger: Logger, options: BlobStoreOptions = {}) {
    this.connectionString = connectionString;
    this.accountCredentials = Object.freeze(parseConnectionString(connectionString));
    this.logger = logger;
    this.serviceDomain = options.serviceDomain ?? DEFAULT_SERVICE_DOMAIN;
    this.tokenValidityDays = options.tokenValidityDays ?? DEFAULT_TOKEN_VALIDITY_DAYS;
    assertValidityDays(this.tokenValidityDays, 'tokenValidityDays');
    this.clock = options.clock ?? (() => new Date());
    this.createServiceClient =
      options.createServiceClient ?? ((cs: string) => BlobServiceClient.fromConnectionString(cs));
    this.trace = createTracer(options.traceSink, this.accountCredentials.accountKey ?? '');

    this.logger.debug(
      `BlobStore initialized for account "${this.accountCredentials.accountName ?? '(none)'}"`,
    );
  }

  /** Credentials read from the connection string. Frozen. */
  get credentials(): AccountCredentials {
    return this.accountCredentials;
  }

  /**
   * List every container in the account.
   *
   * @param includeAccess - When true, pair each name with its public access level.
   *
   * @throws TransientStorageError if the service cannot be listed.
   */
  listContainers(): Promise<string[]>;
  listContainers(includeAccess: false): Promise<string[]>;
  listContainers(includeAccess: true): Promise<ContainerAccess[]>;
  async listContainers(includeAccess: boolean = false): Promise<string[] | ContainerAccess[]> {
    return this.trace('listContainers', [includeAccess], async () => {
      try {
        const service = this.serviceClient();
        if (!includeAccess) {
          return await this.containerNames(service);
        }

        const containers: ContainerAccess[] = [];
        for await (const item of service.listContainers()) {
          containers.push({ name: item.name, publicAccess: item.properties.publicAccess });
        }
        return containers;
      } catch (error: unknown) {
        throw this.translateError(error, 'Failed to list containers');
      }
    });
  }

  /**
   * List blob names in a container, creating the container first if it does not exist.
   *
   * @throws TransientStorageError on service failures.
   */
  async listBlobs(containerName: string): Promise<string[]> {
    return this.trace('listBlobs', [containerName], async () => {
      try {
        const container = await this.ensureContainer(this.serviceClient(), containerName);
        const names = await this.blobNames(container);
        this.logger.debug(`Listed ${names.length} blob(s) in container "${containerName}"`);
        return names;
      } catch (error: unknown) {
        throw this.translateError(error, `Failed to list blobs in container "${containerName}"`);
      }
    });
  }

  /**
   * Get a client for a container, creating the container only when it is missing.
   *
   * @returns ContainerClient for the pre-existing or newly created container.
   * @throws TransientStorageError on service failures.
   */
  async createContainer(containerName: string): Promise<ContainerClient> {
    return this.trace('createContainer', [containerName], async () => {
      try {
        return await this.ensureContainer(this.serviceClient(), containerName);
      } catch (error: unknown) {
        throw this.translateError(error, `Failed to create container "${containerName}"`);
      }
    });
  }

  /**
   * Upload a local file as a block blob, replacing any blob already at that path.
   *
   * @param containerName - Target container, created if missing.
   * @param blobPath - Full blob name, e.g. "exports/2024/01/run.csv".
   * @param localFile - Path of the file to upload.
   * @param retryCount - Maximum number of attempts. Coerced to an integer.
   * @returns Blob URI with a read-only SAS token, or undefined once every attempt failed.
   *
   * @throws ConfigurationError if retryCount is not an integer.
   * @throws CredentialError if the connection string lacks an account name or key.
   *
   * Contract:
   *   - Attempts run strictly one after another with no delay
   *   - Each attempt re-opens the local file from the start and closes it on every exit path
   *   - Storage and filesystem failures are logged and retried, never thrown
   *   - Configuration and credential errors abort the upload on the attempt they occur
   *   - Empty blobPath or localFile returns undefined without any attempt
   */
  async uploadBlob(
    containerName: string,
    blobPath: string,
    localFile: string,
    retryCount: number | string = DEFAULT_RETRY_COUNT,
  ): Promise<string | undefined> {
    return this.trace('uploadBlob', [containerName, blobPath, localFile, retryCount], async () => {
      const attempts = coerceRetryCount(retryCount);
      signingCredential(this.accountCredentials);

      if (!containerName || !blobPath || !localFile) {
        this.logger.warn(
          `Upload skipped: container, blob path and local file are all required (got "${containerName}", "${blobPath}", "${localFile}")`,
        );
        return undefined;
      }

      for (let attempt = 1; attempt <= attempts; attempt++) {
        try {
          const uri = await this.uploadOnce(containerName, blobPath, localFile);
          this.logger.info(`Blob uploaded: "${containerName}/${blobPath}"`);
          return uri;
        } catch (error: unknown) {
          const failure = this.translateError(
            error,
            `Upload attempt ${attempt}/${attempts} of "${blobPath}" failed`,
          );
          if (failure instanceof ConfigurationError || failure instanceof CredentialError) {
            throw failure;
          }
          this.logger.warn(failure.message);
        }
      }

      this.logger.error(`Giving up on "${blobPath}" after ${attempts} attempt(s)`);
      return undefined;
    });
  }

  /**
   * Download a blob into a local directory under its own file name.
   *
   * @param containerName - Container to read from, created if missing.
   * @param blobPath - Full blob name; its last '/' or '\' segment becomes the file name.
   * @param localDirectory - Destination directory, created if missing.
   * @returns true if the file was written, false if the blob does not exist or the
   *   transfer failed.
   *
   * Contract:
   *   - Any file already at the destination is deleted before the blob is looked up
   *   - The blob is only fetched if a fresh listing of the container contains it
   *   - A failed transfer leaves no partial file behind
   */
  async downloadBlob(
    containerName: string,
    blobPath: string,
    localDirectory: string,
  ): Promise<boolean> {
    return this.trace('downloadBlob', [containerName, blobPath, localDirectory], async () => {
      await fs.mkdir(localDirectory, { recursive: true });

      const fileName = localFileName(blobPath);
      if (fileName.length === 0) {
        this.logger.warn(`Blob path "${blobPath}" has no file name, nothing to download`);
        return false;
      }

      const destination = path.join(localDirectory, fileName);
      await fs.rm(destination, { force: true });

      try {
        const container = await this.ensureContainer(this.serviceClient(), containerName);
        const names = await this.blobNames(container);

        if (!names.includes(blobPath)) {
          this.logger.info(`Blob "${containerName}/${blobPath}" not found`);
          return false;
        }

        const response = await container.getBlobClient(blobPath).download(0);
        if (!response.readableStreamBody) {
          throw new TransientStorageError(`No readable stream body returned for blob "${blobPath}"`);
        }

        await pipeline(response.readableStreamBody, createWriteStream(destination));
      } catch (error: unknown) {
        await fs.rm(destination, { force: true });
        const failure = this.translateError(error, `Failed to download blob "${blobPath}"`);
        this.logger.error(failure.message);
        return false;
      }

      const downloaded = await fileExists(destination);
      if (downloaded) {
        this.logger.info(`Downloaded "${containerName}/${blobPath}" -> "${destination}"`);
      }
      return downloaded;
    });
  }

  /**
   * Read-only SAS token for one blob.
   *
   * @throws CredentialError if the connection string lacks an account name or key.
   */
  generateBlobToken(
    containerName: string,
    blobPath: string,
    validForDays: number = this.tokenValidityDays,
  ): string {
    return issueBlobToken(this.accountCredentials, containerName, blobPath, validForDays, this.clock());
  }

  /**
   * Read/add/create/write/delete SAS token for a container.
   *
   * @throws CredentialError if the connection string lacks an account name or key.
   */
  generateContainerToken(containerName: string, validForDays: number = this.tokenValidityDays): string {
    return issueContainerToken(this.accountCredentials, containerName, validForDays, this.clock());
  }

  /**
   * Format https://{account}.{serviceDomain}/{container}/{blobPath}{token}.
   * The token is appended as-is, so it should start with '?' (or be empty).
   *
   * @throws CredentialError if the connection string has no account name.
   */
  generateUri(containerName: string, blobPath: string, token: string): string {
    const account = this.accountCredentials.accountName;
    if (!account) {
      throw new CredentialError(
        'Cannot build a blob URI: the connection string has no AccountName',
        'accountName',
      );
    }
    return `https://${account}.${this.serviceDomain}/${containerName}/${blobPath}${token}`;
  }

  private serviceClient(): BlobServiceClient {
    return this.createServiceClient(this.connectionString);
  }

  private async containerNames(service: BlobServiceClient): Promise<string[]> {
    const names: string[] = [];
    for await (const item of service.listContainers()) {
      names.push(item.name);
    }
    return names;
  }

  private async blobNames(container: ContainerClient): Promise<string[]> {
    const names: string[] = [];
    for await (const blob of container.listBlobsFlat()) {
      names.push(blob.name);
    }
    return names;
  }

  private async ensureContainer(
    service: BlobServiceClient,
    containerName: string,
  ): Promise<ContainerClient> {
    const existing = await this.containerNames(service);
    if (!existing.includes(containerName)) {
      this.logger.info(`Creating container "${containerName}"`);
      await service.createContainer(containerName);
    }
    return service.getContainerClient(containerName);
  }

  /**
   * One upload attempt: resolve the container, replace the blob, mint its token.
   */
  private async uploadOnce(
    containerName: string,
    blobPath: string,
    localFile: string,
  ): Promise<string> {
    const container = await this.ensureContainer(this.serviceClient(), containerName);
    const handle = await fs.open(localFile, 'r');
    const stream = handle.createReadStream();

    try {
      const existing = await this.blobNames(container);
      if (existing.includes(blobPath)) {
        this.logger.debug(`Deleting existing blob "${containerName}/${blobPath}" before upload`);
        await container.deleteBlob(blobPath);
      }

      await container.getBlockBlobClient(blobPath).uploadStream(stream);

      const token = this.generateBlobToken(containerName, blobPath);
      return this.generateUri(containerName, blobPath, token);
    } finally {
      stream.destroy();
      await handle.close();
    }
  }

  /**
   * Translate an SDK or filesystem error into a TransientStorageError.
   * Always strips the account key and SAS signatures from the message.
   */
  private translateError(error: unknown, context: string): Error {
    if (
      error instanceof ConfigurationError ||
      error instanceof CredentialError
    ) {
      return error;
    }

    const secret = this.accountCredentials.accountKey ?? '';

    if (error instanceof RestError) {
      return new TransientStorageError(
        sanitize(`${context}: ${error.message}`, secret),
        error.statusCode,
      );
    }

    const detail = error instanceof Error ? error.message : String(error);
    return new TransientStorageError(sanitize(`${context}: ${detail}`, secret));
  }
}
