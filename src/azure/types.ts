import type { BlobServiceClient, PublicAccessType } from '@azure/storage-blob';

import type { TraceSink } from '../logging/trace-sink.js';

/**
 * Account name and key read from a connection string.
 * accountKey is only ever present together with accountName.
 */
export interface AccountCredentials {
  /** Storage account name. Example: "acme" */
  readonly accountName?: string;

  /** Base64 shared key. Never log this value directly. */
  readonly accountKey?: string;
}

/**
 * Structural parts of a blob URI.
 *
 * Given: https://acme.blob.core.windows.net/logs/2024/run.csv?sv=2020-01-01
 * Result:
 *   account: "acme"
 *   container: "logs"
 *   blobPath: "2024/run.csv"
 *   fileName: "run.csv"
 *   fileExtension: "csv"
 *   sasToken: "?sv=2020-01-01"
 *
 * All fields absent means the input was not a blob URI.
 */
export interface ParsedBlobUri {
  readonly account?: string;
  readonly container?: string;
  readonly blobPath?: string;
  readonly fileName?: string;
  readonly fileExtension?: string;

  /** Query string including the leading '?', if the URI carried one. */
  readonly sasToken?: string;
}

/** Parts of a "directory/name.ext" path. */
export interface ParsedFileName {
  readonly directory?: string;
  readonly fileName?: string;
  readonly fileExtension?: string;
}

/** A container name with its anonymous access level. */
export interface ContainerAccess {
  readonly name: string;

  /** 'container' or 'blob' when public, undefined when private. */
  readonly publicAccess: PublicAccessType | undefined;
}

/**
 * Options for the BlobStore constructor.
 */
export interface BlobStoreOptions {
  /** Host suffix after the account name in generated URIs. Default: "blob.core.windows.net" */
  readonly serviceDomain?: string;

  /** Validity of tokens minted for uploaded blobs, in days. Default: 7. */
  readonly tokenValidityDays?: number;

  /** When set, every public operation writes a trace record here. */
  readonly traceSink?: TraceSink;

  /** Source of the current time for token validity windows. Default: () => new Date() */
  readonly clock?: () => Date;

  /** Builds the service client used by each operation. Default: BlobServiceClient.fromConnectionString */
  readonly createServiceClient?: (connectionString: string) => BlobServiceClient;
}
