import {
  BlobSASPermissions,
  ContainerSASPermissions,
  StorageSharedKeyCredential,
  generateBlobSASQueryParameters,
} from '@azure/storage-blob';

import type { AccountCredentials } from './types.js';
import { ConfigurationError, CredentialError } from '../errors/index.js';

/** Default token lifetime in days. */
export const DEFAULT_TOKEN_VALIDITY_DAYS = 7;

/** Permissions carried by blob tokens: read only. */
export const BLOB_TOKEN_PERMISSIONS = 'r';

/** Permissions carried by container tokens: read, add, create, write, delete. */
export const CONTAINER_TOKEN_PERMISSIONS = 'racwd';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Build the signing credential, or fail when the connection string lacked a name or key.
 *
 * @throws CredentialError naming the missing field.
 */
export function signingCredential(credentials: AccountCredentials): StorageSharedKeyCredential {
  if (!credentials.accountName) {
    throw new CredentialError(
      'Cannot issue a SAS token: the connection string has no AccountName',
      'accountName',
    );
  }
  if (!credentials.accountKey) {
    throw new CredentialError(
      `Cannot issue a SAS token for account "${credentials.accountName}": the connection string has no AccountKey`,
      'accountKey',
    );
  }
  return new StorageSharedKeyCredential(credentials.accountName, credentials.accountKey);
}

/**
 * @throws ConfigurationError unless validForDays is a positive, finite number.
 */
export function assertValidityDays(validForDays: number, parameter: string = 'validForDays'): void {
  if (!Number.isFinite(validForDays) || validForDays <= 0) {
    throw new ConfigurationError(
      `Token validity must be a positive number of days, got ${String(validForDays)}`,
      parameter,
    );
  }
}

function validityWindow(validForDays: number, now: Date): { startsOn: Date; expiresOn: Date } {
  assertValidityDays(validForDays);
  return {
    startsOn: now,
    expiresOn: new Date(now.getTime() + validForDays * DAY_MS),
  };
}

/**
 * Issue a read-only SAS token for a single blob.
 *
 * @param credentials - Account name and key. Both are required.
 * @param containerName - Container holding the blob.
 * @param blobPath - Full blob name within the container.
 * @param validForDays - Lifetime of the token, counted from `now`.
 * @param now - Start of the validity window.
 * @returns Query string starting with '?', ready to append to the blob URI.
 *
 * @throws CredentialError if the account name or key is missing.
 * @throws ConfigurationError if validForDays is not a positive number.
 */
export function issueBlobToken(
  credentials: AccountCredentials,
  containerName: string,
  blobPath: string,
  validForDays: number = DEFAULT_TOKEN_VALIDITY_DAYS,
  now: Date = new Date(),
): string {
  const credential = signingCredential(credentials);
  const { startsOn, expiresOn } = validityWindow(validForDays, now);

  const query = generateBlobSASQueryParameters(
    {
      containerName,
      blobName: blobPath,
      permissions: BlobSASPermissions.parse(BLOB_TOKEN_PERMISSIONS),
      startsOn,
      expiresOn,
    },
    credential,
  ).toString();

  return `?${query}`;
}

/**
 * Issue a read/add/create/write/delete SAS token for a whole container.
 *
 * @throws CredentialError if the account name or key is missing.
 * @throws ConfigurationError if validForDays is not a positive number.
 */
export function issueContainerToken(
  credentials: AccountCredentials,
  containerName: string,
  validForDays: number = DEFAULT_TOKEN_VALIDITY_DAYS,
  now: Date = new Date(),
): string {
  const credential = signingCredential(credentials);
  const { startsOn, expiresOn } = validityWindow(validForDays, now);

  const query = generateBlobSASQueryParameters(
    {
      containerName,
      permissions: ContainerSASPermissions.parse(CONTAINER_TOKEN_PERMISSIONS),
      startsOn,
      expiresOn,
    },
    credential,
  ).toString();

  return `?${query}`;
}
