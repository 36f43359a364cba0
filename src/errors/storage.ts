import { BlobCourierError } from './base.js';

/** Credential field a SAS token or URI could not be built without. */
export type CredentialField = 'accountName' | 'accountKey';

/**
 * Thrown when an operation needs account credentials the connection string did not carry.
 *
 * Trigger conditions:
 * - SAS token requested but AccountName= or AccountKey= was absent
 * - Blob URI requested but AccountName= was absent
 */
export class CredentialError extends BlobCourierError {
  /** The credential field that was missing. */
  public readonly missing: CredentialField;

  constructor(message: string, missing: CredentialField) {
    super(message, 'CREDENTIAL_ERROR');
    this.name = 'CredentialError';
    this.missing = missing;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A failed request against the storage service during a retried operation.
 *
 * Upload attempts translate their failure into this type, log it, and move on
 * to the next attempt. It never escapes BlobStore.uploadBlob().
 */
export class TransientStorageError extends BlobCourierError {
  /** HTTP status code from the Azure response, if available. */
  public readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number) {
    super(message, 'TRANSIENT_STORAGE_ERROR');
    this.name = 'TransientStorageError';
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
