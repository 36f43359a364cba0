/**
 * Base error class for all blob-courier errors.
 * Messages are sanitized to remove account keys and SAS signatures before they get here.
 */
export class BlobCourierError extends Error {
  /** Machine-readable error code for programmatic handling. */
  public readonly code: string;

  constructor(message: string, code: string = 'BLOB_COURIER_ERROR') {
    super(message);
    this.name = 'BlobCourierError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
