import { BlobCourierError } from './base.js';

/**
 * Thrown when required configuration is missing or invalid.
 *
 * Trigger conditions:
 * - BLOB_COURIER_CONNECTION_STRING is missing or has no AccountName= field
 * - An upload retry count is not an integer
 * - A token validity period is not a positive number
 * - BLOB_COURIER_LOG_LEVEL is not a valid log level
 * - The run configuration file is unreadable, not JSON, or fails schema validation
 */
export class ConfigurationError extends BlobCourierError {
  /** The configuration parameter name that caused the error. */
  public readonly parameter: string;

  constructor(message: string, parameter: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    this.parameter = parameter;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
