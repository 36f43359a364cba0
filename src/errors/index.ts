export { BlobCourierError } from './base.js';
export { ConfigurationError } from './config.js';
export { CredentialError, TransientStorageError } from './storage.js';
export type { CredentialField } from './storage.js';
