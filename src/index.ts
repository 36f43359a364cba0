// Storage access
export { BlobStore, coerceRetryCount, localFileName, DEFAULT_SERVICE_DOMAIN, DEFAULT_RETRY_COUNT } from './azure/store.js';
export {
  issueBlobToken,
  issueContainerToken,
  DEFAULT_TOKEN_VALIDITY_DAYS,
  BLOB_TOKEN_PERMISSIONS,
  CONTAINER_TOKEN_PERMISSIONS,
} from './azure/sas.js';
export type {
  AccountCredentials,
  ParsedBlobUri,
  ParsedFileName,
  ContainerAccess,
  BlobStoreOptions,
} from './azure/types.js';

// Parsing
export { parseConnectionString } from './parse/connection-string.js';
export { parseBlobUri, parseFileName } from './parse/blob-uri.js';

// Configuration
export { validateConfig } from './config/validator.js';
export { loadRunConfig, validateRunConfig } from './config/run-config.js';
export type {
  CourierConfig,
  CourierOptions,
  LogLevel,
  RunConfig,
  PublishJob,
  CompleteMarkerPlacement,
} from './config/types.js';
export { parseEnvFile, applyEnvFile } from './env/loader.js';
export type { EnvRecord } from './env/loader.js';

// Publishing
export { publishRun, COMPLETE_MARKER } from './publish/publisher.js';
export type { RunSummary, BlobUploader } from './publish/publisher.js';
export { formatBlobPath } from './publish/blob-path.js';

// Logging
export { createLogger, sanitize } from './logging/logger.js';
export type { Logger } from './logging/logger.js';
export { createFileTraceSink } from './logging/trace-sink.js';
export type { TraceSink, FileTraceSink, FileTraceSinkOptions } from './logging/trace-sink.js';
export { createTracer } from './logging/trace.js';
export type { Tracer } from './logging/trace.js';

// Error classes (exported as values, not just types)
export {
  BlobCourierError,
  ConfigurationError,
  CredentialError,
  TransientStorageError,
} from './errors/index.js';
export type { CredentialField } from './errors/index.js';
