/**
 * Log level enumeration. Levels are ordered from most verbose (debug) to least verbose (error).
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Where the `.complete` marker goes after a publish run.
 * 'root' puts a single ".complete" at the container root; 'per-path' puts one in each blob prefix.
 */
export type CompleteMarkerPlacement = 'root' | 'per-path';

/**
 * Validated process configuration produced by validateConfig().
 * All optional fields have been resolved to their default values.
 */
export interface CourierConfig {
  /** Full storage connection string. Never log this value directly. */
  readonly connectionString: string;

  /** Logging verbosity. Default: 'info'. */
  readonly logLevel: LogLevel;

  /** Upload attempts per blob. Default: 3. */
  readonly retryCount: number;

  /** Lifetime of issued SAS tokens in days. Default: 7. */
  readonly sasDays: number;

  /** Trace file path. null disables operation tracing. */
  readonly traceFile: string | null;

  /** Size in bytes at which the trace file rotates. Default: 2097152 (2MB). */
  readonly traceMaxBytes: number;

  /** Rotated trace files to keep. Default: 5. */
  readonly traceMaxFiles: number;
}

/**
 * Caller overrides for validateConfig(). Each wins over its environment variable.
 */
export interface CourierOptions {
  connectionString?: string;
  logLevel?: LogLevel;
  retryCount?: number;
  sasDays?: number;
  traceFile?: string;
}

/**
 * Raw environment variable values before Zod validation.
 */
export interface RawEnvConfig {
  BLOB_COURIER_CONNECTION_STRING?: string;
  BLOB_COURIER_LOG_LEVEL?: string;
  BLOB_COURIER_RETRY_COUNT?: string;
  BLOB_COURIER_SAS_DAYS?: string;
  BLOB_COURIER_TRACE_FILE?: string;
  BLOB_COURIER_TRACE_MAX_BYTES?: string;
  BLOB_COURIER_TRACE_MAX_FILES?: string;
}

/** One batch of local files published under a date-templated blob prefix. */
export interface PublishJob {
  /** Name under which the job's URIs appear in the run summary. */
  readonly name: string;

  /** Blob prefix template, e.g. "exports/%Y/%m/%d". Expanded in UTC. */
  readonly blobPath: string;

  /** Absolute local file paths to upload. */
  readonly files: readonly string[];
}

/**
 * Validated publish run configuration, loaded from a JSON file by loadRunConfig().
 * Relative paths in the file have been resolved against the file's directory.
 */
export interface RunConfig {
  /** Container receiving every upload of the run. */
  readonly container: string;

  /** Absolute working directory for the .complete marker. Removed after the run. */
  readonly tempDirectory: string;

  /** Marker placement. Default: 'root'. */
  readonly completeMarker: CompleteMarkerPlacement;

  readonly jobs: readonly PublishJob[];
}
