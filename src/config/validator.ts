import { z } from 'zod';
import type { CourierConfig, CourierOptions, RawEnvConfig } from './types.js';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_TRACE_MAX_BYTES, DEFAULT_TRACE_MAX_FILES } from '../logging/trace-sink.js';

/**
 * Zod schema for validating raw environment variables.
 * Used internally by validateConfig().
 */
const courierEnvSchema = z.object({
  BLOB_COURIER_CONNECTION_STRING: z
    .string()
    .min(1, 'BLOB_COURIER_CONNECTION_STRING must not be empty')
    .refine(
      (value) => value.includes('AccountName='),
      { message: 'BLOB_COURIER_CONNECTION_STRING must contain an AccountName= field' },
    ),
  BLOB_COURIER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  BLOB_COURIER_RETRY_COUNT: z
    .string()
    .regex(/^\d+$/, 'BLOB_COURIER_RETRY_COUNT must be a positive integer')
    .default('3')
    .transform(Number)
    .refine((n) => n >= 1 && n <= 10, 'BLOB_COURIER_RETRY_COUNT must be between 1 and 10'),
  BLOB_COURIER_SAS_DAYS: z
    .string()
    .regex(/^\d+$/, 'BLOB_COURIER_SAS_DAYS must be a positive integer')
    .default('7')
    .transform(Number)
    .refine((n) => n >= 1 && n <= 365, 'BLOB_COURIER_SAS_DAYS must be between 1 and 365'),
  BLOB_COURIER_TRACE_FILE: z.string().optional(),
  BLOB_COURIER_TRACE_MAX_BYTES: z
    .string()
    .regex(/^\d+$/, 'BLOB_COURIER_TRACE_MAX_BYTES must be a positive integer')
    .default(String(DEFAULT_TRACE_MAX_BYTES))
    .transform(Number)
    .refine((n) => n >= 1024, 'BLOB_COURIER_TRACE_MAX_BYTES must be at least 1024'),
  BLOB_COURIER_TRACE_MAX_FILES: z
    .string()
    .regex(/^\d+$/, 'BLOB_COURIER_TRACE_MAX_FILES must be a positive integer')
    .default(String(DEFAULT_TRACE_MAX_FILES))
    .transform(Number)
    .refine((n) => n >= 1 && n <= 50, 'BLOB_COURIER_TRACE_MAX_FILES must be between 1 and 50'),
});

const ENV_KEYS: readonly (keyof RawEnvConfig)[] = [
  'BLOB_COURIER_CONNECTION_STRING',
  'BLOB_COURIER_LOG_LEVEL',
  'BLOB_COURIER_RETRY_COUNT',
  'BLOB_COURIER_SAS_DAYS',
  'BLOB_COURIER_TRACE_FILE',
  'BLOB_COURIER_TRACE_MAX_BYTES',
  'BLOB_COURIER_TRACE_MAX_FILES',
];

/**
 * Validate the process configuration.
 *
 * @param env - Environment variables record (typically process.env).
 * @param options - Caller overrides.
 * @returns A fully resolved CourierConfig.
 *
 * @throws ConfigurationError if:
 *   - No connection string is given by options or BLOB_COURIER_CONNECTION_STRING
 *   - The connection string has no AccountName= field
 *   - Any optional parameter has an invalid value, whether from env or options;
 *     the error names the env var the value stands in for
 *
 * Contract:
 *   - Options override env vars override defaults
 *   - Options are held to the same rules as the env vars they replace
 *   - Empty env values count as unset
 */
export function validateConfig(
  env: Record<string, string | undefined>,
  options?: CourierOptions,
): CourierConfig {
  const rawEnv: Record<string, string> = {};

  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      rawEnv[key] = value;
    }
  }

  const overrides: Partial<Record<keyof RawEnvConfig, string>> = {
    BLOB_COURIER_CONNECTION_STRING: options?.connectionString,
    BLOB_COURIER_LOG_LEVEL: options?.logLevel,
    BLOB_COURIER_RETRY_COUNT: options?.retryCount === undefined ? undefined : String(options.retryCount),
    BLOB_COURIER_SAS_DAYS: options?.sasDays === undefined ? undefined : String(options.sasDays),
    BLOB_COURIER_TRACE_FILE: options?.traceFile,
  };

  for (const key of ENV_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      rawEnv[key] = value;
    }
  }

  if (rawEnv['BLOB_COURIER_CONNECTION_STRING'] === undefined) {
    throw new ConfigurationError(
      'BLOB_COURIER_CONNECTION_STRING is not set. Provide it in the environment, a .env file or --connection-string.',
      'BLOB_COURIER_CONNECTION_STRING',
    );
  }

  const parseResult = courierEnvSchema.safeParse(rawEnv);

  if (!parseResult.success) {
    const firstIssue = parseResult.error.issues[0];
    const paramName = firstIssue.path.length > 0
      ? String(firstIssue.path[0])
      : 'BLOB_COURIER_CONNECTION_STRING';
    throw new ConfigurationError(
      `Configuration validation failed: ${firstIssue.message}`,
      paramName,
    );
  }

  const validated = parseResult.data;

  return {
    connectionString: validated.BLOB_COURIER_CONNECTION_STRING,
    logLevel: validated.BLOB_COURIER_LOG_LEVEL,
    retryCount: validated.BLOB_COURIER_RETRY_COUNT,
    sasDays: validated.BLOB_COURIER_SAS_DAYS,
    traceFile: validated.BLOB_COURIER_TRACE_FILE ?? null,
    traceMaxBytes: validated.BLOB_COURIER_TRACE_MAX_BYTES,
    traceMaxFiles: validated.BLOB_COURIER_TRACE_MAX_FILES,
  };
}
