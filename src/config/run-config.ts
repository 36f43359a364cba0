import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import type { RunConfig } from './types.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Schema of a publish run file.
 *
 * {
 *   "container": "exports",
 *   "tempDirectory": "./tmp",
 *   "completeMarker": "root",
 *   "jobs": [
 *     { "name": "daily-sales", "blobPath": "sales/%Y/%m/%d", "files": ["./out/sales.csv"] }
 *   ]
 * }
 */
const runConfigSchema = z.object({
  container: z.string().min(1, 'container must not be empty'),
  tempDirectory: z.string().min(1, 'tempDirectory must not be empty'),
  completeMarker: z.enum(['root', 'per-path']).default('root'),
  jobs: z
    .array(
      z.object({
        name: z.string().min(1, 'job name must not be empty'),
        blobPath: z.string().min(1, 'job blobPath must not be empty'),
        files: z.array(z.string().min(1)).min(1, 'a job needs at least one file'),
      }),
    )
    .min(1, 'at least one job is required'),
});

/**
 * Validate a parsed run configuration object.
 *
 * @param raw - Parsed JSON content.
 * @param baseDir - Directory that relative paths are resolved against.
 * @throws ConfigurationError naming the dotted path of the first invalid field.
 */
export function validateRunConfig(raw: unknown, baseDir: string): RunConfig {
  const parseResult = runConfigSchema.safeParse(raw);

  if (!parseResult.success) {
    const firstIssue = parseResult.error.issues[0];
    const paramName = firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'runConfig';
    throw new ConfigurationError(
      `Run configuration is invalid: ${firstIssue.message}`,
      paramName,
    );
  }

  const validated = parseResult.data;

  return {
    container: validated.container,
    tempDirectory: path.resolve(baseDir, validated.tempDirectory),
    completeMarker: validated.completeMarker,
    jobs: validated.jobs.map((job) => ({
      name: job.name,
      blobPath: job.blobPath,
      files: job.files.map((file) => path.resolve(baseDir, file)),
    })),
  };
}

/**
 * Load and validate a publish run file.
 *
 * @param filePath - Path to the JSON run file.
 * @throws ConfigurationError with parameter='runConfig' if the file cannot be read
 *   or is not JSON, or with the offending field's path if validation fails.
 */
export async function loadRunConfig(filePath: string): Promise<RunConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Cannot read run configuration "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
      'runConfig',
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Run configuration "${filePath}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'runConfig',
    );
  }

  return validateRunConfig(raw, path.dirname(path.resolve(filePath)));
}
