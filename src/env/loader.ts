import { readFile } from 'node:fs/promises';
import { parse } from 'dotenv';
import type { Logger } from '../logging/logger.js';

/** Parsed key-value pairs from a .env file. */
export type EnvRecord = Record<string, string>;

/**
 * Load and parse a local .env file.
 *
 * @param envFilePath - Absolute path to the .env file.
 * @param logger - Logger instance.
 * @returns Parsed key-value pairs. Empty record if file does not exist.
 *
 * Contract:
 *   - Uses dotenv.parse() on the file contents (does NOT call dotenv.config())
 *   - If file does not exist: returns {} without error
 *   - Does NOT modify process.env (caller is responsible)
 */
export async function parseEnvFile(envFilePath: string, logger: Logger): Promise<EnvRecord> {
  let content: Buffer;
  try {
    content = await readFile(envFilePath);
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      logger.debug(`No .env file at ${envFilePath}, using the process environment only`);
      return {};
    }
    throw err;
  }

  const parsed = parse(content);
  logger.debug(`Parsed ${Object.keys(parsed).length} variable(s) from ${envFilePath}`);
  return parsed;
}

/**
 * Copy .env values into an environment without overriding variables already set there.
 *
 * @param env - Target environment, typically process.env. Mutated.
 * @param fileEnv - Values parsed from a .env file.
 * @returns Keys that were applied from the file.
 */
export function applyEnvFile(env: NodeJS.ProcessEnv, fileEnv: Readonly<EnvRecord>): string[] {
  const applied: string[] = [];
  for (const key of Object.keys(fileEnv)) {
    if (env[key] === undefined) {
      env[key] = fileEnv[key];
      applied.push(key);
    }
  }
  return applied;
}
