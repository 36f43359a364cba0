#!/usr/bin/env node
import * as path from 'node:path';
import { Command } from 'commander';

import { BlobStore } from '../azure/store.js';
import { validateConfig } from '../config/validator.js';
import { loadRunConfig } from '../config/run-config.js';
import type { CourierConfig } from '../config/types.js';
import { parseEnvFile, applyEnvFile } from '../env/loader.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { createFileTraceSink } from '../logging/trace-sink.js';
import type { FileTraceSink } from '../logging/trace-sink.js';
import { parseBlobUri } from '../parse/blob-uri.js';
import { parseConnectionString } from '../parse/connection-string.js';
import { publishRun } from '../publish/publisher.js';
import type { RunSummary } from '../publish/publisher.js';

interface GlobalOptions {
  envFile?: string;
  connectionString?: string;
  logLevel?: string;
}

interface CliContext {
  readonly config: CourierConfig;
  readonly logger: Logger;
  readonly store: BlobStore;
  readonly traceSink: FileTraceSink | undefined;
}

const program = new Command();

program
  .name('blob-courier')
  .version('0.1.0')
  .description('Upload, download and list Azure blobs with shared-key SAS links')
  .option('--env-file <path>', 'Path of the .env file to load', '.env')
  .option('--connection-string <value>', 'Storage connection string (overrides BLOB_COURIER_CONNECTION_STRING)')
  .option('--log-level <level>', 'Log level (debug, info, warn, error)');

/**
 * Load .env, validate configuration and build the store for one command.
 */
async function createContext(): Promise<CliContext> {
  const globals = program.opts<GlobalOptions>();
  const bootstrapLogger = createLogger('info', '');

  const envFilePath = path.resolve(globals.envFile ?? '.env');
  applyEnvFile(process.env, await parseEnvFile(envFilePath, bootstrapLogger));

  const env: Record<string, string | undefined> = { ...process.env };
  if (globals.logLevel !== undefined) {
    env['BLOB_COURIER_LOG_LEVEL'] = globals.logLevel;
  }

  const config = validateConfig(env, { connectionString: globals.connectionString });
  const accountKey = parseConnectionString(config.connectionString).accountKey ?? '';
  const logger = createLogger(config.logLevel, accountKey);

  const traceSink = config.traceFile !== null
    ? createFileTraceSink({
        filePath: config.traceFile,
        maxBytes: config.traceMaxBytes,
        maxFiles: config.traceMaxFiles,
        onError: (error) => logger.warn(`Trace file "${config.traceFile}" is not writable: ${error.message}`),
      })
    : undefined;

  const store = new BlobStore(config.connectionString, logger, {
    tokenValidityDays: config.sasDays,
    traceSink,
  });

  return { config, logger, store, traceSink };
}

/**
 * Run a command body with a fresh context and exit with the code it returns.
 */
async function run(task: (ctx: CliContext) => Promise<number>): Promise<void> {
  let ctx: CliContext | undefined;
  let exitCode = 1;

  try {
    ctx = await createContext();
    exitCode = await task(ctx);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    exitCode = 1;
  } finally {
    if (ctx?.traceSink) {
      await ctx.traceSink.close();
    }
  }

  process.exit(exitCode);
}

/**
 * Print a publish run summary to stdout.
 */
function printRunSummary(summary: RunSummary): void {
  console.log('');
  console.log('=== Run Summary ===');
  console.log(JSON.stringify(summary, null, 2));
  console.log('');
}

// ---- Subcommand: containers ----

program
  .command('containers')
  .description('List containers in the storage account')
  .option('--access', 'Show the public access level of each container')
  .action(async (opts: { access?: boolean }) => {
    await run(async ({ store }) => {
      if (opts.access === true) {
        for (const container of await store.listContainers(true)) {
          console.log(`${container.name}\t${container.publicAccess ?? 'private'}`);
        }
      } else {
        for (const name of await store.listContainers()) {
          console.log(name);
        }
      }
      return 0;
    });
  });

// ---- Subcommand: blobs ----

program
  .command('blobs <container>')
  .description('List blobs in a container (creates the container if missing)')
  .action(async (container: string) => {
    await run(async ({ store }) => {
      for (const name of await store.listBlobs(container)) {
        console.log(name);
      }
      return 0;
    });
  });

// ---- Subcommand: create ----

program
  .command('create <container>')
  .description('Create a container if it does not exist')
  .action(async (container: string) => {
    await run(async ({ store }) => {
      await store.createContainer(container);
      console.log(`Container "${container}" is ready`);
      return 0;
    });
  });

// ---- Subcommand: upload ----

program
  .command('upload <container> <blobPath> <file>')
  .description('Upload a local file, replacing any blob at the same path')
  .option('--retries <count>', 'Maximum upload attempts')
  .action(async (container: string, blobPath: string, file: string, opts: { retries?: string }) => {
    await run(async ({ store, config }) => {
      const uri = await store.uploadBlob(container, blobPath, file, opts.retries ?? config.retryCount);
      if (uri === undefined) {
        console.error(`Upload of "${file}" failed`);
        return 1;
      }
      console.log(uri);
      return 0;
    });
  });

// ---- Subcommand: download ----

program
  .command('download <container> <blobPath> <directory>')
  .description('Download a blob into a local directory')
  .action(async (container: string, blobPath: string, directory: string) => {
    await run(async ({ store }) => {
      const downloaded = await store.downloadBlob(container, blobPath, directory);
      console.log(downloaded ? 'Downloaded' : `Blob "${container}/${blobPath}" was not downloaded`);
      return downloaded ? 0 : 1;
    });
  });

// ---- Subcommand: sas ----

program
  .command('sas <container> [blobPath]')
  .description('Print a container SAS token, or a read-only SAS URI for one blob')
  .option('--days <count>', 'Token lifetime in days')
  .action(async (container: string, blobPath: string | undefined, opts: { days?: string }) => {
    await run(async ({ store, config }) => {
      const days = opts.days !== undefined ? Number(opts.days) : config.sasDays;
      if (blobPath === undefined) {
        console.log(store.generateContainerToken(container, days));
      } else {
        const token = store.generateBlobToken(container, blobPath, days);
        console.log(store.generateUri(container, blobPath, token));
      }
      return 0;
    });
  });

// ---- Subcommand: parse-uri ----

program
  .command('parse-uri <uri>')
  .description('Print the parts of a blob URI')
  .action((uri: string) => {
    const parsed = parseBlobUri(uri);
    if (Object.keys(parsed).length === 0) {
      console.error(`Not a blob URI: ${uri}`);
      process.exit(1);
    }
    console.log(JSON.stringify(parsed, null, 2));
    process.exit(0);
  });

// ---- Subcommand: publish ----

program
  .command('publish')
  .description('Upload the files of a run configuration and write the .complete marker')
  .requiredOption('--config <path>', 'Path of the JSON run configuration')
  .action(async (opts: { config: string }) => {
    await run(async ({ store, logger, config }) => {
      const runConfig = await loadRunConfig(opts.config);
      const summary = await publishRun(store, runConfig, logger, new Date(), config.retryCount);
      printRunSummary(summary);

      const failed = Object.values(summary.uploads).some((uris) => uris.includes(null));
      return failed ? 1 : 0;
    });
  });

program.parse();
