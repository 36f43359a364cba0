import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { BlobStore } from '../azure/store.js';
import type { RunConfig } from '../config/types.js';
import type { Logger } from '../logging/logger.js';
import { formatBlobPath } from './blob-path.js';

/** The part of BlobStore a publish run needs. */
export type BlobUploader = Pick<BlobStore, 'uploadBlob'>;

/** Name of the marker blob written once a run has uploaded its files. */
export const COMPLETE_MARKER = '.complete';

/**
 * Outcome of a publish run, suitable for printing as JSON.
 */
export interface RunSummary {
  /** ISO timestamp the blob prefixes were expanded for. */
  readonly date: string;

  /** Distinct blob prefixes written to, in first-use order. */
  readonly blobPaths: readonly string[];

  /** Per job, the tokenized URI of each file in order, or null where the upload failed. */
  readonly uploads: Readonly<Record<string, readonly (string | null)[]>>;

  /** Blob names of the uploaded .complete markers. */
  readonly complete: readonly string[];
}

/**
 * Upload every job's files under its date-expanded prefix, then drop the .complete marker.
 *
 * @param uploader - Store used for the uploads.
 * @param runConfig - Validated run configuration.
 * @param logger - Logger instance.
 * @param now - Instant used to expand blob prefix templates.
 * @param retryCount - Upload attempts per file, passed through to the store.
 *
 * Contract:
 *   - Files upload one after another; a failed file is recorded as null and the run continues
 *   - The marker holds the comma-joined prefixes and is uploaded to ".complete" once ('root')
 *     or to "<prefix>.complete" for each prefix ('per-path')
 *   - tempDirectory is removed when the run ends, whether or not it succeeded
 */
export async function publishRun(
  uploader: BlobUploader,
  runConfig: RunConfig,
  logger: Logger,
  now: Date = new Date(),
  retryCount?: number,
): Promise<RunSummary> {
  const blobPaths: string[] = [];
  const uploads: Record<string, (string | null)[]> = {};
  const complete: string[] = [];

  try {
    for (const job of runConfig.jobs) {
      const prefix = formatBlobPath(job.blobPath, now);
      if (!blobPaths.includes(prefix)) {
        blobPaths.push(prefix);
      }

      logger.info(`Publishing job "${job.name}" (${job.files.length} file(s)) to "${prefix}"`);

      const uris: (string | null)[] = [];
      for (const file of job.files) {
        const blobName = `${prefix}${path.basename(file)}`;
        const uri = await uploader.uploadBlob(runConfig.container, blobName, file, retryCount);
        if (uri === undefined) {
          logger.warn(`Job "${job.name}": upload of "${file}" produced no URI`);
        }
        uris.push(uri ?? null);
      }
      uploads[job.name] = uris;
    }

    await fs.mkdir(runConfig.tempDirectory, { recursive: true });
    const markerFile = path.join(runConfig.tempDirectory, COMPLETE_MARKER);
    await fs.writeFile(markerFile, blobPaths.join(','), 'utf-8');

    const markerBlobs = runConfig.completeMarker === 'root'
      ? [COMPLETE_MARKER]
      : blobPaths.map((prefix) => `${prefix}${COMPLETE_MARKER}`);

    for (const markerBlob of markerBlobs) {
      logger.info(`Uploading marker "${markerBlob}"`);
      const uri = await uploader.uploadBlob(runConfig.container, markerBlob, markerFile, retryCount);
      if (uri === undefined) {
        logger.warn(`Marker "${markerBlob}" could not be uploaded`);
      }
      complete.push(markerBlob);
    }
  } finally {
    await fs.rm(runConfig.tempDirectory, { recursive: true, force: true });
    logger.debug(`Removed temp directory "${runConfig.tempDirectory}"`);
  }

  return {
    date: now.toISOString(),
    blobPaths,
    uploads,
    complete,
  };
}
