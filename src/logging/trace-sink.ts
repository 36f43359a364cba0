import * as fs from 'node:fs';
import * as path from 'node:path';
import * as winston from 'winston';

/**
 * Append-only destination for operation trace records.
 */
export interface TraceSink {
  append(message: string): void;
}

/** A TraceSink backed by a file that can be flushed and closed. */
export interface FileTraceSink extends TraceSink {
  /** Flush pending writes and release the file. Resolves within closeTimeoutMs. */
  close(): Promise<void>;
}

export interface FileTraceSinkOptions {
  /** Path of the active trace file. Rotated files get a numeric suffix. */
  readonly filePath: string;

  /** Size in bytes at which the file is rotated. Default: 2097152 (2MB). */
  readonly maxBytes?: number;

  /** Number of files kept, the active one included. Default: 5. */
  readonly maxFiles?: number;

  /** Upper bound on the wait in close(). Default: 5000. */
  readonly closeTimeoutMs?: number;

  /** Called once if the file cannot be written. Later appends are dropped. */
  readonly onError?: (error: Error) => void;
}

export const DEFAULT_TRACE_MAX_BYTES = 2 * 1024 * 1024;
export const DEFAULT_TRACE_MAX_FILES = 5;
export const DEFAULT_TRACE_CLOSE_TIMEOUT_MS = 5000;

/**
 * Create a size-bounded, rotating trace file.
 *
 * Configured once at process start. Each append becomes one record of the form
 * "<ISO-timestamp>\t<message>". The parent directory is created up front.
 *
 * Records are handed to the file transport one at a time, and only after the
 * file has opened: the transport loses writes that cross maxBytes while it is
 * still opening or rotating.
 */
export function createFileTraceSink(options: FileTraceSinkOptions): FileTraceSink {
  fs.mkdirSync(path.dirname(path.resolve(options.filePath)), { recursive: true });

  const transport = new winston.transports.File({
    filename: options.filePath,
    maxsize: options.maxBytes ?? DEFAULT_TRACE_MAX_BYTES,
    maxFiles: options.maxFiles ?? DEFAULT_TRACE_MAX_FILES,
    tailable: true,
  });

  const logger = winston.createLogger({
    level: 'info',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf((info) => `${String(info.timestamp)}\t${String(info.message)}`),
    ),
    transports: [transport],
  });

  let failure: Error | undefined;
  const failureListeners: (() => void)[] = [];

  const fail = (error: Error): void => {
    if (failure !== undefined) return;
    failure = error;
    options.onError?.(error);
    for (const listener of failureListeners.splice(0)) {
      listener();
    }
  };

  // The logger re-emits transport errors; without a listener that would throw.
  logger.on('error', fail);

  /** Resolves on the first of the given events, or when the sink fails. */
  const settled = (register: (done: () => void) => void): Promise<void> =>
    new Promise<void>((resolve) => {
      if (failure !== undefined) {
        resolve();
        return;
      }
      let finished = false;
      const done = (): void => {
        if (finished) return;
        finished = true;
        const index = failureListeners.indexOf(done);
        if (index !== -1) failureListeners.splice(index, 1);
        resolve();
      };
      failureListeners.push(done);
      register(done);
    });

  let pending: Promise<void> = settled((done) => transport.once('open', done));

  const write = (message: string): Promise<void> =>
    settled((done) => {
      transport.once('logged', done);
      try {
        logger.info(message);
      } catch (error: unknown) {
        fail(error instanceof Error ? error : new Error(String(error)));
      }
    });

  return {
    append(message: string): void {
      pending = pending.then(() => (failure === undefined ? write(message) : undefined));
    },

    close(): Promise<void> {
      const drained = pending.then(() =>
        settled((done) => {
          logger.once('finish', done);
          transport.once('finish', done);
          logger.end();
        }),
      );

      return new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, options.closeTimeoutMs ?? DEFAULT_TRACE_CLOSE_TIMEOUT_MS);
        timer.unref();
        void drained.then(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    },
  };
}
