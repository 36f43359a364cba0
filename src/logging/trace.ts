import type { TraceSink } from './trace-sink.js';
import { sanitize } from './logger.js';

/**
 * Runs one named operation and records it.
 */
export type Tracer = <T>(
  operation: string,
  args: readonly unknown[],
  run: () => Promise<T>,
) => Promise<T>;

const SPACER = '\n\t';

function describe(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  // SDK clients are circular; record the resource they point at.
  if (typeof value === 'object' && value !== null && 'url' in value && typeof value.url === 'string') {
    return value.url;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/**
 * Create a tracer that writes one record per call to the sink.
 *
 * Record layout:
 *   <operation>
 *     ARGUMENTS: [...]
 *     RETURNS: <value>        (or EXCEPTION: <name>: <message>)
 *     EXECUTION: <n>ms
 *
 * Errors are recorded and then re-thrown unchanged. Without a sink the tracer
 * just runs the operation.
 */
export function createTracer(sink: TraceSink | undefined, secret: string): Tracer {
  if (sink === undefined) {
    return (_operation, _args, run) => run();
  }

  return async <T>(
    operation: string,
    args: readonly unknown[],
    run: () => Promise<T>,
  ): Promise<T> => {
    const startTime = Date.now();
    let record = `${operation}${SPACER}ARGUMENTS: ${describe(args)}`;

    try {
      const result = await run();
      record += `${SPACER}RETURNS: ${describe(result)}`;
      return result;
    } catch (error: unknown) {
      record += `${SPACER}EXCEPTION: ${describe(error)}`;
      throw error;
    } finally {
      record += `${SPACER}EXECUTION: ${Date.now() - startTime}ms`;
      sink.append(sanitize(record, secret));
    }
  };
}
