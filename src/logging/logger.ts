import type { LogLevel } from '../config/types.js';

/**
 * Logger interface used by all modules.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Numeric ordering for log levels. */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Sanitize a string by removing the account key and SAS token secrets.
 *
 * @param input - The string to sanitize.
 * @param secret - The account key to redact. Empty string when no key is known.
 * @returns Sanitized string with sensitive values replaced by '[REDACTED]'.
 *
 * Contract:
 *   - If secret is empty string, only pattern-based sanitization is applied
 *   - Replaces the exact secret substring with '[REDACTED]'
 *   - Replaces the value of an AccountKey= field, up to the next ';', with [REDACTED]
 *   - Replaces the values of sig= and se= query parameters, up to the next '&', with [REDACTED]
 *   - Fields only match at the start of the input or after a separator, quote or whitespace,
 *     and values stop at whitespace or a quote
 *   - This is a pure function
 */
export function sanitize(input: string, secret: string): string {
  let result = input;

  if (secret.length > 0) {
    // split/join for literal replacement, keys contain '+' and '/'
    result = result.split(secret).join('[REDACTED]');
  }

  result = result.replace(/(^|[;\s"'])AccountKey=[^;\s"']*/g, '$1AccountKey=[REDACTED]');
  result = result.replace(/(^|[?&\s"'])sig=[^&\s"']*/g, '$1sig=[REDACTED]');
  result = result.replace(/(^|[?&\s"'])se=[^&\s"']*/g, '$1se=[REDACTED]');

  return result;
}

/**
 * Create a Logger instance with secret sanitization.
 *
 * @param level - Minimum log level to emit. Messages below this level are suppressed.
 * @param secret - The account key to scrub from all output. Can be empty string
 *   before the connection string has been read.
 *
 * Contract:
 *   - All log output is formatted as: [blob-courier] [LEVEL] [ISO-timestamp] message
 *   - Every line goes through sanitize() before it is written
 *   - Output goes to console.log (debug, info) and console.error (warn, error)
 *   - The ...args are JSON.stringified and appended to the message (also sanitized)
 */
export function createLogger(level: LogLevel, secret: string): Logger {
  const minLevel = LOG_LEVEL_ORDER[level];

  function formatArgs(args: unknown[]): string {
    if (args.length === 0) return '';
    const parts = args.map((arg) => {
      if (arg instanceof Error) return arg.message;
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    });
    return ' ' + parts.join(' ');
  }

  function emit(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVEL_ORDER[msgLevel] < minLevel) return;

    const timestamp = new Date().toISOString();
    const prefix = `[blob-courier] [${msgLevel.toUpperCase()}] [${timestamp}]`;
    const raw = `${prefix} ${message}${formatArgs(args)}`;
    const sanitized = sanitize(raw, secret);

    if (msgLevel === 'debug' || msgLevel === 'info') {
      console.log(sanitized);
    } else {
      console.error(sanitized);
    }
  }

  return {
    debug(message: string, ...args: unknown[]): void {
      emit('debug', message, args);
    },
    info(message: string, ...args: unknown[]): void {
      emit('info', message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      emit('warn', message, args);
    },
    error(message: string, ...args: unknown[]): void {
      emit('error', message, args);
    },
  };
}
