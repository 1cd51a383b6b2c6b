/**
 * Logger utility for consistent logging across the trimmer.
 * Creates prefixed loggers for easy identification of log sources.
 */

export interface Logger {
  debug: (msg: string, ctx?: object) => void;
  info: (msg: string, ctx?: object) => void;
  warn: (msg: string, ctx?: object) => void;
  error: (msg: string, ctx?: object) => void;
}

export interface LoggerOptions {
  /** Emit debug lines (per-event selection traces). Off by default. */
  debug?: boolean;
}

type ConsoleMethod = 'debug' | 'log' | 'warn' | 'error';

function write(method: ConsoleMethod, prefix: string, msg: string, ctx?: object): void {
  if (ctx) {
    console[method](`[${prefix}] ${msg}`, ctx);
  } else {
    console[method](`[${prefix}] ${msg}`);
  }
}

/**
 * Create a logger with a consistent prefix for identifying the source.
 * @param prefix - The prefix to prepend to all log messages (e.g., "Export")
 */
export function createLogger(prefix: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? false;

  return {
    debug: (msg, ctx) => {
      if (debugEnabled) write('debug', prefix, msg, ctx);
    },
    info: (msg, ctx) => write('log', prefix, msg, ctx),
    warn: (msg, ctx) => write('warn', prefix, msg, ctx),
    error: (msg, ctx) => write('error', prefix, msg, ctx),
  };
}

