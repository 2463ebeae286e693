export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  error(msg: string): void;
  warn(msg: string): void;
  info(msg: string): void;
  debug(msg: string): void;
}

type LogSink = (line: string) => void;

/** stdout belongs to the stdio transport, so everything goes to stderr */
const stderrSink: LogSink = (line) => console.error(line);

/** Prefixed logger with PID for multi-instance disambiguation */
export function createLogger(level: LogLevel = 'warn', sink: LogSink = stderrSink): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit = (at: Exclude<LogLevel, 'silent'>, tag: string, msg: string): void => {
    if (LOG_LEVELS.indexOf(at) > threshold) return;
    sink(`[mxdoc pid:${process.pid}] ${tag}${msg}`);
  };
  return {
    error: (msg) => emit('error', 'error: ', msg),
    warn: (msg) => emit('warn', 'warning: ', msg),
    info: (msg) => emit('info', '', msg),
    debug: (msg) => emit('debug', 'debug: ', msg),
  };
}

export const silentLogger: Logger = createLogger('silent');
