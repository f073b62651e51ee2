export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFn = (msg: string, ...rest: unknown[]) => void;

export type LogSink = (line: string, ...rest: unknown[]) => void;

export type Logger = Readonly<{
  level: LogLevel;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child: (scope: string) => Logger;
}>;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const rank: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

// stdout carries the stdio protocol stream, so everything goes to stderr.
const stderrSink: LogSink = (line, ...rest) => {
  console.error(line, ...rest);
};

export const createLogger = (
  scope: string,
  level: LogLevel = 'info',
  sink: LogSink = stderrSink,
): Logger => {
  const emit =
    (at: Exclude<LogLevel, 'silent'>): LogFn =>
    (msg, ...rest) => {
      if (rank[at] < rank[level]) return;
      sink(`[${scope}] ${msg}`, ...rest);
    };

  return Object.freeze({
    level,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    child: (child: string) => createLogger(`${scope}:${child}`, level, sink),
  });
};

export const silentLogger: Logger = createLogger('silent', 'silent');
