import pino from 'pino';
import { prettyFactory } from 'pino-pretty';

type RedactionValue = Record<string, unknown> | unknown[] | string | number | boolean | null | undefined;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type LoggingOptions = {
  level?: LogLevel;
  /** Plain-text run log written next to the reports. */
  logFile?: string;
  console?: boolean;
};

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const REDACT_KEYS = new Set([
  'apiKey',
  'authorization',
  'auth',
  'token',
  'secret',
  'password',
  'credentials',
]);

const sanitize = (value: unknown, seen = new WeakSet<object>()): RedactionValue => {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'object') {
    return String(value);
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (seen.has(value)) {
    return '[REDACTED]';
  }
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((entry) => sanitize(entry, seen));
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (REDACT_KEYS.has(key) || /secret|token|auth|password/i.test(key)) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = sanitize(entry, seen);
    }
  }
  return result;
};

const toBindings = (meta: unknown): Record<string, unknown> => {
  const sanitized = sanitize(meta);
  if (sanitized !== null && typeof sanitized === 'object' && !Array.isArray(sanitized)) {
    return sanitized;
  }
  return { detail: sanitized };
};

export const resolveLogLevel = (value: string | undefined, fallback: LogLevel = 'info'): LogLevel => {
  const match = LEVELS.find((level) => level === value?.trim().toLowerCase());
  return match ?? fallback;
};

type Sink = {
  stream: pino.DestinationStream;
  close: () => void;
};

const prettySink = (destination: number | string, colorize: boolean): Sink => {
  const target = pino.destination({ dest: destination, sync: true, mkdir: typeof destination === 'string' });
  const prettify = prettyFactory({
    colorize,
    translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
    ignore: 'pid,hostname',
    singleLine: true,
  });
  return {
    stream: {
      write: (line: string) => {
        target.write(prettify(line));
      },
    },
    close: () => {
      if (typeof destination === 'string') {
        target.flushSync();
        target.end();
      }
    },
  };
};

let sinks: Sink[] = [];
let activeLogFile: string | undefined;

const buildLogger = (options: LoggingOptions): pino.Logger => {
  for (const sink of sinks) {
    sink.close();
  }
  const level = options.level ?? resolveLogLevel(process.env.LOG_LEVEL);
  sinks = [];
  if (options.console !== false) {
    sinks.push(prettySink(1, process.stdout.isTTY === true));
  }
  if (options.logFile) {
    sinks.push(prettySink(options.logFile, false));
  }
  activeLogFile = options.logFile;
  if (level === 'silent' || sinks.length === 0) {
    return pino({ level: 'silent' });
  }
  return pino(
    { level, base: null },
    pino.multistream(sinks.map((sink) => ({ level, stream: sink.stream }))),
  );
};

let logger = buildLogger({});

/** Replace the shared logger, closing any previous run-log file. */
export const configureLogging = (options: LoggingOptions): void => {
  logger = buildLogger(options);
};

export const currentLogFile = (): string | undefined => activeLogFile;

export const logDebug = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    logger.debug(message);
    return;
  }
  logger.debug(toBindings(meta), message);
};

export const logInfo = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    logger.info(message);
    return;
  }
  logger.info(toBindings(meta), message);
};

export const logWarn = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    logger.warn(message);
    return;
  }
  logger.warn(toBindings(meta), message);
};

export const logError = (message: string, meta?: unknown): void => {
  if (meta === undefined) {
    logger.error(message);
    return;
  }
  logger.error(toBindings(meta), message);
};

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
