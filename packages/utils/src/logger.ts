/**
 * Levelled console logger
 *
 * The threshold comes from `LOG_LEVEL` (ERROR | WARN | LOG | INFO | DEBUG) unless
 * set explicitly with `logger.setLevel`.
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the threshold are written.
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  LOG = "LOG",
  INFO = "INFO",
  DEBUG = "DEBUG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

// Lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.LOG]: null,
  [LogLevel.INFO]: "\x1b[36m",
  [LogLevel.DEBUG]: "\x1b[32m",
};

const RESET = "\x1b[0m";

let explicitLevel: LogLevel | null = null;
let sink: LogSink | null = null;

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const upper = value?.toUpperCase();
  return Object.values(LogLevel).find(level => level === upper) ?? null;
}

const getCurrentLogLevel = (): LogLevel => explicitLevel ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;

const shouldLog = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value);
}

function isFields(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

/**
 * Build a record from `logger.x(message, fields?, ...rest)` arguments.
 *
 * A plain object in second position becomes `fields`; everything else is
 * appended to the message.
 */
export function toRecord(level: LogLevel, args: unknown[], tsMs = Date.now()): LogRecord {
  const [first, second, ...others] = args;
  const hasFields = isFields(second);
  const tail = hasFields ? others : args.slice(1);

  const message = [first, ...tail]
    .filter(a => a !== undefined)
    .map(stringify)
    .join(" ")
    .trim();

  const record: LogRecord = { tsMs, level, message };
  if (hasFields) {
    const fields: Record<string, string> = {};
    for (const [k, v] of Object.entries(second)) {
      fields[k] = stringify(v);
    }
    if (Object.keys(fields).length > 0) record.fields = fields;
  }
  return record;
}

/**
 * `[2024-01-01T00:00:00.000Z] [INFO] message {"key":"value"}`
 */
export function formatRecord(record: LogRecord, color = false): string {
  const header = `[${new Date(record.tsMs).toISOString()}] [${record.level}]`;
  const paint = COLORS[record.level];
  const head = color && paint ? `${paint}${header}${RESET}` : header;
  const fields = record.fields ? ` ${JSON.stringify(record.fields)}` : "";
  return `${head} ${record.message}${fields}`;
}

function emit(level: LogLevel, args: unknown[], consoleFn: (line: string) => void): void {
  if (!shouldLog(level)) return;

  const record = toRecord(level, args);
  if (sink) {
    sink.write(record);
    return;
  }
  consoleFn(formatRecord(record, process.stdout.isTTY === true));
}

export const logger = {
  log: (...args: unknown[]) => {
    emit(LogLevel.LOG, args, line => console.log(line));
  },
  info: (...args: unknown[]) => {
    emit(LogLevel.INFO, args, line => console.info(line));
  },
  debug: (...args: unknown[]) => {
    emit(LogLevel.DEBUG, args, line => console.log(line));
  },
  warn: (...args: unknown[]) => {
    emit(LogLevel.WARN, args, line => console.warn(line));
  },
  error: (...args: unknown[]) => {
    emit(LogLevel.ERROR, args, line => console.error(line));
  },
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  /**
   * Override `LOG_LEVEL` (e.g. from a validated env). `null` goes back to the environment variable.
   */
  setLevel: (level: LogLevel | null) => {
    explicitLevel = level;
  },
  /**
   * Route records to a custom sink instead of the console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  clearSink: () => {
    sink = null;
  },
};
