import { config, type LogLevel } from "../config";

type LogMeta = Record<string, unknown>;

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const writers: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export const formatLogLine = (level: LogLevel, message: string, meta: LogMeta = {}, timestamp = new Date()) => {
  const { component, ...rest } = meta;
  const scope = typeof component === "string" ? ` [${component}]` : "";
  const base = `[${timestamp.toISOString()}] [${level.toUpperCase()}]${scope} ${message}`;
  return Object.keys(rest).length === 0 ? base : `${base} ${JSON.stringify(rest)}`;
};

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** A logger that adds `bindings` to every entry; a `component` binding becomes a line prefix. */
  child(bindings: LogMeta): Logger;
}

const createLogger = (bindings: LogMeta = {}): Logger => {
  const log = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (levelPriority[level] < levelPriority[config.logLevel]) return;
    writers[level](formatLogLine(level, message, { ...bindings, ...meta }));
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    child: (extra) => createLogger({ ...bindings, ...extra }),
  };
};

export const logger = createLogger();

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return JSON.stringify(error) ?? String(error);
};
