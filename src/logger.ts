import chalk from "chalk";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

type LogFn = (message: unknown, ...args: unknown[]) => void;

export interface Logger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  trace: LogFn;
  /** Logger préfixé `[scope]` qui délègue au logger parent. */
  child(scope: string): Logger;
}

const levelRank: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const paint: Record<LogLevel, (text: string) => string> = {
  error: (t) => chalk.red.bold(t),
  warn: (t) => chalk.yellow(t),
  info: (t) => chalk.cyan(t),
  debug: (t) => chalk.gray(t),
  trace: (t) => chalk.magenta(t),
};

// Résolu à l'appel: les tests remplacent console.*
const sink: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.log(line),
  trace: (line) => console.log(line),
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(levelRank, value);
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function stringify(value: unknown): string {
  if (value instanceof Error) return value.stack ?? `${value.name}: ${value.message}`;
  return String(value);
}

function emit(level: LogLevel, message: unknown, args: unknown[]): void {
  if (levelRank[level] > levelRank[currentLevel]) return;
  const text = [message, ...args].map(stringify).join(" ");
  sink[level](paint[level](`[${new Date().toISOString()}] [${level.toUpperCase()}] ${text}`));
}

function scoped(parent: Logger, scope: string): Logger {
  const tag = (message: unknown): string => `[${scope}] ${stringify(message)}`;
  return {
    error: (message, ...args) => parent.error(tag(message), ...args),
    warn: (message, ...args) => parent.warn(tag(message), ...args),
    info: (message, ...args) => parent.info(tag(message), ...args),
    debug: (message, ...args) => parent.debug(tag(message), ...args),
    trace: (message, ...args) => parent.trace(tag(message), ...args),
    child: (sub) => scoped(parent, `${scope}:${sub}`),
  };
}

export const logger: Logger = {
  error: (message, ...args) => emit("error", message, args),
  warn: (message, ...args) => emit("warn", message, args),
  info: (message, ...args) => emit("info", message, args),
  debug: (message, ...args) => emit("debug", message, args),
  trace: (message, ...args) => emit("trace", message, args),
  child: (scope) => scoped(logger, scope),
};
