import chalk from "chalk";

export enum LogLevel {
  DEBUG = 10,
  INFO = 20,
  WARN = 30,
  ERROR = 40,
  SILENT = 100
}

export type LogFields = Record<string, string | number | boolean | undefined>;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Structured event, e.g. `effect.applied`, rendered as `name key=value ...`. */
  event(name: string, fields?: LogFields, level?: LogLevel): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: (line: string) => void;
  color?: boolean;
}

const LABELS: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error"
};

function paint(level: LogLevel, text: string, color: boolean): string {
  if (!color) return text;
  switch (level) {
    case LogLevel.DEBUG:
      return chalk.gray(text);
    case LogLevel.WARN:
      return chalk.yellow(text);
    case LogLevel.ERROR:
      return chalk.red(text);
    default:
      return chalk.cyan(text);
  }
}

function formatValue(value: string | number | boolean): string {
  const text = String(value);
  return /[\s"=]/.test(text) ? JSON.stringify(text) : text;
}

export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(" ");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? LogLevel.WARN;
  const sink = options.sink ?? ((line: string) => console.error(line));
  const color = options.color ?? (options.sink === undefined && chalk.level > 0);

  const write = (lineLevel: LogLevel, message: string): void => {
    if (lineLevel < level || lineLevel === LogLevel.SILENT) return;
    const label = LABELS[lineLevel];
    sink(`${paint(lineLevel, `[wtx:${label}]`, color)} ${message}`);
  };

  return {
    level,
    debug: (message) => write(LogLevel.DEBUG, message),
    info: (message) => write(LogLevel.INFO, message),
    warn: (message) => write(LogLevel.WARN, message),
    error: (message) => write(LogLevel.ERROR, message),
    event: (name, fields = {}, eventLevel = LogLevel.DEBUG) => {
      const rendered = formatFields(fields);
      write(eventLevel, rendered ? `${name} ${rendered}` : name);
    }
  };
}

/** Logger that drops everything; used where a caller passes none. */
export const silentLogger: Logger = createLogger({level: LogLevel.SILENT, sink: () => undefined});
