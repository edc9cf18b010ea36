export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = "text" | "json";
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.RUNNER_LOG_LEVEL;

let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";
let activeFormat: LogFormat = "text";

export function configureLogging(options: { level?: LogLevel; format?: LogFormat }): void {
  if (options.level) activeLevel = options.level;
  if (options.format) activeFormat = options.format;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

// --- Formatting ---

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "string") return /\s/.test(value) ? JSON.stringify(value) : value;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

function formatText(component: string, msg: string, fields?: LogFields): string {
  let line = `[${component}] ${msg}`;
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined) continue;
      line += ` ${key}=${formatValue(value)}`;
    }
  }
  return line;
}

function formatJson(level: LogLevel, component: string, msg: string, fields?: LogFields): string {
  const record: LogFields = { level, time: new Date().toISOString(), component, msg };
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      record[key] = value instanceof Error ? value.message : value;
    }
  }
  return JSON.stringify(record);
}

function write(level: Exclude<LogLevel, "silent">, component: string, msg: string, fields?: LogFields): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[activeLevel]) return;
  const line =
    activeFormat === "json" ? formatJson(level, component, msg, fields) : formatText(component, msg, fields);
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/** Logger that tags every line with `[component]`. */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, fields) => write("debug", component, msg, fields),
    info: (msg, fields) => write("info", component, msg, fields),
    warn: (msg, fields) => write("warn", component, msg, fields),
    error: (msg, fields) => write("error", component, msg, fields),
  };
}
