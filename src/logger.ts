/**
 * Leveled, structured console logging.
 *
 * Every component takes a `Logger` so hosts can plug in their own sink;
 * `createLogger` is the default used by the CLI.
 */

import { cli } from "./utils";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type LoggerConfig = {
  level: LogLevel | "silent";
  service: string;
  pretty: boolean;
};

const ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const PRETTY_LEVEL: Record<LogLevel, (s: string) => string> = {
  debug: cli.dim,
  info: cli.green,
  warn: cli.yellow,
  error: cli.red,
};

function serializeField(value: unknown): unknown {
  return value instanceof Error ? value.message : value;
}

function serializeFields(fields: LogFields): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = serializeField(value);
  }
  return out;
}

export function formatEntry(
  config: Pick<LoggerConfig, "service" | "pretty">,
  level: LogLevel,
  message: string,
  fields: LogFields | undefined,
  now: Date = new Date()
): string {
  const timestamp = now.toISOString();
  const extra = fields && Object.keys(fields).length > 0 ? serializeFields(fields) : undefined;

  if (config.pretty) {
    const metaStr = extra ? ` ${JSON.stringify(extra)}` : "";
    return `[${timestamp}] ${PRETTY_LEVEL[level](level.toUpperCase())}: ${message}${metaStr}`;
  }

  return JSON.stringify({
    timestamp,
    level,
    service: config.service,
    message,
    ...(extra ?? {}),
  });
}

export function createLogger(config: LoggerConfig): Logger {
  const enabled = (target: LogLevel) =>
    config.level !== "silent" && ORDER[target] >= ORDER[config.level];

  // stderr only, so stdout stays clean for piped range output
  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    if (!enabled(level)) return;
    console.error(formatEntry(config, level, message, fields));
  };

  return {
    debug: (m, f) => write("debug", m, f),
    info: (m, f) => write("info", m, f),
    warn: (m, f) => write("warn", m, f),
    error: (m, f) => write("error", m, f),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function logLevelFromEnv(
  raw: string | undefined = process.env.LOG_LEVEL
): LogLevel | "silent" {
  const level = raw?.trim().toLowerCase();
  if (
    level === "debug" ||
    level === "info" ||
    level === "warn" ||
    level === "error" ||
    level === "silent"
  ) {
    return level;
  }
  return "info";
}

/** Logger that adds `fields` to every entry. */
export function withFields(logger: Logger, fields: LogFields): Logger {
  return {
    debug: (m, f) => logger.debug(m, { ...fields, ...f }),
    info: (m, f) => logger.info(m, { ...fields, ...f }),
    warn: (m, f) => logger.warn(m, { ...fields, ...f }),
    error: (m, f) => logger.error(m, { ...fields, ...f }),
  };
}
