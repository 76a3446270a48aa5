export type LogLevel = "error" | "warn" | "info" | "debug";

type Meta = Record<string, unknown>;

export interface Logger {
  error(msg: string, meta?: Meta): void;
  warn(msg: string, meta?: Meta): void;
  info(msg: string, meta?: Meta): void;
  debug(msg: string, meta?: Meta): void;
  child(bindings: Meta): Logger;
}

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

function threshold(): number {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  return LEVELS[isLogLevel(level) ? level : "info"];
}

// Errors don't survive JSON.stringify; flatten them first.
function serialize(meta: Meta): Meta {
  const out: Meta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] =
      value instanceof Error
        ? { name: value.name, message: value.message }
        : typeof value === "bigint"
          ? value.toString()
          : value;
  }
  return out;
}

function log(level: LogLevel, bindings: Meta, msg: string, meta?: Meta): void {
  if (LEVELS[level] > threshold()) return;

  const entry = JSON.stringify({
    level,
    msg,
    ts: new Date().toISOString(),
    ...serialize(bindings),
    ...(meta ? serialize(meta) : {}),
  });
  if (level === "error") {
    console.error(entry);
  } else if (level === "warn") {
    console.warn(entry);
  } else if (level === "debug") {
    console.debug(entry);
  } else {
    console.log(entry);
  }
}

function createLogger(bindings: Meta): Logger {
  return {
    error: (msg, meta?) => log("error", bindings, msg, meta),
    warn: (msg, meta?) => log("warn", bindings, msg, meta),
    info: (msg, meta?) => log("info", bindings, msg, meta),
    debug: (msg, meta?) => log("debug", bindings, msg, meta),
    child: (extra) => createLogger({ ...bindings, ...extra }),
  };
}

export const logger: Logger = createLogger({});
