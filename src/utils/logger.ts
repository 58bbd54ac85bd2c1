type Level = "debug" | "info" | "warn" | "error";

import { LOG_LEVEL, SERVICE_NAME } from "../config";

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLevel(v: string): v is Level {
  return Object.hasOwn(levelOrder, v);
}

// "warning" is an alias for "warn".
const threshold: Level = LOG_LEVEL === "warning" ? "warn" : isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";

export type Logger = {
  [L in Level]: (msg: string, extra?: Record<string, unknown>) => void;
};

function log(level: Level, msg: string, context: Record<string, unknown>, extra?: Record<string, unknown>) {
  if (levelOrder[level] < levelOrder[threshold]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    service: SERVICE_NAME,
    msg,
    ...context,
    ...extra,
  };
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload));
}

function bind(context: Record<string, unknown>): Logger {
  return {
    debug: (msg, extra) => log("debug", msg, context, extra),
    info: (msg, extra) => log("info", msg, context, extra),
    warn: (msg, extra) => log("warn", msg, context, extra),
    error: (msg, extra) => log("error", msg, context, extra),
  };
}

export const logger = bind({});

/** Logger that stamps every line with the emitting module. */
export function createLogger(module: string): Logger {
  return bind({ module });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
