/**
 * Minimal structured logger for hook runs. Each line is one JSON object on
 * stdout (stderr for errors), which the agent copies into the unit log.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMethod = (ctx: Record<string, unknown>, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

export interface LoggerFactory {
  get(prefix: string): Logger;
}

const LEVEL_NAMES: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function log(level: LogLevel, ctx: Record<string, unknown>, msg: string): void {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  const line = JSON.stringify({ level, ...payload });
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger whose methods are absent below the given level.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: { level?: LogLevel } = {}
): LoggerFactory {
  const threshold = LEVELS[options.level ?? "info"];
  return {
    get(prefix: string) {
      const logger: Logger = {};
      for (const level of LEVEL_NAMES) {
        if (LEVELS[level] < threshold) continue;
        logger[level] = (ctx, msg) => log(level, { ...ctx, service: serviceName, prefix }, msg);
      }
      return logger;
    },
  };
}

/** A logger that drops everything; used as the default in tests and libraries. */
export const silentLogger: Logger = {};
