import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export type Logger = pino.Logger;

export interface LoggerOptions {
  // defaults to on outside production
  pretty?: boolean;
}

/**
 * Root logger for a command or server. A "silent" logger never starts the
 * pino-pretty transport, so library classes can default to one for free.
 */
export function createLogger(level: LogLevel | "silent" = "info", opts: LoggerOptions = {}): Logger {
  const pretty = level !== "silent" && (opts.pretty ?? process.env.NODE_ENV !== "production");
  if (!pretty) {
    return pino({ name: "chanwatch", level });
  }

  return pino({
    name: "chanwatch",
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    },
  });
}

export function silentLogger(): Logger {
  return createLogger("silent");
}
