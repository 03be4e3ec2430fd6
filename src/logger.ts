import pino from "pino";
import type { ParleyConfig } from "./config.js";

export type Logger = pino.Logger;

export interface LoggerOptions extends Pick<ParleyConfig, "logLevel"> {
  /** Human-readable output through pino-pretty; raw JSON lines otherwise. */
  readonly pretty?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  const pretty = options.pretty ?? process.stdout.isTTY === true;

  if (!pretty) {
    return pino({ level: options.logLevel, base: { service: "parley" } });
  }

  return pino({
    level: options.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
      },
    },
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
