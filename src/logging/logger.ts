import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const STDERR_FD = 2;

/**
 * Log records go to stderr (or `config.file`) so that a report written to
 * stdout can be piped as-is.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  const destination = config?.file ?? STDERR_FD;

  if (isJson) {
    return pino({ level }, pino.destination({ dest: destination, sync: true }));
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination },
    },
  });
}
