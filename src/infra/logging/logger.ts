import winston from "winston";
import type { Logger } from "winston";

export type { Logger };

const ALL_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

/**
 * Root logger. Everything goes to stderr: stdout carries the MCP stdio
 * transport when the server runs in stdio mode.
 */
export const logger: Logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: process.env.LOG_SILENT === "true",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "medical-doc-search" },
  transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function moduleLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}
