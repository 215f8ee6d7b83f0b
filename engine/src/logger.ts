/**
 * Lending Risk Engine - Logging
 *
 * One JSON winston logger per process; components log through a child
 * carrying their `scope`.
 */

import { createLogger, format, transports, type Logger } from "winston";

export const logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: format.combine(format.timestamp(), format.json()),
  defaultMeta: { service: "lending-risk-engine" },
  transports: [new transports.Console()],
  silent: process.env.NODE_ENV === "test",
});

export function scopedLogger(scope: string): Logger {
  return logger.child({ scope });
}
