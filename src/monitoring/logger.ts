/**
 * Structured Logger (Pino)
 *
 * All modules import { logger } from this file instead of using console.log.
 * Produces JSON logs in production and pretty-printed logs in development.
 *
 * Every log entry includes:
 * - service: "einvoice-allowance-downloader"
 * - pid: process ID
 * - Contextual fields passed as the first argument object
 *
 * Credential fields are redacted wherever they appear in a context object.
 */
import pino from "pino";
import config from "../config";

export const logger = pino({
  level: config.logLevel,
  transport:
    config.env === "development"
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  base: {
    service: "einvoice-allowance-downloader",
    pid: process.pid,
  },
  redact: {
    paths: ["password", "*.password", "credentials.password"],
    censor: "[REDACTED]",
  },
});

/** Mask an identifier for log output, keeping only its last 3 characters */
export function maskId(value: string): string {
  if (value.length <= 3) return "*".repeat(value.length);
  return `${"*".repeat(value.length - 3)}${value.slice(-3)}`;
}
