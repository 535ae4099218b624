/**
 * Structured Logger (Pino)
 *
 * Modules import { logger } from this file instead of using console.log.
 * Engine components take a Logger parameter and fall back to this instance.
 * Produces JSON logs in production and pretty-printed logs in development.
 *
 * Every log entry includes:
 * - service: "shadow-challenge-resolver" (for log aggregation)
 * - pid: process ID
 * - Contextual fields passed as the first argument object
 */
import pino from "pino";
import config from "../config";

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: config.logLevel,
  // In development, use pino-pretty for human-readable output
  transport:
    config.env === "development"
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  // Base fields included in every log entry
  base: {
    service: "shadow-challenge-resolver",
    pid: process.pid,
  },
});
