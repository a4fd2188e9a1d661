/**
 * Structured Logger Module
 *
 * Provides a Pino-based structured JSON logger for the converter.
 * Log lines go to stderr so stdout only carries the CLI's result line.
 *
 * Usage:
 * - Import the default logger for module-level logging
 * - Use `createRunLogger` for a per-conversion child logger
 *
 * Environment variables:
 * - `LOG_LEVEL`: Minimum log level (default: "info")
 * - `NODE_ENV`: When "development", enables pretty-printing via pino-pretty
 */

import { pino } from "pino";
import { randomUUID } from "node:crypto";

const STDERR_FD = 2;

/**
 * Determine transport configuration based on environment.
 * In development, use pino-pretty for human-readable output.
 * Otherwise, output raw JSON.
 */
function getTransport(): pino.TransportSingleOptions | undefined {
  if (process.env.NODE_ENV === "development") {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: STDERR_FD,
      },
    };
  }
  return undefined;
}

const options: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: "jsonsheet",
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

const transport = getTransport();

/**
 * Root Pino logger instance.
 */
const logger = transport
  ? pino({ ...options, transport })
  : pino(options, pino.destination(STDERR_FD));

/**
 * Creates a child logger scoped to a single conversion run.
 *
 * @param input - Source JSON path
 * @param output - Target workbook path
 * @param runId - Run ID to bind (a new one is generated when omitted)
 * @returns Pino child logger with runId, input and output bindings
 */
export function createRunLogger(
  input: string,
  output: string,
  runId: string = generateRunId(),
): pino.Logger {
  return logger.child({ runId, input, output });
}

/**
 * Generates a new UUID v4 run ID.
 */
export function generateRunId(): string {
  return randomUUID();
}

export type Logger = pino.Logger;

export default logger;
