/**
 * Module-scoped color-coded loggers for camera-sentinel.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs.
 */
import pino from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Pipeline
  detector: "\x1b[36m", // cyan
  coordinator: "\x1b[33m", // yellow

  // Communication
  broker: "\x1b[91m", // bright red

  // Infrastructure
  app: "\x1b[34m", // blue
} as const satisfies Record<string, string>;

const RESET = "\x1b[0m";

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @example
 * const log = createLogger('detector');
 * log.info({ devices }, 'Watching devices');
 */
export function createLogger(module: ModuleName): pino.Logger {
  const color = MODULE_COLORS[module];

  if (config.NODE_ENV === "development") {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    name: module,
    level: config.LOG_LEVEL,
  });
}

/**
 * Log a publish the broker acknowledged, with its round-trip time.
 */
export function logPublishAcknowledged(
  logger: pino.Logger,
  message: "discovery" | "state",
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { publish: message, durationMs, ...context },
    `✓ ${message} acknowledged (${durationMs}ms)`,
  );
}

/**
 * Log a publish that never reached the broker. Publishes are not retried.
 */
export function logPublishFailed(
  logger: pino.Logger,
  message: "discovery" | "state",
  reason: string,
  context: Record<string, unknown> = {},
): void {
  logger.error(
    { publish: message, reason, ...context },
    `✗ ${message} not delivered: ${reason}`,
  );
}
