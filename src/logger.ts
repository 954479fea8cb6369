/**
 * Module-scoped color-coded loggers for the Vento MQTT bridge.
 *
 * One root pino logger is created from the parsed configuration; each
 * module gets a child bound to its name, with an assigned color in
 * development output for easy visual identification.
 */
import pino from "pino";
import type { Logger } from "pino";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Device side
  protocol: "\x1b[35m", // magenta
  device: "\x1b[32m", // green

  // Broker side
  mqtt: "\x1b[91m", // bright red
  topics: "\x1b[36m", // cyan

  // Coordination
  bridge: "\x1b[33m", // yellow

  // Infrastructure
  config: "\x1b[90m", // gray
} as const satisfies Record<string, string>;

const RESET = "\x1b[0m";

/**
 * The colored tag only means something to pino-pretty; JSON output keeps
 * the plain `module` binding.
 */
const jsonFormatters = {
  bindings: (bindings: Record<string, unknown>): Record<string, unknown> => {
    const { tag: _tag, ...rest } = bindings;
    return rest;
  },
};

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LoggingOptions = Readonly<{
  level: LogLevel;
  /** Human-readable output via pino-pretty instead of JSON lines */
  pretty: boolean;
  /** Append JSON lines to this file instead of stdout */
  file: string | undefined;
}>;

/**
 * Create the process-wide root logger.
 *
 * @example
 * const root = createRootLogger({ level: "info", pretty: true, file: undefined });
 * const log = createLogger(root, "device");
 */
export function createRootLogger(options: LoggingOptions): Logger {
  if (options.file !== undefined) {
    return pino(
      {
        level: options.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: jsonFormatters,
      },
      pino.destination({ dest: options.file, mkdir: true, sync: false }),
    );
  }

  if (options.pretty) {
    // Pretty printing for development
    return pino({
      level: options.level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          messageFormat: "{tag} {msg}",
          ignore: "pid,hostname,module,tag",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON for production
  return pino({
    level: options.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: jsonFormatters,
  });
}

/**
 * Create a module-scoped child logger.
 *
 * @example
 * const log = createLogger(root, "bridge");
 * log.info({ topic }, "Command received");
 */
export function createLogger(root: Logger, module: ModuleName): Logger {
  const color = MODULE_COLORS[module];
  return root.child({ module, tag: `${color}[${module}]${RESET}` });
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.info({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.info(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 */
export function logOperationFailed(
  logger: Logger,
  operation: string,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error(
    { operation, error: errorMessage, ...context },
    `✗ ${operation} failed: ${errorMessage}`,
  );
}
