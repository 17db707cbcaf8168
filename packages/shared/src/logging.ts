import pino from "pino";
import { loadRuntimeEnv, type RuntimeEnv } from "./config/runtime_env";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

/**
 * Build the root logger from runtime config.
 * - Pretty: colorized output through pino-pretty
 * - Otherwise: JSON lines for log aggregation
 */
export function createBaseLogger(runtime: RuntimeEnv): pino.Logger {
  return pino({
    level: runtime.logLevel,
    transport: runtime.logPretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

const baseLogger = createBaseLogger(loadRuntimeEnv());

/**
 * Create a child logger with component context.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId ? { correlationId: options.correlationId } : {}),
  });
}
