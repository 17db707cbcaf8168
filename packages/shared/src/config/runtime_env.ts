export type AppEnv = "local" | "dev" | "prod";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface RuntimeEnv {
  appEnv: AppEnv;
  logLevel: LogLevel;
  // Pretty-print logs through pino-pretty instead of emitting JSON lines
  logPretty: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseBoolEnv(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim().length === 0) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") return false;
  return fallback;
}

export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const appEnvRaw = env.APP_ENV ?? "local";
  const appEnv: AppEnv =
    appEnvRaw === "prod" || appEnvRaw === "dev" || appEnvRaw === "local" ? appEnvRaw : "local";

  const levelRaw = (env.LOG_LEVEL ?? "info").trim().toLowerCase();
  const logLevel = isLogLevel(levelRaw) ? levelRaw : "info";

  return {
    appEnv,
    logLevel,
    // Opt-in: the pino-pretty transport runs in a worker thread.
    logPretty: parseBoolEnv(env.LOG_PRETTY, false),
  };
}
