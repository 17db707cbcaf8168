import { describe, expect, it } from "vitest";
import { loadRuntimeEnv } from "./runtime_env";

describe("loadRuntimeEnv", () => {
  it("uses defaults when nothing is set", () => {
    const env = loadRuntimeEnv({});
    expect(env.appEnv).toBe("local");
    expect(env.logLevel).toBe("info");
    expect(env.logPretty).toBe(false);
  });

  it("falls back to local for unknown APP_ENV", () => {
    expect(loadRuntimeEnv({ APP_ENV: "staging" }).appEnv).toBe("local");
    expect(loadRuntimeEnv({ APP_ENV: "prod" }).appEnv).toBe("prod");
  });

  it("normalizes LOG_LEVEL and ignores unknown levels", () => {
    expect(loadRuntimeEnv({ LOG_LEVEL: " DEBUG " }).logLevel).toBe("debug");
    expect(loadRuntimeEnv({ LOG_LEVEL: "silent" }).logLevel).toBe("silent");
    expect(loadRuntimeEnv({ LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });

  it("keeps JSON output unless LOG_PRETTY asks otherwise", () => {
    expect(loadRuntimeEnv({}).logPretty).toBe(false);
    expect(loadRuntimeEnv({ APP_ENV: "local", NODE_ENV: "development" }).logPretty).toBe(false);
    expect(loadRuntimeEnv({ LOG_PRETTY: "maybe" }).logPretty).toBe(false);
  });

  it("turns pretty output on with LOG_PRETTY", () => {
    expect(loadRuntimeEnv({ APP_ENV: "prod", LOG_PRETTY: "yes" }).logPretty).toBe(true);
    expect(loadRuntimeEnv({ LOG_PRETTY: "1" }).logPretty).toBe(true);
    expect(loadRuntimeEnv({ LOG_PRETTY: "0" }).logPretty).toBe(false);
  });
});
