export * from "./config/runtime_env";
export * from "./errors";
export * from "./logging";
