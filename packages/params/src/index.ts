export * from "./database";
export * from "./types";
