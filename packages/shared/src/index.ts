export * from "./types/journal";
export * from "./schemas";
export * from "./env";
export * from "./utils/time";
