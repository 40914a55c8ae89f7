export * from "./prompts";
export * from "./service";
export type * from "./types";
