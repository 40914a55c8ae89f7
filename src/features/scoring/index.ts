export * from "./config";
export * from "./service";
export type * from "./types";
