// src/lib/bootstrap.ts
import { loadConfig } from "@lib/config";
import { createLogger } from "@lib/logger";

/** Settings resolved once from the process environment. */
export const config = loadConfig();

// Shared logger for CLIs (pure; no side effects)
export const log = createLogger({ debug: config.debug });
