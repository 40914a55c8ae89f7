// Shared public types & errors
export * from "./api/public.types";
// Public library-facing APIs
export { analyseRepository } from "./api/analyse.public";
export type { AnalyseOptions, AnalyseResult } from "./api/analyse.public";
export { checkConnections } from "./api/connections.public";
export type { ConnectionReport } from "./api/connections.public";
export { scanTrending } from "./api/scan.public";
export type { ScanOptions } from "./api/scan.public";
export { searchRepositories } from "./api/search.public";
export type { SearchOptions, SearchOutcome } from "./api/search.public";
// Building blocks
export * as content from "./features/content";
export * as narrative from "./features/narrative";
export * as scoring from "./features/scoring";
export * as search from "./features/search";
export * as trending from "./features/trending";
export { loadConfig } from "./lib/config";
export type { ScoutConfig } from "./lib/config";
