/**
 * Shared public types & helpers used across the scan, search, analyse and
 * connection-check entry points.
 */

export { ConfigError } from "@lib/config";
export type { ModelConfig } from "@lib/ollama";
export { resolveModelConfig } from "@lib/ollama";
export type { RepositoryRecord } from "@lib/types";

import type { NarrativeService } from "@features/narrative/types";
import { createNarrativeService } from "@features/narrative/service";
import { createSearchClient } from "@features/search/service";
import type { SearchClient } from "@features/search/types";
import type { log as realLog } from "@lib/bootstrap";
import type { ModelConfig } from "@lib/ollama";

export type OpStatus = "ok" | "error" | "skipped";

/** Injection points every public entry point accepts. */
export interface PublicDeps {
	client?: SearchClient;
	narrative?: NarrativeService;
	// NOTE: only consulted when `narrative` is not injected
	modelConfig?: ModelConfig;
	logger?: typeof realLog;
}

let sharedClient: SearchClient | undefined;

/**
 * Process-wide search client so the quota counter survives across calls.
 * Injected clients bypass it. It outlives any one caller, so it logs
 * through the shared `log` and never through `deps.logger`; callers that
 * need their own logger inject a client built with it.
 */
export function resolveClient(deps: PublicDeps): SearchClient {
	if (deps.client) return deps.client;
	sharedClient ??= createSearchClient();
	return sharedClient;
}

export function resolveNarrative(deps: PublicDeps): NarrativeService {
	return (
		deps.narrative ??
		createNarrativeService({
			modelConfig: deps.modelConfig,
			logger: deps.logger,
		})
	);
}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
