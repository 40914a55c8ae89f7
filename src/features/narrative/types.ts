import type { Env } from "@lib/config";
import type { GenerateFn, ModelConfig } from "@lib/ollama";
import type { NoticeLogger, RepositoryRecord } from "@lib/types";

export type NarrativeDeps = {
	/** Injected generator (tests, custom backends); wins over `modelConfig`. */
	gen?: GenerateFn;
	modelConfig?: Partial<ModelConfig>;
	env?: Env;
	logger?: NoticeLogger;
};

export type ConnectionStatus = { ok: boolean; message: string };

export type NarrativeService = {
	/** False when no model resolves; every call then degrades instead of failing. */
	readonly configured: boolean;
	analyseRepository(record: RepositoryRecord): Promise<string>;
	translateQuery(freeText: string): Promise<string>;
	testConnection(): Promise<ConnectionStatus>;
};
