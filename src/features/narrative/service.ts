import { log as realLog } from "@lib/bootstrap";
import { ConfigError } from "@lib/config";
import {
	createGenerator,
	type GenerateFn,
	resolveModelConfig,
} from "@lib/ollama";
import type { RepositoryRecord } from "@lib/types";
import {
	buildAnalysisPrompt,
	buildTranslationPrompt,
	CONNECTION_PROBE,
	cleanTranslatedQuery,
} from "./prompts";
import type {
	ConnectionStatus,
	NarrativeDeps,
	NarrativeService,
} from "./types";

export const NOT_CONFIGURED =
	"Text generation is not configured. Set OLLAMA_MODEL to enable AI analysis.";
export const NO_RESPONSE = "No response generated";

function errMsg(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}

function resolveGenerator(deps: NarrativeDeps): GenerateFn | undefined {
	if (deps.gen) return deps.gen;
	try {
		return createGenerator(
			resolveModelConfig(deps.modelConfig, deps.env ?? process.env),
		);
	} catch (e) {
		if (e instanceof ConfigError) return undefined;
		throw e;
	}
}

/**
 * Boundary to the text-generation model. Without a model every operation
 * degrades: analysis yields `NOT_CONFIGURED`, translation echoes its input.
 */
export function createNarrativeService(
	deps: NarrativeDeps = {},
): NarrativeService {
	const logger = deps.logger ?? realLog;
	const gen = resolveGenerator(deps);

	async function analyseRepository(record: RepositoryRecord): Promise<string> {
		if (!gen) return NOT_CONFIGURED;
		try {
			const text = await gen(buildAnalysisPrompt(record));
			return text.trim() ? text : NO_RESPONSE;
		} catch (e) {
			logger.error(`Analysis failed for ${record.full_name ?? "repository"}:`, errMsg(e));
			return `Error analysing repository: ${errMsg(e)}`;
		}
	}

	async function translateQuery(freeText: string): Promise<string> {
		if (!gen) return freeText;
		try {
			const out = cleanTranslatedQuery(
				await gen(buildTranslationPrompt(freeText)),
			);
			if (!out) {
				logger.warn("Query conversion returned nothing; using the query as typed");
				return freeText;
			}
			logger.debug(`[translate] "${freeText}" -> ${out}`);
			return out;
		} catch (e) {
			logger.warn(`Could not convert query using AI: ${errMsg(e)}`);
			return freeText;
		}
	}

	async function testConnection(): Promise<ConnectionStatus> {
		if (!gen) return { ok: false, message: "No model configured" };
		try {
			const out = await gen(CONNECTION_PROBE, { maxTokens: 16 });
			return out.trim()
				? { ok: true, message: "Connected successfully" }
				: { ok: false, message: "No response received" };
		} catch (e) {
			return { ok: false, message: `Connection failed: ${errMsg(e)}` };
		}
	}

	return {
		configured: gen !== undefined,
		analyseRepository,
		translateQuery,
		testConnection,
	};
}
