// src/lib/ollama.ts
import { type GenerateRequest, type GenerateResponse, Ollama } from "ollama";
import { ConfigError, type Env } from "./config";

/**
 * Per-request model configuration overriding environment defaults.
 * Precedence (highest → lowest): injected `gen` > ModelConfig > environment.
 */
export interface ModelConfig {
	// NOTE: required to avoid accidental empty model invocation
	model: string;
	host?: string;
	// NOTE: adds Authorization bearer header when provided
	apiKey?: string;
}

export type GenOpts = {
	temperature?: number;
	maxTokens?: number;
};

/** The non-streaming slice of the client; `Ollama` satisfies it. */
export type OllamaLike = {
	generate(
		request: GenerateRequest & { stream: false },
	): Promise<Pick<GenerateResponse, "response">>;
};

/** Prompt-in/text-out shape the narrative layer depends on. */
export type GenerateFn = (prompt: string, opts?: GenOpts) => Promise<string>;

/**
 * Resolve a `ModelConfig` by merging overrides with environment defaults.
 * Throws `ConfigError` when no model is available.
 */
export function resolveModelConfig(
	cfg?: Partial<ModelConfig>,
	env: Env = process.env,
	help?: string,
): ModelConfig {
	const model = cfg?.model ?? env.OLLAMA_MODEL;
	if (model == null || model.trim() === "") {
		throw new ConfigError(
			help ??
				"OLLAMA_MODEL missing. Provide ModelConfig.model or set env OLLAMA_MODEL.",
		);
	}
	const host = (cfg?.host ?? env.OLLAMA_ENDPOINT ?? env.OLLAMA_HOST)?.trim();
	const apiKey = (cfg?.apiKey ?? env.OLLAMA_API_KEY)?.trim();
	return {
		model: model.trim(),
		host: host ? host : undefined,
		apiKey: apiKey ? apiKey : undefined,
	};
}

function createOllamaClient(cfg: ModelConfig): OllamaLike {
	return new Ollama({
		host: cfg.host ?? "http://localhost:11434",
		headers: cfg.apiKey ? { Authorization: `Bearer ${cfg.apiKey}` } : undefined,
	});
}

/**
 * Bind a model to a non-streaming `generate` call.
 * Accepts an optional client to facilitate testing.
 */
export function createGenerator(
	cfg: ModelConfig,
	client?: OllamaLike,
): GenerateFn {
	const ollama = client ?? createOllamaClient(cfg);
	return async (prompt, opts = {}) => {
		const { temperature = 0.2, maxTokens } = opts;
		const res = await ollama.generate({
			model: cfg.model,
			prompt,
			stream: false,
			options: {
				temperature,
				...(typeof maxTokens === "number" ? { num_predict: maxTokens } : {}),
			},
		});
		return (res.response ?? "").trim();
	};
}
