// src/lib/config.ts
// Environment-backed settings shared by the CLI and the public API.

export type Env = Record<string, string | undefined>;

export type ScoutConfig = {
	github: {
		token?: string;
		apiBase: string;
		timeoutMs: number;
		userAgent: string;
		initialQuota: number;
		quotaLowWater: number;
	};
	exportsDir: string;
	debug: boolean;
};

/**
 * Thrown instead of exiting the process when required configuration is missing.
 * Test via `instanceof ConfigError` to provide user-facing guidance.
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export const DEFAULT_API_BASE = "https://api.github.com";
export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_USER_AGENT = "repo-scout/0.1";
/** Unauthenticated hourly search budget until `checkQuota` says otherwise. */
export const DEFAULT_INITIAL_QUOTA = 60;
export const DEFAULT_QUOTA_LOW_WATER = 5;

function nonBlank(v: string | undefined): string | undefined {
	const s = v?.trim();
	return s ? s : undefined;
}

function intOr(v: string | undefined, fallback: number): number {
	const s = nonBlank(v);
	if (s === undefined || !/^-?\d+$/.test(s)) return fallback;
	return Number(s);
}

export function loadConfig(env: Env = process.env): ScoutConfig {
	return {
		github: {
			token: nonBlank(env.GITHUB_TOKEN),
			apiBase: (nonBlank(env.GITHUB_API_BASE) ?? DEFAULT_API_BASE).replace(
				/\/+$/,
				"",
			),
			timeoutMs: intOr(env.GITHUB_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
			userAgent: nonBlank(env.GITHUB_USER_AGENT) ?? DEFAULT_USER_AGENT,
			initialQuota: intOr(env.SCOUT_INITIAL_QUOTA, DEFAULT_INITIAL_QUOTA),
			quotaLowWater: intOr(env.SCOUT_QUOTA_LOW_WATER, DEFAULT_QUOTA_LOW_WATER),
		},
		exportsDir: nonBlank(env.EXPORTS_DIR) ?? "./exports",
		debug: !!nonBlank(env.DEBUG),
	};
}
