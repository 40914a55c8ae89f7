import type { LanguageBoostTable } from "./types";

export const POPULARITY_WEIGHTS = {
	stars: 1.0,
	forks: 2.0,
	watchers: 1.5,
} as const;

export const ACTIVITY_WEIGHTS = {
	openIssue: 0.1,
	wiki: 10,
	topic: 5,
} as const;

export const RECENCY = {
	horizonDays: 365,
	floor: 0.1,
	/** Used when `created_at` is missing or not `YYYY-MM-DDTHH:MM:SSZ`. */
	unknown: 0.5,
} as const;

export const DEFAULT_LANGUAGE_BOOST = 1.0;

export const LANGUAGE_BOOST: LanguageBoostTable = Object.freeze({
	JavaScript: 1.2,
	Python: 1.3,
	TypeScript: 1.1,
	Go: 1.0,
	Rust: 1.4,
	Swift: 0.9,
	Kotlin: 0.8,
	Java: 1.1,
	"C++": 1.0,
	"C#": 0.9,
	PHP: 0.8,
});
