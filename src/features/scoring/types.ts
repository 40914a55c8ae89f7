import type { RepositoryRecord } from "@lib/types";

/** Intermediate terms behind a score; `reasoning` is rendered from these. */
export type ScoreBreakdown = {
	basePopularity: number;
	activityScore: number;
	recencyMultiplier: number;
	languageBoost: number;
};

export type ScoredRepository = {
	record: RepositoryRecord;
	score: number;
	reasoning: string;
};

/** Language → multiplier; languages not listed score 1.0. */
export type LanguageBoostTable = Readonly<Record<string, number>>;
