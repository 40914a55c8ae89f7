import type { RepositoryRecord } from "@lib/types";
import {
	ACTIVITY_WEIGHTS,
	DEFAULT_LANGUAGE_BOOST,
	LANGUAGE_BOOST,
	POPULARITY_WEIGHTS,
	RECENCY,
} from "./config";
import type { ScoreBreakdown, ScoredRepository } from "./types";

const DAY_MS = 86_400_000;
// GitHub's REST timestamp shape; anything else counts as unparsable.
const GH_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

function count(x: number | null | undefined): number {
	return typeof x === "number" && Number.isFinite(x) ? x : 0;
}

// ----- POPULARITY -----------------------------------------------------------
export function basePopularity(r: RepositoryRecord): number {
	return (
		count(r.stargazers_count) * POPULARITY_WEIGHTS.stars +
		count(r.forks_count) * POPULARITY_WEIGHTS.forks +
		count(r.watchers_count) * POPULARITY_WEIGHTS.watchers
	);
}

// ----- RECENCY --------------------------------------------------------------
/** Whole days between `iso` and `now`, floored; null when unparsable. */
export function daysOld(
	iso: string | null | undefined,
	now: Date,
): number | null {
	if (!iso || !GH_TIMESTAMP_RE.test(iso)) return null;
	const t = Date.parse(iso);
	if (Number.isNaN(t)) return null;
	// Date.parse rolls impossible days over (Feb 30 → Mar 2); reject those.
	if (new Date(t).toISOString().slice(0, 19) !== iso.slice(0, 19)) return null;
	return Math.floor((now.getTime() - t) / DAY_MS);
}

/**
 * Linear decay over a year, floored at 0.1. There is no ceiling: a
 * future-dated `created_at` gives negative days and a multiplier above 1.
 */
export function recencyMultiplier(
	createdAt: string | null | undefined,
	now: Date,
): number {
	const days = daysOld(createdAt, now);
	if (days === null) return RECENCY.unknown;
	return Math.max(RECENCY.floor, 1.0 - days / RECENCY.horizonDays);
}

// ----- ACTIVITY -------------------------------------------------------------
export function activityScore(r: RepositoryRecord): number {
	return (
		count(r.open_issues_count) * ACTIVITY_WEIGHTS.openIssue +
		(r.has_wiki ? ACTIVITY_WEIGHTS.wiki : 0) +
		(r.topics?.length ?? 0) * ACTIVITY_WEIGHTS.topic
	);
}

export function languageBoost(language: string | null | undefined): number {
	if (!language) return DEFAULT_LANGUAGE_BOOST;
	return Object.hasOwn(LANGUAGE_BOOST, language)
		? (LANGUAGE_BOOST[language] ?? DEFAULT_LANGUAGE_BOOST)
		: DEFAULT_LANGUAGE_BOOST;
}

export function formatReasoning(b: ScoreBreakdown): string {
	return `Pop: ${b.basePopularity.toFixed(1)}, Activity: ${b.activityScore.toFixed(1)}, Recency: ${b.recencyMultiplier.toFixed(2)}, Lang: ${b.languageBoost.toFixed(1)}`;
}

export function scoreBreakdown(
	record: RepositoryRecord,
	now: Date = new Date(),
): ScoreBreakdown {
	return {
		basePopularity: basePopularity(record),
		activityScore: activityScore(record),
		recencyMultiplier: recencyMultiplier(record.created_at, now),
		languageBoost: languageBoost(record.language),
	};
}

/** Interest score for one search item; deterministic for a fixed `now`. */
export function scoreRepository(
	record: RepositoryRecord,
	now: Date = new Date(),
): ScoredRepository {
	const b = scoreBreakdown(record, now);
	const score =
		(b.basePopularity + b.activityScore) * b.recencyMultiplier * b.languageBoost;
	return { record, score, reasoning: formatReasoning(b) };
}

/** Score every record and order by score, highest first; ties keep input order. */
export function rankRepositories(
	records: readonly RepositoryRecord[],
	now: Date = new Date(),
): ScoredRepository[] {
	return records
		.map((r) => scoreRepository(r, now))
		.sort((a, b) => b.score - a.score);
}
