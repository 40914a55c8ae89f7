// src/lib/mapper.ts
import { isObject } from "@lib/utils";
import type {
	RateLimitResponse,
	RepoLicense,
	RepositoryRecord,
	SearchResponse,
} from "@lib/types";

function str(v: unknown): string | undefined {
	return typeof v === "string" ? v : undefined;
}

function strOrNull(v: unknown): string | null | undefined {
	return v === null ? null : str(v);
}

function num(v: unknown): number | undefined {
	return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

function bool(v: unknown): boolean | undefined {
	return typeof v === "boolean" ? v : undefined;
}

/** Extract topics[] safely */
function mapTopics(v: unknown): string[] {
	return Array.isArray(v)
		? v.filter((t): t is string => typeof t === "string")
		: [];
}

function mapLicense(v: unknown): RepoLicense | null {
	if (!isObject(v)) return null;
	return {
		key: strOrNull(v.key),
		name: strOrNull(v.name),
		spdx_id: strOrNull(v.spdx_id),
	};
}

/** Keep the fields we read from one REST repository item; drop the rest. */
export function mapRepositoryRecord(
	raw: Record<string, unknown>,
): RepositoryRecord {
	return {
		id: num(raw.id),
		name: str(raw.name),
		full_name: str(raw.full_name),
		html_url: str(raw.html_url),
		description: strOrNull(raw.description),
		stargazers_count: num(raw.stargazers_count),
		forks_count: num(raw.forks_count),
		watchers_count: num(raw.watchers_count),
		open_issues_count: num(raw.open_issues_count),
		created_at: strOrNull(raw.created_at),
		updated_at: strOrNull(raw.updated_at),
		pushed_at: strOrNull(raw.pushed_at),
		language: strOrNull(raw.language),
		topics: mapTopics(raw.topics),
		has_wiki: bool(raw.has_wiki),
		license: mapLicense(raw.license),
	};
}

/** `{ items: [...] }` → records; anything malformed becomes an empty page. */
export function mapSearchResponse(body: unknown): SearchResponse {
	if (!isObject(body)) return { items: [] };
	const items = Array.isArray(body.items)
		? body.items.filter(isObject).map(mapRepositoryRecord)
		: [];
	return {
		total_count: num(body.total_count),
		incomplete_results: bool(body.incomplete_results),
		items,
	};
}

export function mapRateLimit(body: unknown): RateLimitResponse {
	if (!isObject(body) || !isObject(body.rate)) return {};
	const r = body.rate;
	return {
		rate: {
			limit: num(r.limit),
			remaining: num(r.remaining),
			reset: num(r.reset),
			used: num(r.used),
		},
	};
}
