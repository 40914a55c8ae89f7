// src/lib/types.ts
import type { Logger } from "@lib/logger";

// ──────────────────────────── GitHub REST shapes ───────────────────────────

/** SPDX-ish license block as the search API returns it. */
export type RepoLicense = {
	key?: string | null;
	name?: string | null;
	spdx_id?: string | null;
};

/**
 * Repository item from `GET /search/repositories` (or `GET /repos/{o}/{r}`).
 * Only the fields this project reads are typed; everything is optional on
 * the wire and never mutated after parsing.
 */
export type RepositoryRecord = {
	readonly id?: number;
	readonly name?: string;
	readonly full_name?: string;
	readonly html_url?: string;
	readonly description?: string | null;
	readonly stargazers_count?: number | null;
	readonly forks_count?: number | null;
	readonly watchers_count?: number | null;
	readonly open_issues_count?: number | null;
	readonly created_at?: string | null;
	readonly updated_at?: string | null;
	readonly pushed_at?: string | null;
	readonly language?: string | null;
	readonly topics?: readonly string[] | null;
	readonly has_wiki?: boolean | null;
	readonly license?: RepoLicense | null;
};

export type SearchResponse = {
	total_count?: number;
	incomplete_results?: boolean;
	items?: RepositoryRecord[];
};

export type RateLimitResponse = {
	rate?: { limit?: number; remaining?: number; reset?: number; used?: number };
};

// ──────────────────────────── transport + logging ──────────────────────────

export type FetchLike = (
	input: string,
	init?: RequestInit,
) => Promise<Response>;

/** The slice of the logger that services report conditions through. */
export type NoticeLogger = Pick<Logger, "info" | "warn" | "error" | "debug">;
