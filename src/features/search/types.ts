import type { NoticeLogger, FetchLike, RepositoryRecord } from "@lib/types";

export const SEARCH_SORTS = ["stars", "forks", "updated", "created"] as const;
export type SearchSort = (typeof SEARCH_SORTS)[number];

/**
 * Why a call came back empty.
 * - `quota_low`: local counter at or below the low-water mark; nothing sent.
 * - `quota_exceeded`: HTTP 403, or refused locally after one this session.
 * - `invalid_query`: HTTP 422, the qualifier string is malformed.
 * - `transient`: timeout, network failure or an unexpected status.
 */
export type SearchCondition =
	| "quota_low"
	| "quota_exceeded"
	| "invalid_query"
	| "transient";

export type SearchResult = {
	items: RepositoryRecord[];
	condition?: SearchCondition;
	message?: string;
};

export type QuotaStatus =
	| { ok: true; remaining: number; resetTime: string | null }
	| { ok: false; message: string };

export type SearchClientOptions = {
	token?: string;
	apiBase?: string;
	timeoutMs?: number;
	userAgent?: string;
	initialQuota?: number;
	quotaLowWater?: number;
	fetchImpl?: FetchLike;
	logger?: NoticeLogger;
};

export type SearchClient = {
	search(
		query: string,
		sort?: SearchSort,
		pageSize?: number,
	): Promise<SearchResult>;
	checkQuota(): Promise<QuotaStatus>;
	getRepository(owner: string, repo: string): Promise<RepositoryRecord | null>;
	/** Current value of the local quota counter. */
	remaining(): number;
	/** True once a 403 has been seen and not cleared by `checkQuota`. */
	exhausted(): boolean;
};
