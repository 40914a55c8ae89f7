import { log as realLog } from "@lib/bootstrap";
import { loadConfig } from "@lib/config";
import {
	bodyExcerpt,
	type GithubRequestOpts,
	githubGet,
	parseBody,
} from "@lib/github";
import {
	mapRateLimit,
	mapRepositoryRecord,
	mapSearchResponse,
} from "@lib/mapper";
import type { RepositoryRecord } from "@lib/types";
import { isObject } from "@lib/utils";
import type {
	QuotaStatus,
	SearchClient,
	SearchClientOptions,
	SearchCondition,
	SearchResult,
	SearchSort,
} from "./types";

export const DEFAULT_PAGE_SIZE = 30;
export const MAX_PAGE_SIZE = 100;

export function clampPageSize(n: number | undefined): number {
	if (n == null || !Number.isFinite(n)) return DEFAULT_PAGE_SIZE;
	return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.trunc(n)));
}

/**
 * GitHub repository search with a local, best-effort quota counter.
 *
 * The counter belongs to this instance: it is decremented on every 200
 * from the search endpoint and resynchronised by `checkQuota`. Calls are
 * queued so the low-water check, the request and the decrement of one
 * search finish before the next search looks at the counter.
 */
export function createSearchClient(
	opts: SearchClientOptions = {},
): SearchClient {
	const env = loadConfig().github;
	const logger = opts.logger ?? realLog;
	const lowWater = opts.quotaLowWater ?? env.quotaLowWater;
	const req: GithubRequestOpts = {
		token: opts.token ?? env.token,
		apiBase: opts.apiBase ?? env.apiBase,
		timeoutMs: opts.timeoutMs ?? env.timeoutMs,
		userAgent: opts.userAgent ?? env.userAgent,
		fetchImpl: opts.fetchImpl,
		debug: (m) => logger.debug(m),
	};

	let quota = opts.initialQuota ?? env.initialQuota;
	let exceeded = false;
	let queue: Promise<unknown> = Promise.resolve();

	function serial<T>(task: () => Promise<T>): Promise<T> {
		const run = queue.then(task);
		queue = run.catch(() => undefined);
		return run;
	}

	function refuse(
		condition: SearchCondition,
		message: string,
		level: "warn" | "error" = "error",
	): SearchResult {
		logger[level](message);
		return { items: [], condition, message };
	}

	async function runSearch(
		query: string,
		sort: SearchSort,
		pageSize: number | undefined,
	): Promise<SearchResult> {
		if (exceeded) {
			return refuse(
				"quota_exceeded",
				"GitHub API rate limit exceeded earlier this session; run a quota check or try again later.",
			);
		}
		if (quota <= lowWater) {
			return refuse(
				"quota_low",
				"GitHub API rate limit low. Consider adding a GitHub token.",
				"warn",
			);
		}

		const out = await githubGet(
			"/search/repositories",
			{ q: query, sort, order: "desc", per_page: clampPageSize(pageSize) },
			req,
		);

		if (out.kind === "timeout") {
			return refuse(
				"transient",
				`Request timed out after ${out.timeoutMs}ms. GitHub API might be slow.`,
			);
		}
		if (out.kind === "network") {
			return refuse(
				"transient",
				`Error fetching repositories: ${out.error.message}`,
			);
		}

		switch (out.status) {
			case 200: {
				quota -= 1;
				const parsed = parseBody(out.body);
				if (!parsed.ok) {
					return refuse(
						"transient",
						`GitHub API returned an unreadable body: ${parsed.error.message}`,
					);
				}
				return { items: mapSearchResponse(parsed.value).items ?? [] };
			}
			case 403:
				exceeded = true;
				return refuse(
					"quota_exceeded",
					"GitHub API rate limit exceeded. Please add a GitHub token or try again later.",
				);
			case 422:
				return refuse("invalid_query", `Invalid search query: ${query}`);
			default:
				return refuse(
					"transient",
					`GitHub API error: ${out.status} - ${bodyExcerpt(out.body)}`,
				);
		}
	}

	async function runCheckQuota(): Promise<QuotaStatus> {
		const out = await githubGet("/rate_limit", undefined, req);
		if (out.kind === "timeout")
			return { ok: false, message: "Could not check rate limit: timed out" };
		if (out.kind === "network")
			return {
				ok: false,
				message: `Could not check rate limit: ${out.error.message}`,
			};
		if (out.status !== 200)
			return { ok: false, message: `Rate limit check failed: ${out.status}` };

		const parsed = parseBody(out.body);
		const rate = mapRateLimit(parsed.ok ? parsed.value : undefined).rate;
		if (rate?.remaining === undefined) {
			return {
				ok: false,
				message: "Rate limit check failed: response has no rate.remaining",
			};
		}
		quota = rate.remaining;
		if (quota > lowWater) exceeded = false;
		const resetTime =
			rate.reset !== undefined ? new Date(rate.reset * 1000).toISOString() : null;
		logger.debug(`[quota] remaining=${quota} reset=${resetTime ?? "-"}`);
		return { ok: true, remaining: quota, resetTime };
	}

	async function getRepository(
		owner: string,
		repo: string,
	): Promise<RepositoryRecord | null> {
		const path = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
		const out = await githubGet(path, undefined, req);
		if (out.kind !== "response") {
			logger.error(
				`Error fetching repo details: ${out.kind === "timeout" ? "timed out" : out.error.message}`,
			);
			return null;
		}
		if (out.status !== 200) {
			logger.warn(
				`Could not fetch details for ${owner}/${repo}: ${out.status}`,
			);
			return null;
		}
		const parsed = parseBody(out.body);
		if (!parsed.ok) {
			logger.error(`Error fetching repo details: ${parsed.error.message}`);
			return null;
		}
		return isObject(parsed.value) ? mapRepositoryRecord(parsed.value) : null;
	}

	return {
		search: (query, sort = "stars", pageSize) =>
			serial(() => runSearch(query, sort, pageSize)),
		checkQuota: () => serial(runCheckQuota),
		getRepository,
		remaining: () => quota,
		exhausted: () => exceeded,
	};
}
