// src/lib/github.ts
import { DEFAULT_API_BASE, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from "./config";
import type { FetchLike } from "./types";

export type GithubRequestOpts = {
	/** Personal access token; blank or missing means anonymous. */
	token?: string;
	apiBase?: string;
	timeoutMs?: number;
	userAgent?: string;
	fetchImpl?: FetchLike;
	debug?: (msg: string) => void;
};

/** What came back from one REST call, before any status interpretation. */
export type HttpOutcome =
	| { kind: "response"; status: number; body: string }
	| { kind: "timeout"; timeoutMs: number }
	| { kind: "network"; error: Error };

export function ghHeaders(
	token?: string,
	userAgent = DEFAULT_USER_AGENT,
): Record<string, string> {
	const headers: Record<string, string> = {
		Accept: "application/vnd.github.v3+json",
		"User-Agent": userAgent,
	};
	const t = token?.trim();
	if (t) headers.Authorization = `token ${t}`;
	return headers;
}

/** Build `{base}{path}?k=v…` with form-encoded params in insertion order. */
export function ghUrl(
	path: string,
	params?: Record<string, string | number>,
	apiBase = DEFAULT_API_BASE,
): string {
	const base = `${apiBase.replace(/\/+$/, "")}${path}`;
	if (!params) return base;
	const qs = new URLSearchParams(
		Object.entries(params).map(([k, v]) => [k, String(v)]),
	).toString();
	return `${base}?${qs}`;
}

/**
 * Single GET against the REST API with a hard timeout that covers both the
 * headers and the body. Never retries and never throws: the caller decides
 * what a status or failure means.
 */
export async function githubGet(
	path: string,
	params: Record<string, string | number> | undefined,
	opts: GithubRequestOpts = {},
): Promise<HttpOutcome> {
	const doFetch: FetchLike = opts.fetchImpl ?? fetch;
	const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
	const url = ghUrl(path, params, opts.apiBase);
	const controller = new AbortController();
	let timedOut = false;
	// A body that stalls is not always cancelled by the signal, so every await races it.
	const aborted = new Promise<never>((_resolve, reject) => {
		controller.signal.addEventListener("abort", () =>
			reject(new Error("aborted")),
		);
	});
	const timer = setTimeout(() => {
		timedOut = true;
		controller.abort();
	}, timeoutMs);

	try {
		opts.debug?.(`[rest] GET ${url} timeout=${timeoutMs}ms`);
		const res = await Promise.race([
			doFetch(url, {
				method: "GET",
				signal: controller.signal,
				headers: ghHeaders(opts.token, opts.userAgent),
			}),
			aborted,
		]);
		const body = await Promise.race([res.text(), aborted]);
		opts.debug?.(`[rest] ${path} status=${res.status} bytes=${body.length}`);
		return { kind: "response", status: res.status, body };
	} catch (err) {
		if (timedOut) return { kind: "timeout", timeoutMs };
		return {
			kind: "network",
			error: err instanceof Error ? err : new Error(String(err)),
		};
	} finally {
		clearTimeout(timer);
	}
}

/** Parsed JSON body, or the parse error. */
export function parseBody(
	body: string,
): { ok: true; value: unknown } | { ok: false; error: Error } {
	try {
		const value: unknown = JSON.parse(body);
		return { ok: true, value };
	} catch (e) {
		return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
	}
}

/** Body excerpt for error notices. */
export function bodyExcerpt(body: string, max = 200): string {
	return body.slice(0, max);
}
