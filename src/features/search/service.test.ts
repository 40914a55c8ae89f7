import { describe, expect, it } from "vitest";
import { makeFakeGithub, searchPage } from "@src/__test__/github-fakes";
import { createMockLogger, firstArgs } from "@src/__test__/helpers/mock-log";
import { clampPageSize, createSearchClient } from "./service";
import type { SearchClientOptions } from "./types";

const SEARCH = "/search/repositories";
const BASE = "https://api.test";

function client(
	routes: Parameters<typeof makeFakeGithub>[0],
	over: Partial<SearchClientOptions> = {},
) {
	const gh = makeFakeGithub(routes);
	const { log, mocks } = createMockLogger();
	const c = createSearchClient({
		apiBase: BASE,
		token: "test-token",
		initialQuota: 60,
		quotaLowWater: 5,
		timeoutMs: 1000,
		fetchImpl: gh.fetch,
		logger: log,
		...over,
	});
	return { c, calls: gh.calls, mocks };
}

describe("createSearchClient.search", () => {
	it("returns items and decrements the quota on 200", async () => {
		const { c, calls } = client({
			[SEARCH]: searchPage([
				{ full_name: "octo/one", stargazers_count: 12, topics: ["cli"] },
				{ full_name: "octo/two" },
			]),
		});

		const out = await c.search("language:python stars:>100", "forks", 10);

		expect(out.condition).toBeUndefined();
		expect(out.items.map((r) => r.full_name)).toEqual(["octo/one", "octo/two"]);
		expect(out.items[0]?.stargazers_count).toBe(12);
		expect(out.items[0]?.topics).toEqual(["cli"]);
		expect(c.remaining()).toBe(59);
		expect(calls).toHaveLength(1);
		expect(calls[0]?.url).toBe(
			"https://api.test/search/repositories?q=language%3Apython+stars%3A%3E100&sort=forks&order=desc&per_page=10",
		);
	});

	it("sends the v3 accept header and a token authorization", async () => {
		const { c, calls } = client({ [SEARCH]: searchPage([]) });
		await c.search("x");
		expect(calls[0]?.headers.Accept).toBe("application/vnd.github.v3+json");
		expect(calls[0]?.headers.Authorization).toBe("token test-token");
	});

	it("omits authorization when the token is blank", async () => {
		const { c, calls } = client({ [SEARCH]: searchPage([]) }, { token: "  " });
		await c.search("x");
		expect(calls[0]?.headers.Authorization).toBeUndefined();
	});

	it("defaults to stars and 30 per page", async () => {
		const { c, calls } = client({ [SEARCH]: searchPage([]) });
		await c.search("topic:react");
		const url = new URL(calls[0]?.url ?? "");
		expect(url.searchParams.get("sort")).toBe("stars");
		expect(url.searchParams.get("per_page")).toBe("30");
	});

	it("treats a body without items as an empty page", async () => {
		const { c } = client({ [SEARCH]: { status: 200, json: { total_count: 0 } } });
		const out = await c.search("x");
		expect(out).toEqual({ items: [] });
		expect(c.remaining()).toBe(59);
	});

	it("refuses without a network call at or below the low-water mark", async () => {
		const { c, calls, mocks } = client(
			{ [SEARCH]: searchPage([]) },
			{ initialQuota: 5 },
		);
		const out = await c.search("x");
		expect(out.items).toEqual([]);
		expect(out.condition).toBe("quota_low");
		expect(calls).toHaveLength(0);
		expect(firstArgs(mocks.warn)).toEqual([
			"GitHub API rate limit low. Consider adding a GitHub token.",
		]);
	});

	it("maps 403 to quota_exceeded and stops searching afterwards", async () => {
		const { c, calls, mocks } = client({
			[SEARCH]: { status: 403, json: { message: "rate limited" } },
		});
		const first = await c.search("x");
		const second = await c.search("y");

		expect(first.condition).toBe("quota_exceeded");
		expect(second.condition).toBe("quota_exceeded");
		expect(second.items).toEqual([]);
		expect(calls).toHaveLength(1);
		expect(c.exhausted()).toBe(true);
		expect(c.remaining()).toBe(60);
		expect(firstArgs(mocks.error)[0]).toBe(
			"GitHub API rate limit exceeded. Please add a GitHub token or try again later.",
		);
	});

	it("maps 422 to invalid_query", async () => {
		const { c } = client({ [SEARCH]: { status: 422, json: {} } });
		const out = await c.search("stars:>>");
		expect(out).toEqual({
			items: [],
			condition: "invalid_query",
			message: "Invalid search query: stars:>>",
		});
		expect(c.remaining()).toBe(60);
	});

	it("maps other statuses to transient with a body excerpt", async () => {
		const { c } = client({ [SEARCH]: { status: 500, text: "boom" } });
		const out = await c.search("x");
		expect(out.condition).toBe("transient");
		expect(out.message).toBe("GitHub API error: 500 - boom");
	});

	it("maps a network failure to transient", async () => {
		const { c } = client({ [SEARCH]: { throws: new Error("ECONNRESET") } });
		const out = await c.search("x");
		expect(out.condition).toBe("transient");
		expect(out.message).toBe("Error fetching repositories: ECONNRESET");
	});

	it("maps a timeout to transient", async () => {
		const { c } = client({ [SEARCH]: "hang" }, { timeoutMs: 5 });
		const out = await c.search("x");
		expect(out.condition).toBe("transient");
		expect(out.message).toBe(
			"Request timed out after 5ms. GitHub API might be slow.",
		);
		expect(c.remaining()).toBe(60);
	});

	it("times out a body that stalls and keeps serving later searches", async () => {
		const { c, calls } = client(
			{
				[SEARCH]: [
					{ status: 200, stall: '{"items":[' },
					searchPage([{ full_name: "octo/one" }]),
				],
			},
			{ timeoutMs: 20 },
		);
		const stalled = await c.search("a");
		expect(stalled.condition).toBe("transient");
		expect(stalled.message).toBe(
			"Request timed out after 20ms. GitHub API might be slow.",
		);
		expect(stalled.items).toEqual([]);
		expect(c.remaining()).toBe(60);

		const next = await c.search("b");
		expect(next.condition).toBeUndefined();
		expect(next.items.map((r) => r.full_name)).toEqual(["octo/one"]);
		expect(c.remaining()).toBe(59);
		expect(calls).toHaveLength(2);
	});

	it("serialises concurrent searches against the quota", async () => {
		const { c, calls } = client(
			{ [SEARCH]: searchPage([{ full_name: "octo/one" }]) },
			{ initialQuota: 7 },
		);
		const results = await Promise.all([
			c.search("a"),
			c.search("b"),
			c.search("c"),
		]);
		expect(results.map((r) => r.condition)).toEqual([
			undefined,
			undefined,
			"quota_low",
		]);
		expect(calls).toHaveLength(2);
		expect(c.remaining()).toBe(5);
	});
});

describe("clampPageSize", () => {
	it("keeps page size within 1..100", () => {
		expect(clampPageSize(undefined)).toBe(30);
		expect(clampPageSize(0)).toBe(1);
		expect(clampPageSize(250)).toBe(100);
		expect(clampPageSize(12.7)).toBe(12);
		expect(clampPageSize(Number.NaN)).toBe(30);
	});
});

describe("createSearchClient.checkQuota", () => {
	it("resynchronises the counter from rate.remaining", async () => {
		const { c, calls } = client({
			"/rate_limit": {
				status: 200,
				json: { rate: { limit: 60, remaining: 42, reset: 1700000000 } },
			},
		});
		const q = await c.checkQuota();
		expect(q).toEqual({
			ok: true,
			remaining: 42,
			resetTime: "2023-11-14T22:13:20.000Z",
		});
		expect(c.remaining()).toBe(42);
		expect(calls[0]?.url).toBe("https://api.test/rate_limit");
	});

	it("clears the exceeded flag once quota is back", async () => {
		const { c } = client({
			[SEARCH]: [{ status: 403, json: {} }, searchPage([])],
			"/rate_limit": { status: 200, json: { rate: { remaining: 4000 } } },
		});
		await c.search("x");
		expect(c.exhausted()).toBe(true);

		const q = await c.checkQuota();
		expect(q).toEqual({ ok: true, remaining: 4000, resetTime: null });
		expect(c.exhausted()).toBe(false);

		const again = await c.search("x");
		expect(again.condition).toBeUndefined();
		expect(c.remaining()).toBe(3999);
	});

	it("reports failures without touching the counter", async () => {
		const { c } = client({ "/rate_limit": { status: 401, json: {} } });
		expect(await c.checkQuota()).toEqual({
			ok: false,
			message: "Rate limit check failed: 401",
		});
		expect(c.remaining()).toBe(60);
	});

	it("rejects a body without rate.remaining", async () => {
		const { c } = client({ "/rate_limit": { status: 200, json: { rate: {} } } });
		const q = await c.checkQuota();
		expect(q.ok).toBe(false);
	});
});

describe("createSearchClient.getRepository", () => {
	it("fetches one repository without spending search quota", async () => {
		const { c, calls } = client({
			"/repos/octo/widget": {
				status: 200,
				json: { full_name: "octo/widget", has_wiki: true, license: { name: "MIT License" } },
			},
		});
		const rec = await c.getRepository("octo", "widget");
		expect(rec?.full_name).toBe("octo/widget");
		expect(rec?.has_wiki).toBe(true);
		expect(rec?.license?.name).toBe("MIT License");
		expect(c.remaining()).toBe(60);
		expect(calls[0]?.url).toBe("https://api.test/repos/octo/widget");
	});

	it("returns null and warns on a non-200", async () => {
		const { c, mocks } = client({});
		expect(await c.getRepository("octo", "missing")).toBeNull();
		expect(firstArgs(mocks.warn)).toEqual([
			"Could not fetch details for octo/missing: 404",
		]);
	});

	it("returns null when the body stalls", async () => {
		const { c, mocks } = client(
			{ "/repos/octo/widget": { status: 200, stall: '{"full_name":' } },
			{ timeoutMs: 20 },
		);
		expect(await c.getRepository("octo", "widget")).toBeNull();
		expect(firstArgs(mocks.error)).toEqual([
			"Error fetching repo details: timed out",
		]);
	});
});
