// src/__test__/github-fakes.ts
import type { FetchLike } from "@lib/types";

export type RecordedCall = {
	url: string;
	headers: Record<string, string>;
};

/**
 * What a fake route answers with. `hang` never resolves until aborted;
 * `stall` sends the headers and a first chunk, then never ends the body.
 */
export type FakeReply =
	| { status: number; json?: unknown; text?: string }
	| { status: number; stall: string }
	| { throws: Error }
	| "hang";

type Route = FakeReply | ((url: URL) => FakeReply);

export function jsonResponse(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

function headersOf(init?: RequestInit): Record<string, string> {
	const h = init?.headers;
	if (!h || h instanceof Headers || Array.isArray(h)) return {};
	return { ...h };
}

function waitForAbort(signal?: AbortSignal | null): Promise<never> {
	return new Promise((_resolve, reject) => {
		signal?.addEventListener("abort", () => reject(new Error("aborted")));
	});
}

function stalledResponse(status: number, firstChunk: string): Response {
	const chunk = new TextEncoder().encode(firstChunk);
	return new Response(
		new ReadableStream<Uint8Array>({
			start(controller) {
				controller.enqueue(chunk);
			},
		}),
		{ status },
	);
}

/**
 * In-process stand-in for the GitHub REST API.
 * Routes are matched on URL pathname; a route given as an array answers
 * with its entries in order and repeats the last one.
 */
export function makeFakeGithub(routes: Record<string, Route | Route[]>): {
	fetch: FetchLike;
	calls: RecordedCall[];
} {
	const calls: RecordedCall[] = [];
	const cursors = new Map<string, number>();

	const fetchImpl: FetchLike = async (input, init) => {
		calls.push({ url: input, headers: headersOf(init) });
		const url = new URL(input);
		const entry = routes[url.pathname];
		if (entry === undefined) return jsonResponse(404, { message: "Not Found" });

		let route: Route | undefined;
		if (Array.isArray(entry)) {
			const i = cursors.get(url.pathname) ?? 0;
			cursors.set(url.pathname, i + 1);
			route = entry[Math.min(i, entry.length - 1)];
		} else {
			route = entry;
		}
		if (route === undefined) return jsonResponse(404, { message: "Not Found" });

		const reply = typeof route === "function" ? route(url) : route;
		if (reply === "hang") return waitForAbort(init?.signal);
		if ("throws" in reply) throw reply.throws;
		if ("stall" in reply) return stalledResponse(reply.status, reply.stall);
		if (reply.text !== undefined)
			return new Response(reply.text, { status: reply.status });
		return jsonResponse(reply.status, reply.json ?? {});
	};

	return { fetch: fetchImpl, calls };
}

export const searchPage = (items: Array<Record<string, unknown>>) => ({
	status: 200,
	json: { total_count: items.length, incomplete_results: false, items },
});
