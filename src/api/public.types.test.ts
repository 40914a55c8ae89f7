import { afterEach, describe, expect, it, vi } from "vitest";
import { createSearchClient } from "@features/search/service";
import { log } from "@lib/bootstrap";
import { createMockLogger } from "@src/__test__/helpers/mock-log";
import { resolveClient } from "./public.types";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("resolveClient", () => {
	it("returns an injected client untouched", () => {
		const client = createSearchClient({ initialQuota: 1 });
		expect(resolveClient({ client })).toBe(client);
	});

	it("shares one client that logs through the process logger", async () => {
		const warn = vi.spyOn(log, "warn").mockImplementation(() => undefined);
		vi.spyOn(log, "debug").mockImplementation(() => undefined);
		vi.spyOn(globalThis, "fetch").mockResolvedValue(
			new Response('{"message":"Not Found"}', { status: 404 }),
		);
		const first = createMockLogger();
		const second = createMockLogger();

		const shared = resolveClient({ logger: first.log });
		expect(resolveClient({ logger: second.log })).toBe(shared);

		expect(await shared.getRepository("octo", "gone")).toBeNull();
		expect(warn).toHaveBeenCalledWith("Could not fetch details for octo/gone: 404");
		expect(first.mocks.warn).not.toHaveBeenCalled();
		expect(second.mocks.warn).not.toHaveBeenCalled();
	});
});
