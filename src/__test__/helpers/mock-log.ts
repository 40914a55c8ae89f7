import { type Mock, vi } from "vitest";
import type { Logger } from "@lib/logger";

type LogMocks = {
	[K in keyof Logger]: Mock;
};

/** A full `Logger` whose every method is a `vi.fn()`; `withSpinner` just runs the task. */
export function createMockLogger(): { log: Logger; mocks: LogMocks } {
	const mocks: LogMocks = {
		info: vi.fn(),
		success: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
		json: vi.fn(),
		header: vi.fn(),
		subheader: vi.fn(),
		list: vi.fn(),
		line: vi.fn(() => true),
		dim: vi.fn(() => true),
		columns: vi.fn(),
		withSpinner: vi.fn(
			async (_text: string, run: (s: unknown) => unknown) => await run({}),
		),
	};

	const log: Logger = {
		info: mocks.info,
		success: mocks.success,
		warn: mocks.warn,
		error: mocks.error,
		debug: mocks.debug,
		json: mocks.json,
		header: mocks.header,
		subheader: mocks.subheader,
		list: mocks.list,
		line: mocks.line,
		dim: mocks.dim,
		columns: mocks.columns,
		withSpinner: mocks.withSpinner,
	};

	return { log, mocks };
}

/** Text of every call to one mocked method, first argument only. */
export function firstArgs(fn: Mock): string[] {
	return fn.mock.calls.map((c) => String(c[0]));
}
