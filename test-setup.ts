// test-setup.ts
// Centralised hooks to isolate tests when running the full suite together.

import { afterEach, beforeEach, vi } from "vitest";

const originalEnv = { ...process.env };
const originalCwd = process.cwd();

beforeEach(() => {
	vi.clearAllMocks();
});

afterEach(() => {
	for (const key of Object.keys(process.env)) {
		if (!(key in originalEnv)) Reflect.deleteProperty(process.env, key);
	}
	for (const [key, value] of Object.entries(originalEnv)) {
		if (value === undefined) Reflect.deleteProperty(process.env, key);
		else process.env[key] = value;
	}

	if (process.cwd() !== originalCwd) {
		process.chdir(originalCwd);
	}
});
