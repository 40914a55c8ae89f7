import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config";

describe("loadConfig", () => {
	it("falls back to defaults on an empty environment", () => {
		expect(loadConfig({})).toEqual({
			github: {
				token: undefined,
				apiBase: "https://api.github.com",
				timeoutMs: 10000,
				userAgent: "repo-scout/0.1",
				initialQuota: 60,
				quotaLowWater: 5,
			},
			exportsDir: "./exports",
			debug: false,
		});
	});

	it("reads and trims overrides", () => {
		const cfg = loadConfig({
			GITHUB_TOKEN: " test-token ",
			GITHUB_API_BASE: "https://ghe.test/api/v3/",
			GITHUB_TIMEOUT_MS: "2500",
			SCOUT_INITIAL_QUOTA: "5000",
			SCOUT_QUOTA_LOW_WATER: "20",
			EXPORTS_DIR: "/tmp/out",
			DEBUG: "1",
		});
		expect(cfg.github.token).toBe("test-token");
		expect(cfg.github.apiBase).toBe("https://ghe.test/api/v3");
		expect(cfg.github.timeoutMs).toBe(2500);
		expect(cfg.github.initialQuota).toBe(5000);
		expect(cfg.github.quotaLowWater).toBe(20);
		expect(cfg.exportsDir).toBe("/tmp/out");
		expect(cfg.debug).toBe(true);
	});

	it("ignores non-integer numbers and blank strings", () => {
		const cfg = loadConfig({ GITHUB_TIMEOUT_MS: "fast", GITHUB_TOKEN: "  " });
		expect(cfg.github.timeoutMs).toBe(10000);
		expect(cfg.github.token).toBeUndefined();
	});
});

describe("ConfigError", () => {
	it("is an Error with its own name", () => {
		const e = new ConfigError("missing");
		expect(e).toBeInstanceOf(Error);
		expect(e.name).toBe("ConfigError");
		expect(e.message).toBe("missing");
	});
});
