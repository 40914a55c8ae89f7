// src/cli.ts
// Unified CLI entry with subcommands: scan, search, analyse, quota, check, categories, ideas

import { pathToFileURL } from "node:url";
import { CONTENT_IDEAS, WORKFLOW_STEPS } from "@features/content/config";
import type { NarrativeService } from "@features/narrative/types";
import { SEARCH_SORTS, type SearchClient, type SearchSort } from "@features/search/types";
import { CATEGORIES, CATEGORY_INFO } from "@features/trending/config";
import { isCategory } from "@features/trending/service";
import { log } from "@lib/bootstrap";
import { parseCommandArgs, parseIntOption } from "@lib/cli";
import { formatNum, isoDate, parseRepoSelector, truncate } from "@lib/utils";
import { analyseRepository } from "@src/api/analyse.public";
import { checkConnections } from "@src/api/connections.public";
import { resolveClient, resolveNarrative } from "@src/api/public.types";
import { scanTrending } from "@src/api/scan.public";
import { searchRepositories } from "@src/api/search.public";

type CliDeps = {
	client: () => SearchClient;
	narrative: () => NarrativeService;
};

const defaultDeps: CliDeps = {
	client: () => resolveClient({ logger: log }),
	narrative: () => resolveNarrative({ logger: log }),
};

const cliDeps: CliDeps = { ...defaultDeps };
let quotaPrimed = false;

export function _setCliDeps(overrides: Partial<CliDeps>): void {
	Object.assign(cliDeps, overrides);
}

export function _resetCliDeps(): void {
	Object.assign(cliDeps, defaultDeps);
	quotaPrimed = false;
}

const DEFAULT_SCAN_LIMIT = 10;

/* ----------------------------- Usage banner ----------------------------- */
function usage(): void {
	log.header("scout");

	log.subheader("Usage");
	log.line("  scout <command> [options]");
	log.line("");

	log.subheader("Commands");
	log.list([
		"scan <category>       Rank new repositories in a trending category",
		"search <query…>       Search repositories with GitHub qualifiers",
		"analyse <owner/repo>  Generate notes and a content package (alias: analyze)",
		"quota                 Show the remaining search quota",
		"check                 Test GitHub and model connectivity",
		"categories            List scan categories",
		"ideas                 Show content ideas and the production workflow",
	]);
	log.line("");

	log.subheader("Options for scan");
	log.list([
		"--days N              Lookback window in days, 1-30 (default 7)",
		`--limit N             Show the top N (default ${DEFAULT_SCAN_LIMIT})`,
		"--json                Print results as JSON",
	]);
	log.line("");

	log.subheader("Options for search");
	log.list([
		`--sort <s>            One of ${SEARCH_SORTS.join(", ")} (default stars)`,
		"--per-page N          Results per page, 1-100 (default 30)",
		"--natural             Convert a plain-language request with the model first",
		"--json                Print results as JSON",
	]);
	log.line("");

	log.subheader("Options for analyse");
	log.list([
		"--out <dir>           Export directory (default EXPORTS_DIR or ./exports)",
		"--dry                 Print the export instead of writing it",
	]);
	log.line("");

	log.subheader("Examples");
	log.list([
		"scout scan hidden_gems --days 14",
		'scout search "language:rust stars:>500" --sort updated',
		"scout search python projects for beginners --natural",
		"scout analyse octo/widget --dry",
	]);
	log.line("");
}

/* ------------------------------- Helpers -------------------------------- */

function argError(message: string): number {
	log.error(message);
	return 1;
}

/** Resynchronise the quota counter once per process before searching. */
async function primeQuota(client: SearchClient): Promise<void> {
	if (quotaPrimed) return;
	quotaPrimed = true;
	const q = await client.checkQuota();
	if (q.ok) log.debug(`[quota] ${q.remaining} searches remaining`);
	else log.debug(`[quota] ${q.message}`);
}

/* -------------------------- Command handlers --------------------------- */

async function handleScan(args: string[]): Promise<number> {
	const p = parseCommandArgs(args, {
		flags: ["--json"],
		options: ["--days", "--limit"],
	});
	if (p.error) return argError(p.error);

	const category = p.positionals[0];
	if (!category) {
		log.error("scan requires a category");
		log.list([...CATEGORIES]);
		return 1;
	}
	if (!isCategory(category)) {
		log.error(`Unknown category: ${category}`);
		log.list([...CATEGORIES]);
		return 1;
	}

	const rawDays = p.options.get("--days");
	const days = rawDays === undefined ? undefined : parseIntOption(rawDays);
	if (days === null) return argError(`--days must be a whole number, got ${rawDays}`);

	const rawLimit = p.options.get("--limit");
	const limit =
		rawLimit === undefined ? DEFAULT_SCAN_LIMIT : parseIntOption(rawLimit);
	if (limit === null || limit < 1)
		return argError(`--limit must be a positive whole number, got ${rawLimit}`);

	const client = cliDeps.client();
	await primeQuota(client);
	const res = await log.withSpinner(
		`Scanning ${CATEGORY_INFO[category].label}`,
		() => scanTrending({ category, days, client, logger: log }),
	);
	if (res.condition === "invalid_lookback") return 1;

	const top = res.items.slice(0, limit);
	if (p.flags.has("--json")) {
		log.json(
			top.map((s) => ({
				full_name: s.record.full_name,
				html_url: s.record.html_url,
				stars: s.record.stargazers_count,
				language: s.record.language,
				score: s.score,
				reasoning: s.reasoning,
			})),
		);
		return 0;
	}
	if (res.condition) return 0;
	if (top.length === 0) {
		log.info("No repositories found.");
		return 0;
	}

	log.header(`${CATEGORY_INFO[category].label} · last ${days ?? 7} days`);
	log.dim(`q: ${res.query ?? ""}`);
	log.columns(
		top.map((s, i) => ({
			rank: i + 1,
			repo: s.record.full_name,
			stars: formatNum(s.record.stargazers_count),
			lang: s.record.language ?? "-",
			score: s.score.toFixed(1),
			why: s.reasoning,
		})),
		["rank", "repo", "stars", "lang", "score", "why"],
		{ rank: "#", repo: "Repository", stars: "Stars", lang: "Lang", score: "Score", why: "Breakdown" },
	);
	return 0;
}

function isSort(x: string): x is SearchSort {
	return (SEARCH_SORTS as readonly string[]).includes(x);
}

async function handleSearch(args: string[]): Promise<number> {
	const p = parseCommandArgs(args, {
		flags: ["--json", "--natural"],
		options: ["--sort", "--per-page"],
	});
	if (p.error) return argError(p.error);

	const query = p.positionals.join(" ").trim();
	if (!query) return argError("search requires a query");

	const sort = p.options.get("--sort") ?? "stars";
	if (!isSort(sort))
		return argError(`--sort must be one of ${SEARCH_SORTS.join(", ")}, got ${sort}`);

	const rawPer = p.options.get("--per-page");
	const perPage = rawPer === undefined ? undefined : parseIntOption(rawPer);
	if (perPage === null) return argError(`--per-page must be a whole number, got ${rawPer}`);

	const natural = p.flags.has("--natural");
	const client = cliDeps.client();
	await primeQuota(client);
	const res = await log.withSpinner("Searching GitHub", () =>
		searchRepositories({
			query,
			sort,
			perPage,
			natural,
			client,
			narrative: natural ? cliDeps.narrative() : undefined,
			logger: log,
		}),
	);

	if (p.flags.has("--json")) {
		log.json(res.items);
		return 0;
	}
	if (natural && res.query !== query) log.info(`Converted query: ${res.query}`);
	if (res.condition) return 0;
	if (res.items.length === 0) {
		log.info("No repositories found.");
		return 0;
	}

	log.columns(
		res.items.map((r) => ({
			repo: r.full_name,
			stars: formatNum(r.stargazers_count),
			forks: formatNum(r.forks_count),
			lang: r.language ?? "-",
			updated: isoDate(r.updated_at, "-"),
			desc: truncate(r.description ?? "", 60),
		})),
		["repo", "stars", "forks", "lang", "updated", "desc"],
		{ repo: "Repository", stars: "Stars", forks: "Forks", lang: "Lang", updated: "Updated", desc: "Description" },
	);
	return 0;
}

async function handleAnalyse(args: string[]): Promise<number> {
	const p = parseCommandArgs(args, { flags: ["--dry"], options: ["--out"] });
	if (p.error) return argError(p.error);

	const selector = p.positionals[0];
	if (!selector || !parseRepoSelector(selector))
		return argError("analyse requires <owner/repo>");

	const dry = p.flags.has("--dry");
	const res = await log.withSpinner(`Analysing ${selector}`, () =>
		analyseRepository({
			selector,
			outDir: p.options.get("--out"),
			dry,
			client: cliDeps.client(),
			narrative: cliDeps.narrative(),
			logger: log,
		}),
	);

	if (res.status !== "ok" || !res.package) {
		log.error(res.error ?? "Analysis failed");
		return 0;
	}

	const pkg = res.package;
	if (dry) {
		log.line(pkg.markdown);
		log.info("Dry run: nothing written");
		return 0;
	}
	log.success(`Saved ${res.file ?? ""}`);
	log.subheader("Production notes");
	log.list([
		`Content type: ${pkg.contentType}`,
		`Audience: ${pkg.audience}`,
		`Best upload time: ${pkg.uploadTime}`,
	]);
	log.subheader("Titles");
	log.list(pkg.titles);
	return 0;
}

async function handleQuota(): Promise<number> {
	const q = await cliDeps.client().checkQuota();
	quotaPrimed = true;
	if (!q.ok) {
		log.warn(q.message);
		return 0;
	}
	log.info(`Search requests remaining: ${q.remaining}`);
	if (q.resetTime) log.dim(`Resets at ${q.resetTime}`);
	return 0;
}

async function handleCheck(): Promise<number> {
	const report = await log.withSpinner("Checking connections", () =>
		checkConnections({
			client: cliDeps.client(),
			narrative: cliDeps.narrative(),
			logger: log,
		}),
	);
	quotaPrimed = true;

	if (report.github.ok)
		log.success(`GitHub: connected (${report.github.remaining} searches remaining)`);
	else log.warn(`GitHub: ${report.github.message}`);

	if (report.narrative.ok) log.success(`Model: ${report.narrative.message}`);
	else log.warn(`Model: ${report.narrative.message}`);
	return 0;
}

function handleCategories(): number {
	log.columns(
		CATEGORIES.map((c) => ({
			name: c,
			label: CATEGORY_INFO[c].label,
			description: CATEGORY_INFO[c].description,
		})),
		["name", "label", "description"],
		{ name: "Category", label: "Label", description: "Description" },
	);
	return 0;
}

function handleIdeas(): number {
	log.header("Content ideas");
	log.list([...CONTENT_IDEAS]);
	log.line("");
	log.subheader("Production workflow");
	log.list(WORKFLOW_STEPS.map((s, i) => `${i + 1}. ${s}`));
	log.line("");
	return 0;
}

/* --------------------------------- Main CLI -------------------------------- */

async function main(argv: string[]): Promise<number> {
	const args = argv.slice(2);
	const cmd = args[0] ?? "help";
	const rest = args.slice(1);

	switch (cmd) {
		case "scan":
			return handleScan(rest);

		case "search":
			return handleSearch(rest);

		case "analyse":
		case "analyze":
			return handleAnalyse(rest);

		case "quota":
			return handleQuota();

		case "check":
			return handleCheck();

		case "categories":
			return handleCategories();

		case "ideas":
			return handleIdeas();

		case "help":
		case "--help":
		case "-h":
			usage();
			return 0;

		default:
			log.warn(`Unknown command: ${cmd}`);
			usage();
			return 0;
	}
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
	try {
		process.exitCode = await main(process.argv);
	} catch (e) {
		log.error(e instanceof Error ? e.message : String(e));
		process.exitCode = 1;
	}
}
// For tests: allow calling the router without executing as main
export { main as _testMain };
