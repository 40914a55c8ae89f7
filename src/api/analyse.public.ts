import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { buildContentPackage, notebookFileName } from "@features/content/service";
import type { ContentPackage } from "@features/content/types";
import { log as realLog } from "@lib/bootstrap";
import { loadConfig } from "@lib/config";
import { parseRepoSelector } from "@lib/utils";
import type { OpStatus, PublicDeps } from "./public.types";
import { errorMessage, resolveClient, resolveNarrative } from "./public.types";

/**
 * Options for `analyseRepository`.
 * - `selector` is `owner/repo` or a github.com URL.
 * - `outDir` defaults to `EXPORTS_DIR` (then `./exports`).
 * - With `dry` the package is built but nothing is written.
 */
export interface AnalyseOptions extends PublicDeps {
	selector: string;
	outDir?: string;
	dry?: boolean;
	now?: Date;
}

export interface AnalyseResult {
	status: OpStatus;
	package?: ContentPackage;
	/** Absolute path of the written Markdown export. */
	file?: string;
	error?: string;
}

/** Fetch one repository, generate its analysis and export the content package. */
export async function analyseRepository(
	options: AnalyseOptions,
): Promise<AnalyseResult> {
	const { selector, dry = false, now = new Date() } = options;
	const logger = options.logger ?? realLog;

	const parsed = parseRepoSelector(selector);
	if (!parsed) {
		return {
			status: "error",
			error: `Invalid repository selector: ${selector} (expected owner/repo)`,
		};
	}

	const record = await resolveClient(options).getRepository(
		parsed.owner,
		parsed.repo,
	);
	if (!record) {
		return {
			status: "error",
			error: `Could not fetch details for ${parsed.owner}/${parsed.repo}`,
		};
	}

	const analysis = await resolveNarrative(options).analyseRepository(record);
	const pkg = buildContentPackage(record, analysis, now);
	if (dry) return { status: "ok", package: pkg };

	const dir = resolve(options.outDir ?? loadConfig().exportsDir);
	const file = join(dir, notebookFileName(record));
	try {
		mkdirSync(dir, { recursive: true });
		writeFileSync(file, pkg.markdown, "utf8");
	} catch (e) {
		logger.error(`Could not write ${file}:`, errorMessage(e));
		return { status: "error", package: pkg, error: errorMessage(e) };
	}
	logger.debug(`[analyse] wrote ${file}`);
	return { status: "ok", package: pkg, file };
}
