import { rankRepositories } from "@features/scoring/service";
import { log as realLog } from "@lib/bootstrap";
import { daysAgoISODate } from "@lib/utils";
import {
	CATEGORIES,
	CATEGORY_QUERIES,
	DEFAULT_LOOKBACK_DAYS,
	MAX_LOOKBACK_DAYS,
	MIN_LOOKBACK_DAYS,
} from "./config";
import type {
	Category,
	ScanResult,
	TrendingDeps,
	TrendingService,
} from "./types";

export function isCategory(x: string): x is Category {
	return (CATEGORIES as readonly string[]).includes(x);
}

export function isValidLookback(days: number): boolean {
	return (
		Number.isInteger(days) &&
		days >= MIN_LOOKBACK_DAYS &&
		days <= MAX_LOOKBACK_DAYS
	);
}

/** Resolve a category to its qualifier string for a lookback ending `now`. */
export function buildCategoryQuery(
	category: Category,
	lookbackDays: number,
	now: Date = new Date(),
): string {
	return CATEGORY_QUERIES[category](daysAgoISODate(now, lookbackDays));
}

export function createTrendingService(deps: TrendingDeps): TrendingService {
	const now = deps.now ?? (() => new Date());
	const logger = deps.logger ?? realLog;

	async function scan(
		category: string,
		lookbackDays = DEFAULT_LOOKBACK_DAYS,
	): Promise<ScanResult> {
		if (!isCategory(category)) {
			const message = `Unknown category: ${category}`;
			logger.error(message);
			return { category, items: [], condition: "invalid_category", message };
		}
		if (!isValidLookback(lookbackDays)) {
			const message = `Lookback must be a whole number of days between ${MIN_LOOKBACK_DAYS} and ${MAX_LOOKBACK_DAYS}, got ${lookbackDays}`;
			logger.error(message);
			return { category, items: [], condition: "invalid_lookback", message };
		}

		const at = now();
		const query = buildCategoryQuery(category, lookbackDays, at);
		logger.debug(`[scan] ${category} days=${lookbackDays} q=${query}`);

		const res = await deps.search.search(query, "stars");
		if (res.condition) {
			return {
				category,
				query,
				items: [],
				condition: res.condition,
				message: res.message,
			};
		}
		return { category, query, items: rankRepositories(res.items, at) };
	}

	return { scan };
}
