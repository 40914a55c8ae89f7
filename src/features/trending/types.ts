import type { ScoredRepository } from "@features/scoring/types";
import type { SearchClient, SearchCondition } from "@features/search/types";
import type { NoticeLogger } from "@lib/types";
import type { CATEGORIES } from "./config";

export type Category = (typeof CATEGORIES)[number];

export type CategoryInfo = {
	label: string;
	description: string;
};

export type ScanCondition =
	| SearchCondition
	| "invalid_category"
	| "invalid_lookback";

export type ScanResult = {
	category: string;
	/** Qualifier string sent to search; absent when the scan was refused. */
	query?: string;
	items: ScoredRepository[];
	condition?: ScanCondition;
	message?: string;
};

export type TrendingDeps = {
	search: Pick<SearchClient, "search">;
	now?: () => Date;
	logger?: NoticeLogger;
};

export type TrendingService = {
	scan(category: string, lookbackDays?: number): Promise<ScanResult>;
};
