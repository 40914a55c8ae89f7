import { createTrendingService } from "@features/trending/service";
import type { ScanResult } from "@features/trending/types";
import type { PublicDeps } from "./public.types";
import { resolveClient } from "./public.types";

/** Options for `scanTrending`; `days` defaults to 7 and must lie in 1..30. */
export interface ScanOptions extends Omit<PublicDeps, "narrative" | "modelConfig"> {
	category: string;
	days?: number;
	now?: Date;
}

/** Search one trending category and return its repositories ranked by score. */
export async function scanTrending(options: ScanOptions): Promise<ScanResult> {
	const { category, days, now, logger } = options;
	const svc = createTrendingService({
		search: resolveClient(options),
		now: now ? () => now : undefined,
		logger,
	});
	return svc.scan(category, days);
}
