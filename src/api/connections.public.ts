import type { ConnectionStatus } from "@features/narrative/types";
import type { QuotaStatus } from "@features/search/types";
import type { PublicDeps } from "./public.types";
import { resolveClient, resolveNarrative } from "./public.types";

export interface ConnectionReport {
	github: QuotaStatus;
	narrative: ConnectionStatus & { configured: boolean };
}

/** Probe GitHub's rate-limit endpoint and the text-generation model. */
export async function checkConnections(
	options: PublicDeps = {},
): Promise<ConnectionReport> {
	const narrative = resolveNarrative(options);
	const [github, probe] = await Promise.all([
		resolveClient(options).checkQuota(),
		narrative.testConnection(),
	]);
	return {
		github,
		narrative: { ...probe, configured: narrative.configured },
	};
}
