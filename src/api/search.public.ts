import type { SearchResult, SearchSort } from "@features/search/types";
import type { PublicDeps } from "./public.types";
import { resolveClient, resolveNarrative } from "./public.types";

export interface SearchOptions extends PublicDeps {
	query: string;
	sort?: SearchSort;
	perPage?: number;
	/** Translate a free-text request into qualifiers before searching. */
	natural?: boolean;
}

export type SearchOutcome = SearchResult & {
	/** Qualifier string actually sent, after any translation. */
	query: string;
};

/** Run a repository search, optionally translating the query first. */
export async function searchRepositories(
	options: SearchOptions,
): Promise<SearchOutcome> {
	const { query, sort, perPage, natural = false } = options;
	const effective = natural
		? await resolveNarrative(options).translateQuery(query)
		: query;
	const res = await resolveClient(options).search(effective, sort, perPage);
	return { ...res, query: effective };
}
