export function isObject(x: unknown): x is Record<string, unknown> {
	return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** `12345` → `12,345` (en-US grouping, matches GitHub's UI). */
export function formatCount(n: number | null | undefined): string {
	return (n ?? 0).toLocaleString("en-US");
}

export function formatNum(n: number | null | undefined): string {
	if (n == null) return "-";
	if (n >= 1000) return `${(n / 1000).toFixed(n >= 10000 ? 0 : 1)}k`;
	return String(n);
}

/** First ten characters of an ISO timestamp, or a fallback. */
export function isoDate(iso: string | null | undefined, fallback = "Unknown"): string {
	return iso ? iso.slice(0, 10) : fallback;
}

/** UTC calendar date `days` before `now`, as `YYYY-MM-DD`. */
export function daysAgoISODate(now: Date, days: number): string {
	return new Date(now.getTime() - days * 86_400_000).toISOString().slice(0, 10);
}

/** Trim to `max` characters with a trailing ellipsis. */
export function truncate(s: string, max: number): string {
	return s.length <= max ? s : `${s.slice(0, Math.max(0, max - 1))}…`;
}

/** Split `owner/repo` (also accepts a github.com URL). */
export function parseRepoSelector(
	selector: string,
): { owner: string; repo: string } | null {
	const cleaned = selector
		.trim()
		.replace(/^https?:\/\/(www\.)?github\.com\//i, "")
		.replace(/\/+$/, "")
		.replace(/\.git$/i, "");
	const m = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/.exec(cleaned);
	if (!m?.[1] || !m[2]) return null;
	return { owner: m[1], repo: m[2] };
}

