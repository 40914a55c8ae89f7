import { daysOld } from "@features/scoring/service";
import type { RepositoryRecord } from "@lib/types";
import { formatCount, isoDate } from "@lib/utils";
import {
	BASE_TAGS,
	ESTIMATED_LENGTH,
	GEM_MAX_STARS,
	GEM_MIN_FORKS,
	MAX_TOPIC_TAGS,
	RISING_MAX_AGE_DAYS,
	RISING_MIN_STARS,
	SPOTLIGHT_STARS,
} from "./config";
import type { ContentPackage, ContentType } from "./types";

function repoName(r: RepositoryRecord): string {
	return r.name ?? r.full_name?.split("/").pop() ?? "repository";
}

function lowerTopics(r: RepositoryRecord): string[] {
	return (r.topics ?? []).map((t) => t.toLowerCase());
}

// ----- CLASSIFICATION -------------------------------------------------------
export function determineContentType(
	r: RepositoryRecord,
	now: Date = new Date(),
): ContentType {
	const stars = r.stargazers_count ?? 0;
	const age = daysOld(r.created_at, now);

	if (stars > SPOTLIGHT_STARS) return "🌟 Popular Repository Spotlight";
	if (age !== null && age < RISING_MAX_AGE_DAYS && stars > RISING_MIN_STARS)
		return "🚀 Rising Star Analysis";
	if (stars < GEM_MAX_STARS && (r.forks_count ?? 0) > GEM_MIN_FORKS)
		return "💎 Hidden Gem Discovery";
	if (
		(r.description ?? "").toLowerCase().includes("ai") ||
		(r.topics ?? []).includes("machine-learning")
	)
		return "🤖 AI Tool Review";
	return "🔍 Repository Deep Dive";
}

export function getTargetAudience(r: RepositoryRecord): string {
	const language = (r.language ?? "").toLowerCase();
	const topics = lowerTopics(r);

	if (topics.includes("machine-learning") || topics.includes("ai"))
		return "AI/ML Engineers, Data Scientists";
	if (["javascript", "typescript", "react"].includes(language))
		return "Frontend Developers, Full-stack Engineers";
	if (language === "python") return "Python Developers, Backend Engineers";
	if (topics.includes("devops") || ["dockerfile", "kubernetes"].includes(language))
		return "DevOps Engineers, System Administrators";
	return "General Developers, Programming Enthusiasts";
}

export function getOptimalUploadTime(r: RepositoryRecord): string {
	const topics = lowerTopics(r);
	const hasTopic = (xs: string[]) => topics.some((t) => xs.includes(t));

	if (hasTopic(["ai", "machine-learning", "data-science"]))
		return "Tuesday 10 AM PST (high engagement from tech professionals)";
	if (hasTopic(["web", "frontend", "react", "javascript"]))
		return "Wednesday 9 AM PST (web developers active)";
	return "Tuesday-Thursday 9-11 AM PST (general developer audience)";
}

// ----- COPY -----------------------------------------------------------------
export function generateVideoTitles(r: RepositoryRecord): string[] {
	const stars = formatCount(r.stargazers_count);
	const lang = r.language ?? "GitHub";
	const name = repoName(r);
	return [
		`This ${lang} Repository Has ${stars} Stars - Here's Why`,
		`${name}: The Tool Every Developer Needs to Know About`,
		`I Found This Amazing ${lang} Project With ${stars} Stars`,
		`Why ${name} is Trending on GitHub Right Now`,
		`${name} Review: Worth the Hype? (${stars} Stars)`,
	];
}

export function generateVideoTags(r: RepositoryRecord): string[] {
	const tags: string[] = [...BASE_TAGS];
	if (r.language) tags.push(r.language.toLowerCase());
	tags.push(...(r.topics ?? []).slice(0, MAX_TOPIC_TAGS));
	return tags;
}

export function buildScriptTemplate(
	r: RepositoryRecord,
	contentType: ContentType,
): string {
	const name = repoName(r);
	const stars = formatCount(r.stargazers_count);
	return `# ${contentType}: ${r.full_name ?? name}

## Hook (0-15 seconds)
"This repository just hit ${stars} stars, and I can see why. Let me show you what makes ${name} special."

## Problem Setup (15-45 seconds)
"If you've ever worked with ${r.language ?? "this technology"}, you know that [INSERT COMMON PROBLEM]. Well, ${name} might be exactly what you've been looking for."

## Repository Overview (45-120 seconds)
- **What it does:** ${r.description ?? "Add description here"}
- **Main language:** ${r.language ?? "Unknown"}
- **Created:** ${isoDate(r.created_at)}
- **Key features:** [Research and add 3-5 key features]

## Demo/Code Examples (120-300 seconds)
"Let me show you how this works in practice..."
[INSERT CODE EXAMPLES AND DEMOS]

## Community & Adoption (300-360 seconds)
- **Community stats:** ${stars} stars, ${formatCount(r.forks_count)} forks
- **Use cases:** [Research real-world usage]
- **Companies using it:** [Research if any known companies use it]

## Comparison (360-400 seconds)
"How does this compare to alternatives like [INSERT ALTERNATIVES]?"

## Call to Action (400-420 seconds)
"What do you think about ${name}? Have you used it in your projects? Let me know in the comments below!"

---
## Research Notes:
- Repository URL: ${r.html_url ?? "Unknown"}
- Documentation: [Check README and docs]
- Recent updates: ${isoDate(r.updated_at)}
- License: ${r.license?.name ?? "Check license"}
`;
}

// ----- EXPORT ---------------------------------------------------------------
type NotebookInput = Omit<ContentPackage, "markdown">;

/** Markdown artifact meant to be fed to an audio-overview tool. */
export function buildNotebookMarkdown(pkg: NotebookInput): string {
	const r = pkg.record;
	return `# Repository Analysis: ${r.full_name ?? repoName(r)}

## Repository Information
- **URL:** ${r.html_url ?? "Unknown"}
- **Description:** ${r.description ?? "No description available"}
- **Main Language:** ${r.language ?? "Unknown"}
- **Stars:** ${formatCount(r.stargazers_count)}
- **Forks:** ${formatCount(r.forks_count)}
- **Created:** ${isoDate(r.created_at)}
- **Last Updated:** ${isoDate(r.updated_at)}
- **License:** ${r.license?.name ?? "Not specified"}
- **Topics:** ${(r.topics ?? []).join(", ") || "None"}

## AI Analysis
${pkg.analysis}

## Video Production Notes
- **Content Type:** ${pkg.contentType}
- **Target Audience:** ${pkg.audience}
- **Estimated Length:** ${ESTIMATED_LENGTH}
- **Best Upload Time:** ${pkg.uploadTime}

## Suggested Video Titles
${pkg.titles.map((t) => `- ${t}`).join("\n")}

## Video Tags
${pkg.tags.join(", ")}

## Repository Signals
- Has wiki: ${r.has_wiki ? "yes" : "no"}
- Open issues: ${formatCount(r.open_issues_count)}

## Video Script Outline
${nestHeadings(pkg.script, 2)}`;
}

/** Push every Markdown heading `levels` deeper so it nests under a section. */
function nestHeadings(md: string, levels: number): string {
	return md.replace(/^#/gm, `${"#".repeat(levels)}#`);
}

export function notebookFileName(r: RepositoryRecord): string {
	return `${repoName(r)}_analysis.md`;
}

/** Assemble the full package around an already generated analysis. */
export function buildContentPackage(
	record: RepositoryRecord,
	analysis: string,
	now: Date = new Date(),
): ContentPackage {
	const contentType = determineContentType(record, now);
	const base: NotebookInput = {
		record,
		analysis,
		contentType,
		audience: getTargetAudience(record),
		uploadTime: getOptimalUploadTime(record),
		titles: generateVideoTitles(record),
		tags: generateVideoTags(record),
		script: buildScriptTemplate(record, contentType),
	};
	return { ...base, markdown: buildNotebookMarkdown(base) };
}
