// src/features/narrative/prompts.ts
import type { RepositoryRecord } from "@lib/types";
import { formatCount, isoDate } from "@lib/utils";

const ANALYSIS_SECTIONS = `## 1. Repository Overview
- What problem does this repository solve?
- Who is the target audience?
- What makes it unique or special?

## 2. Technical Analysis
- Key technologies and frameworks used
- Architecture and design patterns
- Code quality indicators
- Dependencies and ecosystem

## 3. Community & Adoption
- Developer community engagement
- Real-world usage examples
- Notable contributors or organizations
- Recent development activity

## 4. Content Opportunities
- Why is this repository trending or interesting now?
- What story angles could work for video content?
- Key talking points for developers
- Potential controversies or interesting decisions

## 5. Comparison & Context
- How does it compare to alternatives?
- Where does it fit in the ecosystem?
- Evolution and future roadmap

## 6. Practical Insights
- Getting started guide summary
- Common use cases
- Performance characteristics
- Learning curve and documentation quality`;

/** Notes request for one repository; pure templating, no model call. */
export function buildAnalysisPrompt(
	record: RepositoryRecord,
	url: string = record.html_url ?? "",
): string {
	return `Please analyze this GitHub repository and create comprehensive, structured notes suitable for podcast-style audio generation:

Repository URL: ${url || "Unknown"}
Repository Name: ${record.full_name ?? "Unknown"}
Description: ${record.description ?? "No description available"}
Language: ${record.language ?? "Unknown"}
Stars: ${formatCount(record.stargazers_count)}
Forks: ${formatCount(record.forks_count)}
Created: ${isoDate(record.created_at)}
Topics: ${(record.topics ?? []).join(", ")}

Please provide detailed analysis covering:

${ANALYSIS_SECTIONS}

Format the response as detailed, podcast-friendly notes that can be fed into an audio-overview tool. Include specific examples, statistics, and technical details that would make for engaging content.`;
}

const QUALIFIERS = [
	"language:python (programming language)",
	"stars:>100 or stars:10..50 (star count ranges)",
	"forks:>10 (fork count)",
	"created:>2024-01-01 or created:2023-01-01..2024-01-01 (creation date ranges)",
	"pushed:>2024-01-01 (recent activity)",
	"topic:machine-learning (repository topics)",
	"user:microsoft (specific users or organizations)",
	"in:name, in:description, in:readme (where to match keywords)",
	"good-first-issues:>1 (repositories with good first issues)",
	"help-wanted-issues:>1 (repositories seeking help)",
	"license:mit (specific licenses)",
	"archived:false (exclude archived repositories)",
];

const EXAMPLES: Array<[string, string]> = [
	[
		"Python machine learning repositories with more than 100 stars",
		"language:python topic:machine-learning stars:>100",
	],
	[
		"Recent JavaScript projects created this year",
		"language:javascript created:>2024-01-01",
	],
	[
		"Popular React libraries with good documentation",
		"language:javascript topic:react stars:>500 in:readme",
	],
	[
		"Beginner friendly Python projects",
		"language:python good-first-issues:>1 stars:>10",
	],
];

/** Natural language → qualifier-string instruction; pure templating. */
export function buildTranslationPrompt(freeText: string): string {
	return `Convert this natural language search query into GitHub repository search syntax:

Natural Query: "${freeText}"

GitHub search supports these qualifiers:
${QUALIFIERS.map((q) => `- ${q}`).join("\n")}

Examples:
${EXAMPLES.map(([q, a]) => `- "${q}" → "${a}"`).join("\n")}

Convert the natural query to GitHub search syntax. Return ONLY the search query, no explanations:`;
}

/** Strip quotes, backticks and surrounding whitespace a model tends to add. */
export function cleanTranslatedQuery(raw: string): string {
	return raw.replace(/["'`]/g, "").replace(/\s+/g, " ").trim();
}

export const CONNECTION_PROBE = "Hello, this is a connection test.";
