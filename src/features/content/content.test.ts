import { describe, expect, it } from "vitest";
import type { RepositoryRecord } from "@lib/types";
import { CONTENT_IDEAS, WORKFLOW_STEPS } from "./config";
import {
	buildContentPackage,
	buildNotebookMarkdown,
	buildScriptTemplate,
	determineContentType,
	generateVideoTags,
	generateVideoTitles,
	getOptimalUploadTime,
	getTargetAudience,
	notebookFileName,
} from "./service";

const NOW = new Date("2026-03-15T00:00:00Z");

const WIDGET: RepositoryRecord = {
	name: "widget",
	full_name: "octo/widget",
	html_url: "https://github.com/octo/widget",
	description: "Fast widgets",
	language: "Rust",
	stargazers_count: 4321,
	forks_count: 210,
	open_issues_count: 7,
	created_at: "2025-01-10T12:00:00Z",
	updated_at: "2026-03-01T08:00:00Z",
	topics: ["cli", "widgets"],
	has_wiki: true,
	license: { name: "MIT License" },
};

describe("determineContentType", () => {
	it("spotlights repositories above 10000 stars", () => {
		expect(determineContentType({ stargazers_count: 10_001 }, NOW)).toBe(
			"🌟 Popular Repository Spotlight",
		);
	});

	it("flags young repositories with traction as rising", () => {
		const r = { stargazers_count: 101, created_at: "2026-03-01T00:00:00Z" };
		expect(determineContentType(r, NOW)).toBe("🚀 Rising Star Analysis");
	});

	it("does not call an undated repository rising", () => {
		expect(determineContentType({ stargazers_count: 500 }, NOW)).toBe(
			"🔍 Repository Deep Dive",
		);
	});

	it("finds hidden gems by forks", () => {
		const r = { stargazers_count: 999, forks_count: 51 };
		expect(determineContentType(r, NOW)).toBe("💎 Hidden Gem Discovery");
	});

	it("recognises AI tools by description or topic", () => {
		expect(determineContentType({ description: "An AI pair" }, NOW)).toBe(
			"🤖 AI Tool Review",
		);
		expect(determineContentType({ topics: ["machine-learning"] }, NOW)).toBe(
			"🤖 AI Tool Review",
		);
	});

	it("falls back to a deep dive", () => {
		expect(determineContentType(WIDGET, NOW)).toBe("🔍 Repository Deep Dive");
	});
});

describe("audience and upload time", () => {
	it("maps topics and language to an audience", () => {
		expect(getTargetAudience({ topics: ["AI"] })).toBe(
			"AI/ML Engineers, Data Scientists",
		);
		expect(getTargetAudience({ language: "TypeScript" })).toBe(
			"Frontend Developers, Full-stack Engineers",
		);
		expect(getTargetAudience({ language: "Python" })).toBe(
			"Python Developers, Backend Engineers",
		);
		expect(getTargetAudience({ language: "Dockerfile" })).toBe(
			"DevOps Engineers, System Administrators",
		);
		expect(getTargetAudience(WIDGET)).toBe(
			"General Developers, Programming Enthusiasts",
		);
	});

	it("suggests an upload slot from topics", () => {
		expect(getOptimalUploadTime({ topics: ["data-science"] })).toBe(
			"Tuesday 10 AM PST (high engagement from tech professionals)",
		);
		expect(getOptimalUploadTime({ topics: ["React"] })).toBe(
			"Wednesday 9 AM PST (web developers active)",
		);
		expect(getOptimalUploadTime({})).toBe(
			"Tuesday-Thursday 9-11 AM PST (general developer audience)",
		);
	});
});

describe("titles and tags", () => {
	it("builds five titles with grouped star counts", () => {
		expect(generateVideoTitles(WIDGET)).toEqual([
			"This Rust Repository Has 4,321 Stars - Here's Why",
			"widget: The Tool Every Developer Needs to Know About",
			"I Found This Amazing Rust Project With 4,321 Stars",
			"Why widget is Trending on GitHub Right Now",
			"widget Review: Worth the Hype? (4,321 Stars)",
		]);
	});

	it("adds the language and at most five topics to the base tags", () => {
		const tags = generateVideoTags({
			language: "Go",
			topics: ["a", "b", "c", "d", "e", "f"],
		});
		expect(tags).toEqual([
			"github",
			"programming",
			"coding",
			"opensource",
			"developer",
			"go",
			"a",
			"b",
			"c",
			"d",
			"e",
		]);
	});

	it("names the export after the repository", () => {
		expect(notebookFileName(WIDGET)).toBe("widget_analysis.md");
		expect(notebookFileName({ full_name: "octo/gadget" })).toBe(
			"gadget_analysis.md",
		);
	});
});

describe("buildScriptTemplate", () => {
	it("opens with the content type and hook", () => {
		const lines = buildScriptTemplate(WIDGET, "🔍 Repository Deep Dive").split(
			"\n",
		);
		expect(lines[0]).toBe("# 🔍 Repository Deep Dive: octo/widget");
		expect(lines[3]).toBe(
			'"This repository just hit 4,321 stars, and I can see why. Let me show you what makes widget special."',
		);
		expect(lines).toContain("- License: MIT License");
		expect(lines).toContain("- Recent updates: 2026-03-01");
	});
});

describe("buildNotebookMarkdown", () => {
	it("lays out notes, titles, tags and repository signals", () => {
		const pkg = buildContentPackage(WIDGET, "Great widgets.", NOW);
		const lines = pkg.markdown.split("\n");

		expect(pkg.markdown).toBe(buildNotebookMarkdown(pkg));
		expect(lines[0]).toBe("# Repository Analysis: octo/widget");
		expect(lines).toContain("- **Stars:** 4,321");
		expect(lines).toContain("- **Topics:** cli, widgets");
		expect(lines).toContain("Great widgets.");
		expect(lines).toContain("- **Content Type:** 🔍 Repository Deep Dive");
		expect(lines).toContain("- **Estimated Length:** 8-12 minutes");
		expect(lines).toContain(
			"- **Best Upload Time:** Tuesday-Thursday 9-11 AM PST (general developer audience)",
		);
		expect(lines).toContain("- Why widget is Trending on GitHub Right Now");
		expect(lines).toContain(
			"github, programming, coding, opensource, developer, rust, cli, widgets",
		);
		expect(lines).toContain("## Repository Signals");
		expect(lines).toContain("- Has wiki: yes");
		expect(lines).toContain("- Open issues: 7");
	});

	it("carries the script outline nested under its own section", () => {
		const pkg = buildContentPackage(WIDGET, "Great widgets.", NOW);
		const lines = pkg.markdown.split("\n");
		const at = lines.indexOf("## Video Script Outline");

		expect(at).toBeGreaterThan(lines.indexOf("## Repository Signals"));
		expect(lines[at + 1]).toBe("### 🔍 Repository Deep Dive: octo/widget");
		expect(lines).toContain("#### Hook (0-15 seconds)");
		expect(lines).toContain("#### Research Notes:");
		expect(lines).not.toContain("## Hook (0-15 seconds)");
		expect(lines).toContain("- **Main language:** Rust");
	});

	it("fills placeholders for sparse records", () => {
		const pkg = buildContentPackage({ full_name: "a/b" }, "n/a", NOW);
		const lines = pkg.markdown.split("\n");
		expect(lines).toContain("- **License:** Not specified");
		expect(lines).toContain("- **Topics:** None");
		expect(lines).toContain("- Has wiki: no");
	});
});

describe("static lists", () => {
	it("ships eight ideas and seven workflow steps", () => {
		expect(CONTENT_IDEAS).toHaveLength(8);
		expect(WORKFLOW_STEPS).toHaveLength(7);
		expect(Object.isFrozen(CONTENT_IDEAS)).toBe(true);
	});
});
