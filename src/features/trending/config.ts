import type { Category, CategoryInfo } from "./types";

export const CATEGORIES = [
	"newly_created",
	"recently_active",
	"hot_topics",
	"ai_ml_trending",
	"web_dev_trending",
	"devops_trending",
	"mobile_trending",
	"breaking_out",
	"hidden_gems",
] as const;

export const DEFAULT_LOOKBACK_DAYS = 7;
export const MIN_LOOKBACK_DAYS = 1;
export const MAX_LOOKBACK_DAYS = 30;

/** Qualifier templates; `date` is the `YYYY-MM-DD` lookback threshold. */
export const CATEGORY_QUERIES: Readonly<Record<Category, (date: string) => string>> =
	Object.freeze({
		newly_created: (date) => `created:>${date}`,
		recently_active: (date) => `pushed:>${date} stars:>10`,
		hot_topics: (date) => `good-first-issues:>0 created:>${date}`,
		ai_ml_trending: (date) => `topic:machine-learning created:>${date}`,
		web_dev_trending: (date) => `topic:react created:>${date}`,
		devops_trending: (date) => `topic:docker created:>${date}`,
		mobile_trending: (date) => `topic:android created:>${date}`,
		breaking_out: (date) => `stars:100..1000 created:>${date}`,
		hidden_gems: (date) => `stars:10..100 forks:>5 created:>${date}`,
	});

export const CATEGORY_INFO: Readonly<Record<Category, CategoryInfo>> =
	Object.freeze({
		newly_created: {
			label: "Newly Created",
			description: "Repositories created in the lookback window",
		},
		recently_active: {
			label: "Recently Active",
			description: "Recent pushes on repos with more than 10 stars",
		},
		hot_topics: {
			label: "Hot Topics",
			description: "New repositories with good first issues",
		},
		ai_ml_trending: {
			label: "AI/ML Trending",
			description: "New machine-learning repositories",
		},
		web_dev_trending: {
			label: "Web Dev Trending",
			description: "New React and frontend repositories",
		},
		devops_trending: {
			label: "DevOps Trending",
			description: "New Docker and infrastructure repositories",
		},
		mobile_trending: {
			label: "Mobile Trending",
			description: "New Android repositories",
		},
		breaking_out: {
			label: "Breaking Out",
			description: "New repositories with 100-1000 stars",
		},
		hidden_gems: {
			label: "Hidden Gems",
			description: "New repositories with 10-100 stars and more than 5 forks",
		},
	});
