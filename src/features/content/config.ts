import ideas from "./ideas.json";

export const CONTENT_IDEAS: readonly string[] = Object.freeze([
	...ideas.contentIdeas,
]);
export const WORKFLOW_STEPS: readonly string[] = Object.freeze([
	...ideas.workflowSteps,
]);

export const BASE_TAGS = [
	"github",
	"programming",
	"coding",
	"opensource",
	"developer",
] as const;
export const MAX_TOPIC_TAGS = 5;

export const ESTIMATED_LENGTH = "8-12 minutes";

// determineContentType thresholds
export const SPOTLIGHT_STARS = 10_000;
export const RISING_MAX_AGE_DAYS = 30;
export const RISING_MIN_STARS = 100;
export const GEM_MAX_STARS = 1_000;
export const GEM_MIN_FORKS = 50;
