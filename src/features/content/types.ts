import type { RepositoryRecord } from "@lib/types";

export const CONTENT_TYPES = [
	"🌟 Popular Repository Spotlight",
	"🚀 Rising Star Analysis",
	"💎 Hidden Gem Discovery",
	"🤖 AI Tool Review",
	"🔍 Repository Deep Dive",
] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

/** Everything `analyse` produces for one repository. */
export type ContentPackage = {
	record: RepositoryRecord;
	analysis: string;
	contentType: ContentType;
	audience: string;
	uploadTime: string;
	titles: string[];
	tags: string[];
	script: string;
	markdown: string;
};
