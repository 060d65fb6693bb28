import { evaluate } from "./cleaner";
import type { RuleSet, Verdict } from "./types";
import { percentDecode } from "./url";

const URL_PATTERN = /https?:\/\/\S+/g;

export type ScrubbedLink = {
	original: string;
	verdict: Verdict;
};

export function extractUrls(text: string) {
	return [...new Set(text.match(URL_PATTERN) ?? [])];
}

function isSameLink(original: string, cleaned: string) {
	const lowered = original.toLowerCase();
	return lowered === cleaned.toLowerCase() || lowered === percentDecode(cleaned).toLowerCase();
}

/**
 * Cleans every link found in `text` and returns the ones worth reporting: links that were blocked, and links whose
 * cleaned form differs from what was written beyond letter case and percent-encoding.
 */
export function scrubText(text: string, ruleSet: RuleSet): ScrubbedLink[] {
	const scrubbed: ScrubbedLink[] = [];

	for (const original of extractUrls(text)) {
		const verdict = evaluate(original, ruleSet);
		if (verdict.kind !== "blocked" && isSameLink(original, verdict.url)) {
			continue;
		}
		scrubbed.push({ original, verdict });
	}

	return scrubbed;
}
