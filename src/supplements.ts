import { readFile } from "node:fs/promises";
import { z } from "zod";
import { parseRulesDocument } from "./ruleset";

const patternList = z.array(z.string()).optional();

const supplementSchema = z.object({
	exceptions: patternList,
	redirections: patternList,
	rules: patternList,
	referralMarketing: patternList,
	rawRules: patternList,
});

const supplementsSchema = z.record(z.string(), supplementSchema);

export type SupplementalRules = z.infer<typeof supplementsSchema>;

type SupplementField = keyof z.infer<typeof supplementSchema>;

const SUPPLEMENT_FIELDS: readonly SupplementField[] = [
	"exceptions",
	"redirections",
	"rules",
	"referralMarketing",
	"rawRules",
];

export function parseSupplementalRules(value: unknown): SupplementalRules {
	return supplementsSchema.parse(value);
}

export async function loadSupplementalRules(path: string) {
	const contents = await readFile(path, "utf8");
	return parseSupplementalRules(JSON.parse(contents));
}

/**
 * Adds locally maintained patterns to providers of a fetched document. Lists are unioned without duplicates and
 * providers the document does not define are skipped. The input is left untouched.
 */
export function mergeSupplementalRules(document: unknown, supplements: SupplementalRules) {
	const merged = structuredClone(parseRulesDocument(document));

	for (const [name, supplement] of Object.entries(supplements)) {
		const provider = merged.providers[name];
		if (!provider) continue;

		for (const field of SUPPLEMENT_FIELDS) {
			const additions = supplement[field];
			const existing = provider[field] ?? [];
			if (!additions || !Array.isArray(existing)) continue;
			provider[field] = [...new Set([...existing, ...additions])];
		}
	}

	return merged;
}
