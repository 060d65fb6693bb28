import { z } from "zod";
import { MalformedDocumentError } from "./errors";
import type { PatternField, Provider, ProviderDiagnostic, Redirection, RuleSet } from "./types";

// Longest pattern source a provider may use.
export const MAX_PATTERN_LENGTH = 2048;

const documentSchema = z.object({
	providers: z.record(z.string(), z.record(z.string(), z.unknown())),
});

const patternList = z.array(z.string()).default([]);

const providerSchema = z.object({
	urlPattern: z.string(),
	completeProvider: z.boolean().default(false),
	exceptions: patternList,
	redirections: patternList,
	rules: patternList,
	referralMarketing: patternList,
	rawRules: patternList,
});

type ProviderFields = z.infer<typeof providerSchema>;

const KNOWN_FIELDS = new Set<string>(Object.keys(providerSchema.shape));

class PatternCompileError extends Error {
	constructor(
		readonly field: PatternField,
		readonly pattern: string,
		reason: string,
	) {
		super(reason);
		this.name = "PatternCompileError";
	}
}

function compile(field: PatternField, source: string, flags: string) {
	if (source.length > MAX_PATTERN_LENGTH) {
		throw new PatternCompileError(field, source, `pattern longer than ${MAX_PATTERN_LENGTH} characters`);
	}
	try {
		// validate the source as written before wrapping it
		new RegExp(source, flags);
		return flags.includes("g") ? new RegExp(source, flags) : new RegExp(`^(?:${source})`, flags);
	} catch (error) {
		throw new PatternCompileError(field, source, error instanceof Error ? error.message : String(error));
	}
}

function countGroups(source: string) {
	const match = new RegExp(`${source}|`).exec("");
	return (match?.length ?? 1) - 1;
}

function compileRedirection(source: string): Redirection {
	return Object.freeze({ source, pattern: compile("redirections", source, "i"), groupCount: countGroups(source) });
}

function compilePrefixList(field: PatternField, sources: string[]) {
	return Object.freeze(sources.map((source) => compile(field, source, "i")));
}

function compileProvider(name: string, fields: ProviderFields): Provider {
	return Object.freeze({
		name,
		urlPattern: compile("urlPattern", fields.urlPattern, "i"),
		completeProvider: fields.completeProvider,
		exceptions: compilePrefixList("exceptions", fields.exceptions),
		redirections: Object.freeze(fields.redirections.map(compileRedirection)),
		rules: compilePrefixList("rules", fields.rules),
		referralMarketing: compilePrefixList("referralMarketing", fields.referralMarketing),
		rawRules: Object.freeze(fields.rawRules.map((source) => compile("rawRules", source, "g"))),
	});
}

function isDiagnosticField(value: unknown): value is PatternField | "completeProvider" {
	return typeof value === "string" && KNOWN_FIELDS.has(value);
}

function describeIssue(provider: string, issue: z.ZodIssue): ProviderDiagnostic {
	const [head] = issue.path;
	return {
		provider,
		field: isDiagnosticField(head) ? head : undefined,
		reason: issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
	};
}

function buildProvider(name: string, raw: Record<string, unknown>): Provider | ProviderDiagnostic {
	const parsed = providerSchema.safeParse(raw);
	if (!parsed.success) {
		return describeIssue(name, parsed.error.issues[0]);
	}

	try {
		return compileProvider(name, parsed.data);
	} catch (error) {
		if (error instanceof PatternCompileError) {
			return { provider: name, field: error.field, pattern: error.pattern, reason: error.message };
		}
		throw error;
	}
}

export type ParsedRulesDocument = z.infer<typeof documentSchema>;

export function parseRulesDocument(document: unknown): ParsedRulesDocument {
	const parsed = documentSchema.safeParse(document);
	if (!parsed.success) {
		throw new MalformedDocumentError(
			parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; "),
		);
	}
	return parsed.data;
}

/**
 * Compiles a rules document into an immutable {@link RuleSet}.
 *
 * Providers keep their document order. A provider with an invalid field or a pattern that does not
 * compile is left out and reported in `diagnostics`; only a document that is not
 * `{ providers: { [name]: object } }` fails the whole build.
 */
export function buildRuleSet(document: unknown): RuleSet {
	const { providers: entries } = parseRulesDocument(document);
	const providers: Provider[] = [];
	const diagnostics: ProviderDiagnostic[] = [];

	for (const [name, raw] of Object.entries(entries)) {
		const result = buildProvider(name, raw);
		if ("urlPattern" in result) {
			providers.push(result);
		} else {
			console.warn(`Excluding provider ${name}: ${result.reason}${result.pattern ? ` (${result.pattern})` : ""}`);
			diagnostics.push(result);
		}
	}

	return Object.freeze({ providers: Object.freeze(providers), diagnostics: Object.freeze(diagnostics) });
}
