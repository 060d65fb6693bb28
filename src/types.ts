export type ProviderDocument = {
	urlPattern: string;
	completeProvider?: boolean;
	rules?: string[];
	rawRules?: string[];
	referralMarketing?: string[];
	exceptions?: string[];
	redirections?: string[];
};

export type RulesDocument = {
	providers: Record<string, ProviderDocument>;
};

export type PatternField = "urlPattern" | "exceptions" | "redirections" | "rules" | "referralMarketing" | "rawRules";

export type Redirection = {
	source: string;
	pattern: RegExp;
	groupCount: number;
};

export type Provider = {
	readonly name: string;
	readonly urlPattern: RegExp;
	readonly completeProvider: boolean;
	readonly exceptions: readonly RegExp[];
	readonly redirections: readonly Redirection[];
	readonly rules: readonly RegExp[];
	readonly referralMarketing: readonly RegExp[];
	readonly rawRules: readonly RegExp[];
};

export type ProviderDiagnostic = {
	provider: string;
	field?: PatternField | "completeProvider";
	pattern?: string;
	reason: string;
};

export type RuleSet = {
	readonly providers: readonly Provider[];
	readonly diagnostics: readonly ProviderDiagnostic[];
};

export type RedirectDepth = "atMostOneRedirect" | "noMoreRedirects";

export type Verdict = { kind: "cleaned"; url: string } | { kind: "unchanged"; url: string } | { kind: "blocked" };

export type ProviderStep = { kind: "continue"; url: string } | { kind: "blocked" } | { kind: "redirect"; target: string };
