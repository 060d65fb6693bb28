import type { Provider, ProviderStep, RedirectDepth, RuleSet, Verdict } from "./types";
import { joinUrl, percentDecode, splitUrl } from "./url";

/**
 * Runs every provider of `ruleSet` over `inputUrl`, in order, feeding each one the URL the previous one produced.
 *
 * A complete provider blocks the URL outright. The first redirection found while `depth` still allows one
 * replaces the whole evaluation with an evaluation of the embedded target, which itself may not redirect again.
 */
export function evaluate(inputUrl: string, ruleSet: RuleSet, depth: RedirectDepth = "atMostOneRedirect"): Verdict {
	let current = inputUrl;

	for (const provider of ruleSet.providers) {
		const step = applyProvider(provider, current, depth);
		switch (step.kind) {
			case "blocked":
				return { kind: "blocked" };
			case "redirect":
				return evaluate(step.target, ruleSet, "noMoreRedirects");
			case "continue":
				current = step.url;
				break;
		}
	}

	return current === inputUrl ? { kind: "unchanged", url: current } : { kind: "cleaned", url: current };
}

export function applyProvider(provider: Provider, url: string, depth: RedirectDepth): ProviderStep {
	if (!provider.urlPattern.test(url)) {
		return { kind: "continue", url };
	}

	if (provider.completeProvider) {
		return { kind: "blocked" };
	}

	if (provider.exceptions.some((exception) => exception.test(url))) {
		return { kind: "continue", url };
	}

	let current = url;

	for (const redirection of provider.redirections) {
		const match = redirection.pattern.exec(current);
		if (!match) continue;

		if (redirection.groupCount < 1) {
			console.warn(`Redirect target match failed [${provider.name}]: ${redirection.source}`);
			continue;
		}

		const captured = match[1];
		if (!captured) continue;

		const target = percentDecode(captured);
		if (depth === "atMostOneRedirect") {
			return { kind: "redirect", target };
		}
		current = target;
	}

	current = cleanQuery(current, [...provider.rules, ...provider.referralMarketing]);

	for (const rawRule of provider.rawRules) {
		current = current.replace(rawRule, "");
	}

	return { kind: "continue", url: current };
}

function cleanQuery(url: string, rules: readonly RegExp[]) {
	const parts = splitUrl(url);
	const params = [...new URLSearchParams(parts.query)];
	// blank values and bare keys are dropped along with the matched ones
	const kept = params.filter(([key, value]) => value !== "" && !rules.some((rule) => rule.test(key)));
	return joinUrl({ ...parts, query: new URLSearchParams(kept).toString() });
}
