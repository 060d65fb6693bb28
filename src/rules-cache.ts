import { createHash } from "node:crypto";
import { HashMismatchError, MalformedDocumentError, TransportError } from "./errors";
import { buildRuleSet } from "./ruleset";
import type { CachedRules, RulesStorage } from "./storage";
import { mergeSupplementalRules, type SupplementalRules } from "./supplements";
import type { RuleSet } from "./types";

export const DEFAULT_RULES_URL = "https://rules2.clearurls.xyz/data.minify.json";
export const DEFAULT_HASH_URL = "https://rules2.clearurls.xyz/rules.minify.hash";
const CACHE_DURATION_MS = 7 * 24 * 60 * 60 * 1000; // 7 days
const RETRY_AFTER_MS = 5 * 60 * 1000;

export type RulesCacheOptions = {
	storage: RulesStorage;
	rulesUrl?: string;
	/** Published SHA-256 of the document; verification is skipped without one. */
	hashUrl?: string;
	ttlMs?: number;
	/** How long a stale ruleset is served after a failed refresh before the next attempt. */
	retryAfterMs?: number;
	supplements?: SupplementalRules;
	fetch?: (url: string) => Promise<Response>;
	now?: () => number;
};

type PublishListener = (ruleSet: RuleSet) => void;

export class RulesCache {
	private readonly storage: RulesStorage;
	private readonly rulesUrl: string;
	private readonly hashUrl?: string;
	private readonly ttlMs: number;
	private readonly retryAfterMs: number;
	private readonly supplements: SupplementalRules;
	private readonly fetchImpl: (url: string) => Promise<Response>;
	private readonly now: () => number;
	private readonly listeners = new Set<PublishListener>();

	private source?: string;
	private current?: RuleSet;
	private currentExpiresAt = 0;
	private pending?: Promise<RuleSet>;

	constructor(options: RulesCacheOptions) {
		this.storage = options.storage;
		this.rulesUrl = options.rulesUrl ?? DEFAULT_RULES_URL;
		this.hashUrl = options.hashUrl;
		this.ttlMs = options.ttlMs ?? CACHE_DURATION_MS;
		this.retryAfterMs = options.retryAfterMs ?? RETRY_AFTER_MS;
		this.supplements = options.supplements ?? {};
		this.fetchImpl = options.fetch ?? ((url) => fetch(url));
		this.now = options.now ?? Date.now;
	}

	get published() {
		return this.current;
	}

	onPublish(listener: PublishListener) {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	async getRuleSet() {
		if (this.current && this.now() < this.currentExpiresAt) {
			return this.current;
		}

		this.pending ??= this.load().finally(() => {
			this.pending = undefined;
		});
		return this.pending;
	}

	/**
	 * Fetches the document, checks it against the published hash, builds it and publishes the result. The
	 * previously published ruleset stays in place when any of these steps fails.
	 *
	 * Without `rulesUrl` the last source that refreshed successfully is used, falling back to the configured one.
	 * A successful refresh from another source makes it the source of later refreshes.
	 */
	async refresh(
		rulesUrl = this.source ?? this.rulesUrl,
		hashUrl = rulesUrl === this.rulesUrl ? this.hashUrl : undefined,
	) {
		const [rulesText, expectedHash] = await Promise.all([
			this.fetchText(rulesUrl),
			hashUrl ? this.fetchText(hashUrl) : undefined,
		]);

		const actualHash = createHash("sha256").update(rulesText).digest("hex");
		if (expectedHash !== undefined && actualHash !== expectedHash.trim()) {
			throw new HashMismatchError(expectedHash.trim(), actualHash);
		}

		const document = this.parseDocument(rulesText);
		const ruleSet = this.build(document);

		const now = this.now();
		const cachedRules: CachedRules = {
			data: document,
			hash: actualHash,
			cachedAt: now,
			expiresAt: now + this.ttlMs,
			source: rulesUrl,
		};

		await this.storage.put(cachedRules);
		this.source = rulesUrl;
		console.log(`Cached rules with hash: ${actualHash}`);

		return this.publish(ruleSet, cachedRules.expiresAt);
	}

	private async load() {
		try {
			const cached = await this.storage.get();
			this.source ??= cached?.source;
			if (cached && this.now() < cached.expiresAt) {
				return this.publish(this.build(cached.data), cached.expiresAt);
			}

			console.log("Fetching fresh rules");
			return await this.refresh();
		} catch (error) {
			console.error("Error getting rules:", error);
			return this.fallback(error);
		}
	}

	private async fallback(cause: unknown) {
		const retryAt = this.now() + this.retryAfterMs;
		if (this.current) {
			console.log("Keeping previously published rules");
			return this.publish(this.current, retryAt);
		}

		const cached = await this.storage.get();
		if (cached) {
			console.log("Falling back to expired cached rules");
			return this.publish(this.build(cached.data), retryAt);
		}

		throw new Error("Failed to get rules and no cached fallback available", { cause });
	}

	private build(document: unknown) {
		return buildRuleSet(mergeSupplementalRules(document, this.supplements));
	}

	private publish(ruleSet: RuleSet, expiresAt: number) {
		const changed = ruleSet !== this.current;
		this.current = ruleSet;
		this.currentExpiresAt = expiresAt;
		if (changed) {
			for (const listener of this.listeners) listener(ruleSet);
		}
		return ruleSet;
	}

	private parseDocument(text: string): unknown {
		try {
			return JSON.parse(text);
		} catch (error) {
			throw new MalformedDocumentError(error instanceof Error ? error.message : String(error));
		}
	}

	private async fetchText(url: string) {
		let response: Response;
		try {
			response = await this.fetchImpl(url);
		} catch (error) {
			throw new TransportError(`Failed to fetch ${url}`, { cause: error });
		}

		if (!response.ok) {
			throw new TransportError(`Failed to fetch ${url}: ${response.status}`, { status: response.status });
		}
		return response.text();
	}
}
