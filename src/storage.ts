import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

export type CachedRules = {
	data: unknown;
	hash: string;
	cachedAt: number;
	expiresAt: number;
	/** Where the document was fetched from; later refreshes reuse it. */
	source?: string;
};

export interface RulesStorage {
	get(): Promise<CachedRules | undefined>;
	put(rules: CachedRules): Promise<void>;
}

function isCachedRules(value: unknown): value is CachedRules {
	if (typeof value !== "object" || value === null) return false;
	return (
		"data" in value &&
		"hash" in value &&
		typeof value.hash === "string" &&
		"cachedAt" in value &&
		typeof value.cachedAt === "number" &&
		"expiresAt" in value &&
		typeof value.expiresAt === "number" &&
		(!("source" in value) || typeof value.source === "string")
	);
}

function isMissingFile(error: unknown) {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileRulesStorage implements RulesStorage {
	constructor(private readonly path: string) {}

	async get() {
		let contents: string;
		try {
			contents = await readFile(this.path, "utf8");
		} catch (error) {
			if (isMissingFile(error)) return undefined;
			throw error;
		}

		const parsed: unknown = JSON.parse(contents);
		if (!isCachedRules(parsed)) {
			console.warn(`Ignoring unrecognised rules cache at ${this.path}`);
			return undefined;
		}
		return parsed;
	}

	async put(rules: CachedRules) {
		await mkdir(dirname(this.path), { recursive: true });
		// staged beside the target, then renamed over it
		const staging = `${this.path}.tmp`;
		await writeFile(staging, JSON.stringify(rules), "utf8");
		await rename(staging, this.path);
	}
}

export class MemoryRulesStorage implements RulesStorage {
	private rules?: CachedRules;

	constructor(initial?: CachedRules) {
		this.rules = initial;
	}

	async get() {
		return this.rules ? structuredClone(this.rules) : undefined;
	}

	async put(rules: CachedRules) {
		this.rules = structuredClone(rules);
	}
}
