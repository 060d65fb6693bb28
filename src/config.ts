import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_HASH_URL, DEFAULT_RULES_URL } from "./rules-cache";

// an empty string turns the optional file or check off
const optionalSetting = (fallback: string) =>
	z
		.string()
		.default(fallback)
		.transform((value) => (value === "" ? undefined : value));

const envSchema = z.object({
	HOST: z.string().min(1).default("0.0.0.0"),
	PORT: z.coerce.number().int().min(0).max(65535).default(8787),
	RULES_URL: z.string().url().default(DEFAULT_RULES_URL),
	RULES_HASH_URL: optionalSetting(DEFAULT_HASH_URL).pipe(z.string().url().optional()),
	RULES_CACHE_PATH: z.string().min(1).default(".cache/rules.json"),
	RULES_TTL_MS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60 * 1000),
	SUPPLEMENTAL_RULES_PATH: optionalSetting("rules/supplemental.json"),
});

export type Config = {
	host: string;
	port: number;
	rulesUrl: string;
	hashUrl?: string;
	cachePath: string;
	ttlMs: number;
	supplementalRulesPath?: string;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "));
	}

	const settings = parsed.data;
	return {
		host: settings.HOST,
		port: settings.PORT,
		rulesUrl: settings.RULES_URL,
		hashUrl: settings.RULES_HASH_URL,
		cachePath: settings.RULES_CACHE_PATH,
		ttlMs: settings.RULES_TTL_MS,
		supplementalRulesPath: settings.SUPPLEMENTAL_RULES_PATH,
	};
}
