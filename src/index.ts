export { evaluate, applyProvider } from "./cleaner";
export { buildRuleSet, parseRulesDocument, MAX_PATTERN_LENGTH } from "./ruleset";
export { extractUrls, scrubText, type ScrubbedLink } from "./extract";
export { RulesCache, DEFAULT_RULES_URL, DEFAULT_HASH_URL, type RulesCacheOptions } from "./rules-cache";
export { FileRulesStorage, MemoryRulesStorage, type CachedRules, type RulesStorage } from "./storage";
export { loadSupplementalRules, mergeSupplementalRules, parseSupplementalRules, type SupplementalRules } from "./supplements";
export { createApp, type AppOptions } from "./app";
export { loadConfig, type Config } from "./config";
export { ConfigError, HashMismatchError, MalformedDocumentError, TransportError } from "./errors";
export { joinUrl, percentDecode, splitUrl, type UrlParts } from "./url";
export type * from "./types";
