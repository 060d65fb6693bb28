import { createApp } from "./app";
import { loadConfig } from "./config";
import { RulesCache } from "./rules-cache";
import { FileRulesStorage } from "./storage";
import { loadSupplementalRules } from "./supplements";

async function main() {
	const config = loadConfig();
	const rulesCache = new RulesCache({
		storage: new FileRulesStorage(config.cachePath),
		rulesUrl: config.rulesUrl,
		hashUrl: config.hashUrl,
		ttlMs: config.ttlMs,
		supplements: config.supplementalRulesPath ? await loadSupplementalRules(config.supplementalRulesPath) : undefined,
	});

	const app = createApp({ rulesCache });
	await app.listen({ host: config.host, port: config.port });
	console.log(`Listening on http://${config.host}:${config.port}`);

	try {
		const ruleSet = await rulesCache.getRuleSet();
		console.log(`Loaded ${ruleSet.providers.length} providers (${ruleSet.diagnostics.length} excluded)`);
	} catch (error) {
		// requests retry the load, so keep serving
		console.error("Initial rules load failed:", error);
	}
}

main().catch((error: unknown) => {
	console.error("Failed to start:", error);
	process.exitCode = 1;
});
