import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { evaluate } from "./cleaner";
import { scrubText } from "./extract";
import type { RulesCache } from "./rules-cache";

const CACHE_MAX_AGE_S = 3600;
const MAX_CACHED_RESPONSES = 10_000;

type CachedResponse = {
	status: number;
	body: string;
	expiresAt: number;
};

export type AppOptions = {
	rulesCache: RulesCache;
	now?: () => number;
	/** Oldest entries are evicted once this many responses are cached. */
	maxCachedResponses?: number;
};

const scrubBodySchema = z.union([z.string(), z.object({ text: z.string() })]);

export function createApp({
	rulesCache,
	now = Date.now,
	maxCachedResponses = MAX_CACHED_RESPONSES,
}: AppOptions): FastifyInstance {
	const app = Fastify({ logger: false });
	const responses = new Map<string, CachedResponse>();

	// entries only hold for the ruleset that produced them
	rulesCache.onPublish(() => responses.clear());

	const lookup = (target: string) => {
		const cached = responses.get(target);
		if (cached && now() >= cached.expiresAt) {
			responses.delete(target);
			return undefined;
		}
		return cached;
	};

	const remember = (target: string, response: CachedResponse) => {
		// Map iterates in insertion order, so the first key is the oldest
		for (const oldest of responses.keys()) {
			if (responses.size < maxCachedResponses) break;
			responses.delete(oldest);
		}
		responses.set(target, response);
	};

	app.get<{ Querystring: { url?: unknown } }>("/", async (request, reply) => {
		const targetUrl = request.query.url;
		if (typeof targetUrl !== "string" || !targetUrl) {
			return reply.code(400).type("text/plain").send("Missing url parameter");
		}

		let response = lookup(targetUrl);
		if (!response) {
			try {
				const verdict = evaluate(targetUrl, await rulesCache.getRuleSet());
				response =
					verdict.kind === "blocked"
						? { status: 403, body: "URL blocked by ruleset", expiresAt: now() + CACHE_MAX_AGE_S * 1000 }
						: { status: 200, body: verdict.url, expiresAt: now() + CACHE_MAX_AGE_S * 1000 };
				remember(targetUrl, response);
			} catch (error) {
				return reply
					.code(500)
					.type("text/plain")
					.send(`Error processing URL: ${error instanceof Error ? error.message : "Unknown error"}`);
			}
		}

		return reply
			.code(response.status)
			.headers({
				"Content-Type": "text/plain",
				"Access-Control-Allow-Origin": "*",
				"Cache-Control": `public, max-age=${CACHE_MAX_AGE_S}`,
			})
			.send(response.body);
	});

	app.delete<{ Querystring: { url?: unknown } }>("/", async (request, reply) => {
		const targetUrl = request.query.url;
		if (typeof targetUrl !== "string" || !targetUrl) {
			return reply.code(400).type("text/plain").send("Missing url parameter");
		}

		if (!lookup(targetUrl)) {
			return reply.code(404).type("text/plain").send("Cache entry not found");
		}
		responses.delete(targetUrl);
		return reply.code(200).type("text/plain").send("Cache entry deleted");
	});

	app.route({
		method: ["POST", "PUT", "PATCH", "OPTIONS"],
		url: "/",
		handler: async (_request, reply) => {
			return reply.code(405).header("Allow", "GET, DELETE").type("text/plain").send("Method not allowed");
		},
	});

	app.post("/scrub", async (request, reply) => {
		const parsed = scrubBodySchema.safeParse(request.body);
		if (!parsed.success) {
			return reply.code(400).send({ error: "Expected a text body or { text }" });
		}

		const text = typeof parsed.data === "string" ? parsed.data : parsed.data.text;
		const links = scrubText(text, await rulesCache.getRuleSet()).map(({ original, verdict }) =>
			verdict.kind === "blocked" ? { original, kind: verdict.kind } : { original, kind: verdict.kind, url: verdict.url },
		);
		return { links };
	});

	app.get("/health", async () => {
		const ruleSet = rulesCache.published;
		return {
			status: "ok",
			providers: ruleSet?.providers.length ?? 0,
			diagnostics: ruleSet?.diagnostics ?? [],
		};
	});

	return app;
}
