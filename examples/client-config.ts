import { GitHub, TransportError } from "../src/index.js";

// Retry config applies to every request made through this client.
const gh = new GitHub({
	apiUrl: process.env.GITHUB_API_URL ?? "https://api.github.com",
	token: process.env.GITHUB_TOKEN,
	apiVersion: null,
	mutationDelayMillis: 2_000,
	retry: {
		maxRetries: 3,
		backoffFactorMillis: 500,
		backoffBase: 2,
		backoffJitterMillis: 250,
		backoffMaxMillis: 10_000,
		totalWaitMillis: 30_000,
		retryStatuses: new Set([429, 502, 503, 504]),
	},
});

const controller = new AbortController();
setTimeout(() => controller.abort(), 60_000).unref();

try {
	const rateLimit = await gh.get("/rate_limit", {
		timeoutMillis: 5_000,
		signal: controller.signal,
	});
	console.dir(rateLimit, { depth: null });
} catch (error) {
	if (error instanceof TransportError) {
		console.error(`network trouble (${error.code}): ${error.message}`);
	} else {
		throw error;
	}
} finally {
	await gh.close();
}
