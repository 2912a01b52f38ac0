import { GitHub, HttpError, makeUserAgent } from "../src/index.js";

const token = process.env.GITHUB_TOKEN;
if (!token) {
	throw new Error("Set GITHUB_TOKEN to run the quick-start example.");
}

const repo = process.env.GITHUB_REPOSITORY;
if (!repo) {
	throw new Error("Set GITHUB_REPOSITORY (owner/name) so we know which repo to use.");
}

const gh = GitHub.fromEnvironment({
	token,
	userAgent: makeUserAgent("quick-start", "0.1.0"),
});

const user = await gh.get("/user");
console.log("Authenticated as:");
console.dir(user, { depth: 1 });

// Mutating requests are spaced at least a second apart by the client.
const label = gh.endpoint("repos").child(...repo.split("/"), "labels");
await label.post({ json: { name: "quick-start", color: "ededed" } }).catch(
	(error: unknown) => {
		if (!(error instanceof HttpError && error.status === 422)) {
			throw error;
		}
	},
);
await label.child("quick-start").delete();

await gh.close();
