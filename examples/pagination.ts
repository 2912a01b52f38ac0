import { GitHub } from "../src/index.js";

const repo = process.env.GITHUB_REPOSITORY ?? "nodejs/node";

const gh = GitHub.fromEnvironment();

let count = 0;
for await (const issue of gh.paginate(`/repos/${repo}/issues`, {
	query: { state: "open", per_page: 100 },
})) {
	if (count < 5 && issue !== null && typeof issue === "object" && "title" in issue) {
		console.log(`- ${String(issue.title)}`);
	}
	count++;
}
console.log(`${count} open issues and pull requests in ${repo}`);

// Raw pages expose the headers, e.g. the remaining rate limit.
for await (const page of gh.paginate("/search/repositories", {
	query: { q: "topic:typescript", per_page: 10 },
	raw: true,
})) {
	console.log("rate limit remaining:", page.headers.get("x-ratelimit-remaining"));
	break;
}

await gh.close();
