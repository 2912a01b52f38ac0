import { inspect } from "node:util";
import { describe, expect, it } from "vitest";
import { hasScheme, joinUrl } from "../endpoints.js";
import { DecodeError } from "../error.js";
import { GitHub } from "../github.js";
import * as Redacted from "../lib/redacted.js";
import { makeUserAgent } from "../lib/runtime.js";
import { decodeBody, parseLinkHeader, withQuery } from "../utils.js";
import { FakeTransport } from "./helpers.js";

describe("joinUrl", () => {
	it("puts exactly one slash between base and path", () => {
		expect(joinUrl("https://api.github.com", "user")).toBe(
			"https://api.github.com/user",
		);
		expect(joinUrl("https://api.github.com//", "//user")).toBe(
			"https://api.github.com/user",
		);
	});

	it("returns absolute URLs verbatim", () => {
		expect(joinUrl("https://api.github.com", "http://localhost:3000/x")).toBe(
			"http://localhost:3000/x",
		);
	});

	it("recognises any scheme", () => {
		expect(hasScheme("git+ssh://host/repo")).toBe(true);
		expect(hasScheme("/repos/o/r")).toBe(false);
		expect(hasScheme("repos/http://x")).toBe(false);
	});
});

describe("Endpoint", () => {
	const gh = new GitHub({ transport: new FakeTransport() });

	it("builds child URLs from path segments", () => {
		const issue = gh.endpoint("/repos").child("octo-org", "hello", "issues", 42);
		expect(issue.url).toBe("https://api.github.com/repos/octo-org/hello/issues/42");
		expect(String(issue)).toBe(issue.url);
		expect(issue.client).toBe(gh);
	});

	it("roots an empty path at the API URL", () => {
		expect(gh.endpoint().child("user").url).toBe("https://api.github.com/user");
	});
});

describe("withQuery", () => {
	it("appends values, repeating keys for arrays and skipping nulls", () => {
		expect(
			withQuery("https://x.test/a?b=1", {
				c: [1, true],
				d: null,
				e: undefined,
				f: "x y",
			}),
		).toBe("https://x.test/a?b=1&c=1&c=true&f=x+y");
	});

	it("leaves the URL alone without parameters", () => {
		expect(withQuery("https://x.test/a")).toBe("https://x.test/a");
		expect(withQuery("https://x.test/a", {})).toBe("https://x.test/a");
	});
});

describe("parseLinkHeader", () => {
	it("maps each relation to its URL", () => {
		const links = parseLinkHeader(
			'<https://api.github.com/items?page=2>; rel="next", <https://api.github.com/items?page=5>; rel="last"',
		);
		expect(Object.fromEntries(links)).toEqual({
			next: "https://api.github.com/items?page=2",
			last: "https://api.github.com/items?page=5",
		});
	});

	it("accepts unquoted, upper-case and multi-name relations", () => {
		const links = parseLinkHeader(
			'<https://a.test/2>; REL=Next, <https://a.test/1>; rel="first prev"',
		);
		expect(Object.fromEntries(links)).toEqual({
			next: "https://a.test/2",
			first: "https://a.test/1",
			prev: "https://a.test/1",
		});
	});

	it("keeps the first URL given for a relation", () => {
		const links = parseLinkHeader(
			'<https://a.test/2>; rel="next", <https://a.test/3>; rel="next"',
		);
		expect(links.get("next")).toBe("https://a.test/2");
	});

	it("returns nothing for a missing header", () => {
		expect(parseLinkHeader(null).size).toBe(0);
		expect(parseLinkHeader("<https://a.test/2>; title=x").size).toBe(0);
	});
});

describe("decodeBody", () => {
	it("decodes JSON", () => {
		expect(decodeBody('{"a":[1,2]}', "u")).toEqual({ a: [1, 2] });
		expect(decodeBody("null", "u")).toBeNull();
	});

	it("treats 204 and blank bodies as no content", () => {
		expect(decodeBody("", "u")).toBeUndefined();
		expect(decodeBody(" \r\n", "u")).toBeUndefined();
		expect(decodeBody("ignored", "u", 204)).toBeUndefined();
	});

	it("raises DecodeError with the URL and body", () => {
		expect(() => decodeBody("{oops", "https://api.github.com/a")).toThrow(
			DecodeError,
		);
		expect(() => decodeBody("{oops", "https://api.github.com/a")).toThrow(
			"Response from https://api.github.com/a is not valid JSON",
		);
	});
});

describe("makeUserAgent", () => {
	it("names the application before the library and runtime", () => {
		expect(makeUserAgent("my-app", "2.0", "https://example.com")).toBe(
			`my-app/2.0 (https://example.com) ghdispatch/0.1.0 node/${process.versions.node}`,
		);
		expect(makeUserAgent("my-app", "2.0")).toBe(
			`my-app/2.0 ghdispatch/0.1.0 node/${process.versions.node}`,
		);
	});
});

describe("Redacted", () => {
	it("hides the secret from every printer", () => {
		const secret = Redacted.make("test-secret");
		expect(String(secret)).toBe("<redacted>");
		expect(JSON.stringify({ token: secret })).toBe('{"token":"<redacted>"}');
		expect(inspect(secret)).toBe("<redacted>");
		expect(Redacted.value(secret)).toBe("test-secret");
	});

	it("forgets the secret once wiped", () => {
		const secret = Redacted.make("test-secret");
		expect(Redacted.unsafeWipe(secret)).toBe(true);
		expect(() => Redacted.value(secret)).toThrow("Unable to get redacted value");
	});
});
