import { describe, expect, it } from "vitest";
import { HttpError, PaginationShapeError } from "../error.js";
import { GitHub } from "../github.js";
import { pageItems } from "../lib/paginate.js";
import {
	collect,
	FakeTransport,
	jsonResponse,
	ManualClock,
	textResponse,
	truncatedResponse,
} from "./helpers.js";

const API = "https://api.github.com";

function setup() {
	const clock = new ManualClock();
	const transport = new FakeTransport(clock);
	const gh = new GitHub({ transport, clock });
	return { gh, transport };
}

function page(body: unknown, next?: string): Response {
	const headers: Record<string, string> = {};
	if (next !== undefined) {
		headers.link = `<${next}>; rel="next", <${API}/repos/o/r/issues?page=3>; rel="last"`;
	}
	return jsonResponse(body, { headers });
}

describe("paginate", () => {
	it("follows next links until the last page", async () => {
		const { gh, transport } = setup();
		transport.reply(
			page([{ id: 1 }, { id: 2 }], `${API}/repos/o/r/issues?state=open&page=2`),
			page([{ id: 3 }, { id: 4 }], `${API}/repos/o/r/issues?state=open&page=3`),
			page([{ id: 5 }, { id: 6 }]),
		);

		const issues = await collect(
			gh.paginate("/repos/o/r/issues", { query: { state: "open" } }),
		);

		expect(issues).toEqual([
			{ id: 1 },
			{ id: 2 },
			{ id: 3 },
			{ id: 4 },
			{ id: 5 },
			{ id: 6 },
		]);
		expect(transport.requests.map((r) => r.url)).toEqual([
			`${API}/repos/o/r/issues`,
			`${API}/repos/o/r/issues?state=open&page=2`,
			`${API}/repos/o/r/issues?state=open&page=3`,
		]);
	});

	it("sends the query with the first request only", async () => {
		const { gh, transport } = setup();
		transport.reply(
			page([1], `${API}/items?per_page=1&page=2`),
			page([2]),
		);

		await collect(gh.paginate("/items", { query: { per_page: 1 } }));

		expect(transport.requests.map((r) => r.query)).toEqual([
			{ per_page: 1 },
			undefined,
		]);
	});

	it("re-requests a page whose body breaks off", async () => {
		const { gh, transport } = setup();
		transport.reply(
			page([1], `${API}/items?page=2`),
			truncatedResponse("[2"),
			page([2]),
		);

		expect(await collect(gh.paginate("/items"))).toEqual([1, 2]);
		expect(transport.requests.map((r) => r.url)).toEqual([
			`${API}/items`,
			`${API}/items?page=2`,
			`${API}/items?page=2`,
		]);
	});

	it("names the first page URL with its query in shape errors", async () => {
		const { gh, transport } = setup();
		transport.reply(page({ message: "Moved" }));

		await expect(
			collect(gh.paginate("/items", { query: { per_page: 50 } })),
		).rejects.toThrow(
			`Cannot paginate ${API}/items?per_page=50: expected exactly one array field, found 0`,
		);
	});

	it("unwraps the single array field of search results", async () => {
		const { gh, transport } = setup();
		transport.reply(
			page(
				{ total_count: 3, incomplete_results: false, items: ["a", "b"] },
				`${API}/search/code?q=x&page=2`,
			),
			page({ total_count: 3, incomplete_results: false, items: ["c"] }),
		);

		expect(
			await collect(gh.paginate("/search/code", { query: { q: "x" } })),
		).toEqual(["a", "b", "c"]);
	});

	it("yields whole responses in raw mode", async () => {
		const { gh, transport } = setup();
		transport.reply(
			page([1, 2], `${API}/items?page=2`),
			textResponse("not even json"),
		);

		const pages = await collect(gh.paginate("/items", { raw: true }));

		expect(pages).toHaveLength(2);
		expect(await pages[0]?.json()).toEqual([1, 2]);
		expect(await pages[1]?.text()).toBe("not even json");
	});

	it("does not fetch before iteration or past the point of stopping", async () => {
		const { gh, transport } = setup();
		transport.reply(page([1, 2], `${API}/items?page=2`), page([3]));

		const items = gh.paginate("/items");
		expect(transport.requests).toHaveLength(0);

		const seen: unknown[] = [];
		for await (const item of items) {
			seen.push(item);
			break;
		}

		expect(seen).toEqual([1]);
		expect(transport.requests).toHaveLength(1);
	});

	it("propagates an error from a later page after yielding earlier items", async () => {
		const { gh, transport } = setup();
		transport.reply(
			page([1, 2], `${API}/items?page=2`),
			jsonResponse({ message: "Not Found" }, { status: 404 }),
		);

		const seen: unknown[] = [];
		const error = await (async () => {
			for await (const item of gh.paginate("/items")) {
				seen.push(item);
			}
		})().catch((e: unknown) => e);

		expect(seen).toEqual([1, 2]);
		expect(error).toBeInstanceOf(HttpError);
		expect(error).toMatchObject({ status: 404, url: `${API}/items?page=2` });
	});

	it("rejects a page with more than one array field", async () => {
		const { gh, transport } = setup();
		transport.reply(page({ added: [1], removed: [2] }));

		const error = await collect(gh.paginate("/diff")).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(PaginationShapeError);
		expect(error instanceof Error ? error.message : "").toBe(
			`Cannot paginate ${API}/diff: expected exactly one array field, found 2 (added, removed)`,
		);
	});

	it("rejects an empty page", async () => {
		const { gh, transport } = setup();
		transport.reply(textResponse(""));

		await expect(collect(gh.paginate("/items"))).rejects.toThrow(
			`Cannot paginate ${API}/items: response body is empty`,
		);
	});
});

describe("pageItems", () => {
	it("returns an array page as is", () => {
		expect(pageItems([1, "two", null], "u")).toEqual([1, "two", null]);
	});

	it("ignores scalar fields next to the array", () => {
		expect(pageItems({ total_count: 1, items: [{ id: 9 }] }, "u")).toEqual([
			{ id: 9 },
		]);
	});

	it("rejects scalars and null", () => {
		expect(() => pageItems(42, "u")).toThrow(
			"Cannot paginate u: expected an array or an object, got number",
		);
		expect(() => pageItems(null, "u")).toThrow(
			"Cannot paginate u: expected an array or an object, got null",
		);
	});

	it("rejects an object without arrays", () => {
		expect(() => pageItems({ message: "hi" }, "u")).toThrow(
			"Cannot paginate u: expected exactly one array field, found 0",
		);
	});
});
