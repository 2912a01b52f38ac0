import createDebug from "debug";
import type { DecodedBody, JsonValue, PaginateOptions } from "../common.js";
import { PaginationShapeError } from "../error.js";
import { decodeBody, parseLinkHeader } from "../utils.js";
import type { RequestDispatcher } from "./dispatch.js";

const debug = createDebug("ghdispatch:paginate");

/**
 * Items of one decoded page: the page itself when it is an array, or the
 * only array-valued field of an object page (as with `/search/*`, where
 * `total_count` and `incomplete_results` sit next to `items`).
 */
export function pageItems(body: DecodedBody, url: string): JsonValue[] {
	if (Array.isArray(body)) {
		return body;
	}
	if (body === undefined) {
		throw new PaginationShapeError(url, "response body is empty");
	}
	if (body === null || typeof body !== "object") {
		throw new PaginationShapeError(
			url,
			`expected an array or an object, got ${body === null ? "null" : typeof body}`,
		);
	}

	const lists: JsonValue[][] = [];
	const names: string[] = [];
	for (const [name, value] of Object.entries(body)) {
		if (Array.isArray(value)) {
			lists.push(value);
			names.push(name);
		}
	}
	const [items] = lists;
	if (lists.length !== 1 || items === undefined) {
		throw new PaginationShapeError(
			url,
			`expected exactly one array field, found ${lists.length}${names.length ? ` (${names.join(", ")})` : ""}`,
		);
	}
	return items;
}

function nextLink(response: Response): string | undefined {
	return parseLinkHeader(response.headers.get("link")).get("next");
}

/**
 * Creates a lazy, single-pass async iterable over every item of a paginated
 * GitHub listing, following `Link: <...>; rel="next"` headers.
 *
 * `query` only applies to the first request: the next-page URLs GitHub hands
 * back already carry every parameter and are requested verbatim.
 *
 * @example
 * ```ts
 * for await (const issue of paginate(dispatcher, "/repos/o/r/issues", {
 *   query: { state: "open", per_page: 100 },
 * })) {
 *   console.log(issue);
 * }
 * ```
 */
export function paginate(
	dispatcher: RequestDispatcher,
	url: string,
	options: PaginateOptions & { raw: true },
): AsyncIterable<Response>;
export function paginate(
	dispatcher: RequestDispatcher,
	url: string,
	options?: PaginateOptions & { raw?: false },
): AsyncIterable<JsonValue>;
export function paginate(
	dispatcher: RequestDispatcher,
	url: string,
	options?: PaginateOptions,
): AsyncIterable<Response | JsonValue>;
export function paginate(
	dispatcher: RequestDispatcher,
	url: string,
	options: PaginateOptions = {},
): AsyncIterable<Response | JsonValue> {
	const { raw, query, ...rest } = options;

	async function* pages(): AsyncGenerator<Response | JsonValue> {
		let next: string | undefined = url;
		let pageQuery = query;
		let page = 0;

		while (next !== undefined) {
			page++;
			debug("fetching page %d: %s", page, next);
			const pageOptions = { ...rest, query: pageQuery };
			let following: string | undefined;

			if (raw) {
				const response: Response = await dispatcher.dispatch("GET", next, {
					...pageOptions,
					raw: true,
				});
				following = nextLink(response);
				yield response;
			} else {
				const fetched: { response: Response; text: string; url: string } =
					await dispatcher.fetchText("GET", next, pageOptions);
				following = nextLink(fetched.response);
				const body = decodeBody(
					fetched.text,
					fetched.url,
					fetched.response.status,
				);
				yield* pageItems(body, fetched.url);
			}

			next = following;
			pageQuery = undefined;
		}
		debug("pagination finished after %d pages", page);
	}

	return pages();
}
