import type { DecodedBody, QueryParams, QueryValue } from "./common.js";
import { DecodeError } from "./error.js";

function isValueList(
	value: QueryValue | readonly QueryValue[],
): value is readonly QueryValue[] {
	return Array.isArray(value);
}

/**
 * Append query parameters to a URL. Existing parameters in the URL are kept;
 * array values repeat the key; `null`/`undefined` values are skipped.
 */
export function withQuery(url: string, query?: QueryParams): string {
	if (!query) return url;
	const entries = Object.entries(query);
	if (entries.length === 0) return url;

	const parsed = new URL(url);
	for (const [key, value] of entries) {
		const values = isValueList(value) ? value : [value];
		for (const v of values) {
			if (v === null || v === undefined) continue;
			parsed.searchParams.append(key, String(v));
		}
	}
	return parsed.toString();
}

const LINK_PATTERN = /<([^>]*)>([^,<]*)/g;
const REL_PATTERN = /(?:^|;)\s*rel\s*=\s*(?:"([^"]*)"|([^\s;]+))/i;

/**
 * Parse an RFC 8288 `Link` header (`<url>; rel="next", <url>; rel="last"`)
 * into a map from relation name to URL. A relation listing several names
 * (`rel="next last"`) registers the URL under each; the first URL for a name wins.
 */
export function parseLinkHeader(value: string | null): Map<string, string> {
	const links = new Map<string, string>();
	if (!value) return links;

	for (const [, url, params] of value.matchAll(LINK_PATTERN)) {
		const rel = REL_PATTERN.exec(params ?? "");
		const names = rel?.[1] ?? rel?.[2];
		if (url === undefined || names === undefined) continue;
		for (const name of names.trim().split(/\s+/)) {
			const key = name.toLowerCase();
			if (key && !links.has(key)) {
				links.set(key, url);
			}
		}
	}
	return links;
}

/**
 * Decode a JSON response body. A 204, an empty body, or one that is only
 * whitespace decodes to `undefined`.
 */
export function decodeBody(
	text: string,
	url: string,
	status: number = 200,
): DecodedBody {
	if (status === 204 || text.trim() === "") {
		return undefined;
	}
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new DecodeError({ url, body: text, cause: error });
	}
}
