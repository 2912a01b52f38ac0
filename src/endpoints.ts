import type {
	DecodedBody,
	DecodedResponseOptions,
	DispatchOptions,
	JsonValue,
	PaginateOptions,
	RawResponseOptions,
} from "./common.js";
import type { GitHub } from "./github.js";

export function hasScheme(input: string): boolean {
	return /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(input);
}

/**
 * Join a path onto a base URL with exactly one slash between them.
 * A `path` that already carries a scheme is returned verbatim.
 */
export function joinUrl(base: string, path: string): string {
	if (hasScheme(path)) {
		return path;
	}
	return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * A resolved API URL bound to a client, for building sub-resources without
 * string concatenation at every call site.
 *
 * @example
 * ```ts
 * const repo = gh.endpoint("repos").child("octo-org", "hello-world");
 * const info = await repo.get();
 * for await (const label of repo.child("labels").paginate()) {
 *   console.log(label);
 * }
 * ```
 */
export class Endpoint {
	public readonly client: GitHub;
	public readonly url: string;

	constructor(client: GitHub, url: string) {
		this.client = client;
		this.url = url;
	}

	/** The endpoint for `segments` below this one. */
	public child(...segments: Array<string | number>): Endpoint {
		const url = segments.reduce<string>(
			(acc, segment) => joinUrl(acc, String(segment)),
			this.url,
		);
		return new Endpoint(this.client, url);
	}

	public request(method: string, options: RawResponseOptions): Promise<Response>;
	public request(
		method: string,
		options?: DecodedResponseOptions,
	): Promise<DecodedBody>;
	public request(
		method: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody>;
	public request(
		method: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody> {
		return this.client.request(method, this.url, options);
	}

	public get(options: RawResponseOptions): Promise<Response>;
	public get(options?: DecodedResponseOptions): Promise<DecodedBody>;
	public get(options?: DispatchOptions): Promise<Response | DecodedBody> {
		return this.request("GET", options);
	}

	public post(options: RawResponseOptions): Promise<Response>;
	public post(options?: DecodedResponseOptions): Promise<DecodedBody>;
	public post(options?: DispatchOptions): Promise<Response | DecodedBody> {
		return this.request("POST", options);
	}

	public put(options: RawResponseOptions): Promise<Response>;
	public put(options?: DecodedResponseOptions): Promise<DecodedBody>;
	public put(options?: DispatchOptions): Promise<Response | DecodedBody> {
		return this.request("PUT", options);
	}

	public patch(options: RawResponseOptions): Promise<Response>;
	public patch(options?: DecodedResponseOptions): Promise<DecodedBody>;
	public patch(options?: DispatchOptions): Promise<Response | DecodedBody> {
		return this.request("PATCH", options);
	}

	public delete(options: RawResponseOptions): Promise<Response>;
	public delete(options?: DecodedResponseOptions): Promise<DecodedBody>;
	public delete(options?: DispatchOptions): Promise<Response | DecodedBody> {
		return this.request("DELETE", options);
	}

	public paginate(options: PaginateOptions & { raw: true }): AsyncIterable<Response>;
	public paginate(
		options?: PaginateOptions & { raw?: false },
	): AsyncIterable<JsonValue>;
	public paginate(
		options?: PaginateOptions,
	): AsyncIterable<Response | JsonValue>;
	public paginate(
		options?: PaginateOptions,
	): AsyncIterable<Response | JsonValue> {
		return this.client.paginate(this.url, options);
	}

	public toString(): string {
		return this.url;
	}
}
