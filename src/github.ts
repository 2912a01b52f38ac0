import createDebug from "debug";
import {
	DEFAULT_ACCEPT,
	DEFAULT_API_URL,
	DEFAULT_API_VERSION,
	DEFAULT_MUTATION_DELAY_MILLIS,
	type DecodedBody,
	type DecodedResponseOptions,
	type DispatchOptions,
	GitHubEnvironment,
	type GitHubClientOptions,
	type JsonValue,
	type PaginateOptions,
	type RawResponseOptions,
} from "./common.js";
import { Endpoint, joinUrl } from "./endpoints.js";
import { RequestDispatcher } from "./lib/dispatch.js";
import { paginate } from "./lib/paginate.js";
import * as Redacted from "./lib/redacted.js";
import { resolveRetryConfig } from "./lib/retry.js";
import { DEFAULT_USER_AGENT } from "./lib/runtime.js";
import { FetchTransport } from "./lib/transport.js";

const debug = createDebug("ghdispatch:client");

/**
 * Top-level GitHub REST API client.
 *
 * - Resolves relative paths against `apiUrl` and attaches the standard
 *   GitHub headers (accept, API version, user agent, bearer token).
 * - Retries failed and rate-limited requests, honouring `Retry-After` and
 *   `x-ratelimit-reset`.
 * - Spaces mutating requests at least `mutationDelayMillis` apart.
 * - Follows `Link` headers in {@link paginate}.
 *
 * @example
 * ```ts
 * const gh = new GitHub({ token: process.env.GITHUB_TOKEN });
 * const user = await gh.get("/user");
 * await gh.close();
 * ```
 */
export class GitHub {
	public readonly apiUrl: string;
	private readonly dispatcher: RequestDispatcher;

	/**
	 * Create a new client.
	 *
	 * @param options Token, base URL, headers and retry configuration.
	 */
	constructor(options: GitHubClientOptions = {}) {
		this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;

		const headers = new Headers({
			accept: options.accept ?? DEFAULT_ACCEPT,
			"user-agent": options.userAgent ?? DEFAULT_USER_AGENT,
		});
		const apiVersion =
			options.apiVersion === undefined
				? DEFAULT_API_VERSION
				: options.apiVersion;
		if (apiVersion !== null) {
			headers.set("x-github-api-version", apiVersion);
		}
		for (const [name, value] of Object.entries(options.headers ?? {})) {
			headers.set(name, value);
		}

		this.dispatcher = new RequestDispatcher({
			baseUrl: this.apiUrl,
			transport: options.transport ?? new FetchTransport(),
			headers: Object.fromEntries(headers.entries()),
			token:
				options.token === undefined ? undefined : Redacted.make(options.token),
			retryConfig: resolveRetryConfig(options.retry),
			mutationDelayMillis:
				options.mutationDelayMillis ?? DEFAULT_MUTATION_DELAY_MILLIS,
			clock: options.clock,
		});
		debug("created client for %s", this.apiUrl);
	}

	/**
	 * Create a client configured from `GITHUB_TOKEN` and `GITHUB_API_URL`.
	 * Explicit options take precedence over the environment.
	 */
	public static fromEnvironment(options: GitHubClientOptions = {}): GitHub {
		return new GitHub({ ...GitHubEnvironment.parse(), ...options });
	}

	public get isClosed(): boolean {
		return this.dispatcher.isClosed;
	}

	/** An {@link Endpoint} for `path`, for building sub-resource URLs. */
	public endpoint(path: string = ""): Endpoint {
		return new Endpoint(this, joinUrl(this.apiUrl, path));
	}

	/**
	 * Perform a request and return the decoded JSON body (`undefined` for an
	 * empty body), or the `Response` itself when `raw` or `stream` is set.
	 *
	 * @param path Path relative to `apiUrl`, or an absolute URL
	 */
	public request(
		method: string,
		path: string,
		options: RawResponseOptions,
	): Promise<Response>;
	public request(
		method: string,
		path: string,
		options?: DecodedResponseOptions,
	): Promise<DecodedBody>;
	public request(
		method: string,
		path: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody>;
	public request(
		method: string,
		path: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody> {
		return this.dispatcher.dispatch(method, path, options);
	}

	public get(path: string, options: RawResponseOptions): Promise<Response>;
	public get(
		path: string,
		options?: DecodedResponseOptions,
	): Promise<DecodedBody>;
	public get(
		path: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody> {
		return this.request("GET", path, options);
	}

	public post(path: string, options: RawResponseOptions): Promise<Response>;
	public post(
		path: string,
		options?: DecodedResponseOptions,
	): Promise<DecodedBody>;
	public post(
		path: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody> {
		return this.request("POST", path, options);
	}

	public put(path: string, options: RawResponseOptions): Promise<Response>;
	public put(
		path: string,
		options?: DecodedResponseOptions,
	): Promise<DecodedBody>;
	public put(
		path: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody> {
		return this.request("PUT", path, options);
	}

	public patch(path: string, options: RawResponseOptions): Promise<Response>;
	public patch(
		path: string,
		options?: DecodedResponseOptions,
	): Promise<DecodedBody>;
	public patch(
		path: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody> {
		return this.request("PATCH", path, options);
	}

	public delete(path: string, options: RawResponseOptions): Promise<Response>;
	public delete(
		path: string,
		options?: DecodedResponseOptions,
	): Promise<DecodedBody>;
	public delete(
		path: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody> {
		return this.request("DELETE", path, options);
	}

	/**
	 * Iterate over every item of a paginated listing, fetching pages lazily.
	 * With `raw: true`, yields each page's `Response` instead.
	 *
	 * @example
	 * ```ts
	 * for await (const repo of gh.paginate("/user/repos", { query: { per_page: 100 } })) {
	 *   console.log(repo);
	 * }
	 * ```
	 */
	public paginate(
		path: string,
		options: PaginateOptions & { raw: true },
	): AsyncIterable<Response>;
	public paginate(
		path: string,
		options?: PaginateOptions & { raw?: false },
	): AsyncIterable<JsonValue>;
	public paginate(
		path: string,
		options?: PaginateOptions,
	): AsyncIterable<Response | JsonValue>;
	public paginate(
		path: string,
		options?: PaginateOptions,
	): AsyncIterable<Response | JsonValue> {
		return paginate(this.dispatcher, path, options);
	}

	/**
	 * Release the transport. Every request made afterwards fails with
	 * `ClosedClientError`.
	 */
	public async close(): Promise<void> {
		await this.dispatcher.close();
	}
}
