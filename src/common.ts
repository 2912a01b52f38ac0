import type { Clock, RetryConfig } from "./lib/retry.js";
import type { Transport } from "./lib/transport.js";

export const DEFAULT_API_URL = "https://api.github.com";
export const DEFAULT_ACCEPT = "application/vnd.github+json";
export const DEFAULT_API_VERSION = "2022-11-28";
/**
 * GitHub asks integrators to wait at least one second between mutating
 * requests to stay clear of secondary rate limits.
 */
export const DEFAULT_MUTATION_DELAY_MILLIS = 1000;

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

export type QueryValue = string | number | boolean | null | undefined;

/**
 * Query string parameters. Arrays repeat the key; `null` and `undefined`
 * entries are left out.
 */
export type QueryParams = Record<string, QueryValue | readonly QueryValue[]>;

/**
 * Per-request headers. A `null` value removes a header the client would
 * otherwise send (e.g. `{ authorization: null }`).
 */
export type HeaderParams = Record<string, string | null>;

/**
 * Configuration for constructing a {@link GitHub} client.
 */
export type GitHubClientOptions = {
	/** Token sent as `Authorization: Bearer <token>`. */
	token?: string;
	/**
	 * Base URL for relative paths.
	 * @default "https://api.github.com"
	 */
	apiUrl?: string;
	/** @default "application/vnd.github+json" */
	accept?: string;
	/**
	 * Value of the `X-GitHub-Api-Version` header. `null` omits the header.
	 * @default "2022-11-28"
	 */
	apiVersion?: string | null;
	/** `User-Agent` header; see `makeUserAgent`. */
	userAgent?: string;
	/** Extra headers sent with every request. */
	headers?: Record<string, string>;
	/**
	 * Minimum spacing between two mutating (POST/PATCH/PUT/DELETE) requests.
	 * @default 1000
	 */
	mutationDelayMillis?: number;
	/**
	 * Retry configuration for failed and rate-limited requests.
	 * @default { maxRetries: 10, backoffFactorMillis: 1000, backoffBase: 1.25, backoffJitterMillis: 0, backoffMaxMillis: 120000, totalWaitMillis: 300000 }
	 */
	retry?: Partial<RetryConfig>;
	/** HTTP transport. Defaults to a `fetch`-based transport. */
	transport?: Transport;
	/** Time source and sleeper, mostly useful for tests. */
	clock?: Clock;
};

export type GitHubEnvironmentConfig = Pick<
	GitHubClientOptions,
	"token" | "apiUrl"
>;

export class GitHubEnvironment {
	public static parse(): GitHubEnvironmentConfig {
		const config: GitHubEnvironmentConfig = {};

		const token = process.env.GITHUB_TOKEN;
		if (token) {
			config.token = token;
		}

		const apiUrl = process.env.GITHUB_API_URL;
		if (apiUrl) {
			config.apiUrl = apiUrl;
		}

		return config;
	}
}

/**
 * The API URL from `GITHUB_API_URL` (set inside GitHub Actions and on GitHub
 * Enterprise runners), falling back to the public API.
 */
export function getGitHubApiUrl(): string {
	return process.env.GITHUB_API_URL || DEFAULT_API_URL;
}

/**
 * Per-request options that apply to every operation.
 */
export type RequestOptions = {
	query?: QueryParams;
	headers?: HeaderParams;
	/** Timeout for each individual attempt, not for the whole retry sequence. */
	timeoutMillis?: number;
	/** Abort signal; cancels pending sleeps and in-flight sends. */
	signal?: AbortSignal;
};

export type BodyOptions = {
	/** Serialized as JSON with `content-type: application/json`. */
	json?: unknown;
	/** Sent verbatim. Ignored when `json` is given. */
	data?: string | Uint8Array;
};

export type ResponseMode = {
	/** Return the untouched `Response` instead of decoding it. */
	raw?: boolean;
	/** Like `raw`; the body is left unread so it can be consumed as a stream. */
	stream?: boolean;
};

export type DispatchOptions = RequestOptions & BodyOptions & ResponseMode;

export type RawResponseOptions = DispatchOptions &
	({ raw: true } | { stream: true });

export type DecodedResponseOptions = DispatchOptions & {
	raw?: false;
	stream?: false;
};

export type DecodedBody = JsonValue | undefined;

export type PaginateOptions = RequestOptions & {
	/** Yield each page's `Response` instead of the items inside it. */
	raw?: boolean;
};
