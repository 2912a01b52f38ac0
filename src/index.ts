// =============================================================================
// Core Client
// =============================================================================

/** Top-level entrypoint for the library. */
export { GitHub } from "./github.js";
export { Endpoint, hasScheme, joinUrl } from "./endpoints.js";

// =============================================================================
// Configuration
// =============================================================================

export {
	DEFAULT_ACCEPT,
	DEFAULT_API_URL,
	DEFAULT_API_VERSION,
	DEFAULT_MUTATION_DELAY_MILLIS,
	GitHubEnvironment,
	getGitHubApiUrl,
} from "./common.js";
export type {
	BodyOptions,
	DecodedBody,
	DecodedResponseOptions,
	DispatchOptions,
	GitHubClientOptions,
	GitHubEnvironmentConfig,
	HeaderParams,
	JsonValue,
	PaginateOptions,
	QueryParams,
	QueryValue,
	RawResponseOptions,
	RequestOptions,
	ResponseMode,
} from "./common.js";
export { makeUserAgent, VERSION } from "./lib/runtime.js";

// =============================================================================
// Request Dispatch
// =============================================================================

export { RequestDispatcher } from "./lib/dispatch.js";
export type { RequestDispatcherInit } from "./lib/dispatch.js";
export { pageItems, paginate } from "./lib/paginate.js";
export {
	DEFAULT_RETRY_CONFIG,
	parseRateLimitReset,
	parseRetryAfter,
	RetryPolicy,
	resolveRetryConfig,
	sleep,
	systemClock,
} from "./lib/retry.js";
export type { Clock, RetryConfig } from "./lib/retry.js";
export type { AttemptOutcome, RetryDecision } from "./lib/result.js";
export {
	isMutating,
	MUTATING_METHODS,
	MutationThrottle,
} from "./lib/throttle.js";
export { FetchTransport } from "./lib/transport.js";
export type { Transport, TransportRequest } from "./lib/transport.js";
export { decodeBody, parseLinkHeader, withQuery } from "./utils.js";

// =============================================================================
// Errors
// =============================================================================

export {
	bodyReadError,
	CancelledError,
	ClosedClientError,
	DecodeError,
	GitHubError,
	HttpError,
	PaginationShapeError,
	prettyBody,
	TransportError,
	transportError,
} from "./error.js";
