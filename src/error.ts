type ErrorWithCode = Error & {
	code?: unknown;
	cause?: unknown;
};

function getErrorCode(error: unknown): string | undefined {
	if (!(error instanceof Error)) return undefined;
	const err: ErrorWithCode = error;

	if (typeof err.code === "string") return err.code;

	if (err.cause instanceof Error) {
		const cause: ErrorWithCode = err.cause;
		if (typeof cause.code === "string") {
			return cause.code;
		}
	}

	return undefined;
}

// Common connection error codes from Node.js net, dns and undici
const CONNECTION_ERROR_CODES = [
	"ECONNREFUSED", // Connection refused
	"ENOTFOUND", // DNS lookup failed
	"EAI_AGAIN", // DNS lookup timed out
	"ETIMEDOUT", // Connection timeout
	"ENETUNREACH", // Network unreachable
	"EHOSTUNREACH", // Host unreachable
	"ECONNRESET", // Connection reset by peer
	"EPIPE", // Broken pipe
	"UND_ERR_SOCKET",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
];

function isConnectionError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	if (error.message.includes("fetch failed")) {
		return true;
	}

	const code = getErrorCode(error);
	return typeof code === "string" && CONNECTION_ERROR_CODES.includes(code);
}

/**
 * Base class for every error the client surfaces.
 *
 * - `status` is the HTTP status code, 0 for non-HTTP/internal errors.
 * - `code` is a short machine-readable tag when one applies.
 * - `origin` tells whether the failure came back from the server or was raised locally.
 */
export class GitHubError extends Error {
	public readonly code?: string;
	/** HTTP status code. 0 for non-HTTP/internal errors. */
	public readonly status: number;
	/** Optional structured error details for diagnostics. */
	public readonly data?: unknown;
	public readonly origin: "server" | "sdk";

	constructor({
		message,
		code,
		status,
		data,
		origin,
		cause,
	}: {
		message: string;
		code?: string;
		status?: number;
		data?: unknown;
		origin?: "server" | "sdk";
		cause?: unknown;
	}) {
		super(message, cause === undefined ? undefined : { cause });
		this.code = code;
		this.status = typeof status === "number" ? status : 0;
		this.data = data;
		this.origin = origin ?? "sdk";
		this.name = "GitHubError";
	}
}

/**
 * The request never produced an HTTP response: connection failures, timeouts,
 * or a request the transport refused to build.
 *
 * `retryable` is false for malformed requests, which fail the same way every time.
 */
export class TransportError extends GitHubError {
	public readonly retryable: boolean;

	constructor({
		message,
		code,
		retryable,
		cause,
	}: {
		message: string;
		code?: string;
		retryable: boolean;
		cause?: unknown;
	}) {
		super({ message, code: code ?? "TRANSPORT_ERROR", cause });
		this.retryable = retryable;
		this.name = "TransportError";
	}
}

function describeStatus(status: number): string {
	if (status >= 400 && status < 500) return "Client Error";
	if (status >= 500 && status < 600) return "Server Error";
	return "Unknown Error";
}

/**
 * Render a response body for humans: JSON is re-indented, anything else is
 * returned verbatim, and a blank body renders as nothing.
 */
export function prettyBody(body: string): string | undefined {
	if (body.trim() === "") return undefined;
	try {
		return JSON.stringify(JSON.parse(body), null, 4);
	} catch {
		return body;
	}
}

/**
 * Terminal 4xx/5xx response. The message embeds the response body so that
 * rate-limit explanations and validation errors reach whoever reads the log.
 */
export class HttpError extends GitHubError {
	public readonly statusText: string;
	public readonly url: string;
	/** Raw response body text. */
	public readonly body: string;

	constructor({
		status,
		statusText,
		url,
		body,
	}: {
		status: number;
		statusText: string;
		url: string;
		body: string;
	}) {
		let message = `${status} ${describeStatus(status)}: ${statusText} for URL: ${url}`;
		const pretty = prettyBody(body);
		if (pretty !== undefined) {
			message += `\n\n${pretty}`;
		}
		super({
			message,
			code: "HTTP_ERROR",
			status,
			origin: "server",
			data: body,
		});
		this.statusText = statusText;
		this.url = url;
		this.body = body;
		this.name = "HttpError";
	}
}

/** A non-empty body that was expected to be JSON and is not. */
export class DecodeError extends GitHubError {
	public readonly body: string;

	constructor({
		url,
		body,
		cause,
	}: {
		url: string;
		body: string;
		cause?: unknown;
	}) {
		super({
			message: `Response from ${url} is not valid JSON`,
			code: "DECODE_ERROR",
			origin: "server",
			data: body,
			cause,
		});
		this.body = body;
		this.name = "DecodeError";
	}
}

/**
 * A page body that is neither a JSON array nor an object with exactly one
 * array-valued field.
 */
export class PaginationShapeError extends GitHubError {
	public readonly url: string;

	constructor(url: string, detail: string) {
		super({
			message: `Cannot paginate ${url}: ${detail}`,
			code: "PAGINATION_SHAPE",
			origin: "server",
		});
		this.url = url;
		this.name = "PaginationShapeError";
	}
}

export class ClosedClientError extends GitHubError {
	constructor(message: string = "Client has been closed") {
		super({ message, code: "CLIENT_CLOSED" });
		this.name = "ClosedClientError";
	}
}

/** The caller's abort signal fired while a request was sleeping or in flight. */
export class CancelledError extends GitHubError {
	constructor(message: string = "Request cancelled", cause?: unknown) {
		super({ message, code: "ABORTED", status: 499, cause });
		this.name = "CancelledError";
	}
}

/**
 * Classify anything thrown by a transport into the client's error taxonomy.
 *
 * Aborts caused by the caller's signal become {@link CancelledError}; network
 * and timeout failures become retryable {@link TransportError}s; everything
 * else (bad URLs, unsupported bodies) is a non-retryable transport error.
 */
export function transportError(
	error: unknown,
	signal?: AbortSignal,
): GitHubError {
	if (error instanceof GitHubError) {
		return error;
	}

	if (signal?.aborted) {
		return new CancelledError("Request cancelled", error);
	}

	if (error instanceof Error && error.name === "TimeoutError") {
		return new TransportError({
			message: `Request timed out: ${error.message}`,
			code: "TIMEOUT",
			retryable: true,
			cause: error,
		});
	}

	if (isConnectionError(error)) {
		const code = getErrorCode(error) ?? "NETWORK_ERROR";
		return new TransportError({
			message: `Connection failed: ${code}`,
			code,
			retryable: true,
			cause: error,
		});
	}

	return new TransportError({
		message: error instanceof Error ? error.message : String(error),
		code: "INVALID_REQUEST",
		retryable: false,
		cause: error,
	});
}

/**
 * Classify a failure while reading a response body. The request itself was
 * well-formed, so anything {@link transportError} would call a malformed
 * request (e.g. undici's `TypeError: terminated`) is a retryable read failure.
 */
export function bodyReadError(
	error: unknown,
	signal?: AbortSignal,
): GitHubError {
	const classified = transportError(error, signal);
	if (classified instanceof TransportError && !classified.retryable) {
		return new TransportError({
			message: `Failed to read response body: ${classified.message}`,
			code: "BODY_READ_FAILED",
			retryable: true,
			cause: error,
		});
	}
	return classified;
}
