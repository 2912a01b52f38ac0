import { STATUS_CODES } from "node:http";
import createDebug from "debug";
import type {
	DecodedBody,
	DecodedResponseOptions,
	DispatchOptions,
	HeaderParams,
	RawResponseOptions,
} from "../common.js";
import { joinUrl } from "../endpoints.js";
import {
	bodyReadError,
	CancelledError,
	ClosedClientError,
	HttpError,
	TransportError,
	transportError,
} from "../error.js";
import { decodeBody, withQuery } from "../utils.js";
import * as Redacted from "./redacted.js";
import type { AttemptOutcome } from "./result.js";
import { httpResponse, transportFailure } from "./result.js";
import {
	type Clock,
	DEFAULT_RETRY_CONFIG,
	type RetryConfig,
	RetryPolicy,
	systemClock,
} from "./retry.js";
import { isMutating, MutationThrottle } from "./throttle.js";
import type { Transport, TransportRequest } from "./transport.js";

const debug = createDebug("ghdispatch:dispatch");

async function readText(
	response: Response,
	signal?: AbortSignal,
): Promise<string> {
	try {
		return await response.text();
	} catch (error) {
		throw bodyReadError(error, signal);
	}
}

/** Final URL of a response; buffered responses carry none of their own. */
function responseUrl(response: Response, request: TransportRequest): string {
	return response.url || withQuery(request.url, request.query);
}

export type RequestDispatcherInit = {
	baseUrl: string;
	transport: Transport;
	/** Headers sent with every request; per-call headers override them. */
	headers?: Record<string, string>;
	/** Bearer token, applied as the `authorization` header. */
	token?: Redacted.Redacted;
	retryConfig?: Readonly<RetryConfig>;
	mutationDelayMillis: number;
	clock?: Clock;
	/** Random source for backoff jitter. */
	random?: () => number;
};

/**
 * Runs one logical request end to end: URL resolution, header merging, the
 * mutation throttle, the retry loop and response decoding.
 *
 * Intermediate attempts are invisible to the caller, who sees either the
 * final response or the error that ended the retry loop.
 */
export class RequestDispatcher {
	public readonly baseUrl: string;
	public readonly policy: RetryPolicy;
	public readonly throttle: MutationThrottle;
	private readonly transport: Transport;
	private readonly sessionHeaders: Headers;
	private readonly token?: Redacted.Redacted;
	private readonly clock: Clock;
	private closed = false;

	constructor(init: RequestDispatcherInit) {
		this.baseUrl = init.baseUrl;
		this.transport = init.transport;
		this.sessionHeaders = new Headers(init.headers);
		this.token = init.token;
		this.policy = new RetryPolicy(
			init.retryConfig ?? DEFAULT_RETRY_CONFIG,
			init.random,
		);
		this.throttle = new MutationThrottle(init.mutationDelayMillis);
		this.clock = init.clock ?? systemClock;
	}

	public get isClosed(): boolean {
		return this.closed;
	}

	public resolveUrl(url: string): string {
		return joinUrl(this.baseUrl, url);
	}

	/**
	 * Session headers, then the token, then the per-call headers. Names are
	 * case-insensitive; a per-call `null` drops the header entirely.
	 */
	public mergeHeaders(
		headers?: HeaderParams,
		jsonBody: boolean = false,
	): Record<string, string> {
		const merged = new Headers(this.sessionHeaders);
		if (this.token !== undefined) {
			merged.set("authorization", `Bearer ${Redacted.value(this.token)}`);
		}
		if (jsonBody) {
			merged.set("content-type", "application/json");
		}
		for (const [name, value] of Object.entries(headers ?? {})) {
			if (value === null) {
				merged.delete(name);
			} else {
				merged.set(name, value);
			}
		}
		return Object.fromEntries(merged.entries());
	}

	/**
	 * Send a request and return its decoded JSON body, or the untouched
	 * `Response` when `raw` or `stream` is set.
	 *
	 * @throws {HttpError} on a 4xx/5xx response that is not (or no longer) retried
	 * @throws {TransportError} when the transport keeps failing
	 * @throws {DecodeError} when a non-empty body is not JSON
	 * @throws {CancelledError} when `signal` fires
	 * @throws {ClosedClientError} after {@link close}
	 */
	public dispatch(
		method: string,
		url: string,
		options: RawResponseOptions,
	): Promise<Response>;
	public dispatch(
		method: string,
		url: string,
		options?: DecodedResponseOptions,
	): Promise<DecodedBody>;
	public dispatch(
		method: string,
		url: string,
		options?: DispatchOptions,
	): Promise<Response | DecodedBody>;
	public async dispatch(
		method: string,
		url: string,
		options: DispatchOptions = {},
	): Promise<Response | DecodedBody> {
		const request = this.prepare(method, url, options);
		if (options.raw || options.stream) {
			const { response } = await this.send(request, false);
			return response;
		}
		const { response, text } = await this.send(request, true);
		return decodeBody(text, responseUrl(response, request), response.status);
	}

	/**
	 * Like {@link dispatch}, but hands back the response together with its
	 * body text. The body is read inside the retry loop, so a connection that
	 * drops mid-body is retried like any other transport failure.
	 */
	public async fetchText(
		method: string,
		url: string,
		options: DispatchOptions = {},
	): Promise<{ response: Response; text: string; url: string }> {
		const request = this.prepare(method, url, options);
		const { response, text } = await this.send(request, true);
		return { response, text, url: responseUrl(response, request) };
	}

	private prepare(
		method: string,
		url: string,
		options: DispatchOptions,
	): TransportRequest {
		if (this.closed) {
			throw new ClosedClientError();
		}
		const verb = method.toUpperCase();
		const absolute = this.resolveUrl(url);
		debug("%s %s", verb, absolute);

		const hasJson = options.json !== undefined;
		return {
			method: verb,
			url: absolute,
			headers: this.mergeHeaders(options.headers, hasJson),
			body: hasJson ? JSON.stringify(options.json) : options.data,
			query: options.query,
			timeoutMillis: options.timeoutMillis,
			stream: options.stream,
			signal: options.signal,
		};
	}

	/**
	 * Run the attempt loop. The body is read for error statuses, and for
	 * every status when `readBody` is set.
	 */
	private async send(
		request: TransportRequest,
		readBody: boolean,
	): Promise<{ response: Response; text: string }> {
		const { signal } = request;
		const mutating = isMutating(request.method);
		let startedAt: number | undefined;

		for (let attempt = 1; ; attempt++) {
			if (signal?.aborted) {
				throw new CancelledError();
			}
			if (this.closed) {
				throw new ClosedClientError();
			}

			const reservedAt = this.clock.now();
			const wait = this.throttle.waitIfNeeded(mutating, reservedAt);
			if (wait > 0) {
				try {
					await this.clock.sleep(wait, signal);
				} catch (error) {
					this.throttle.release(reservedAt + wait);
					throw error;
				}
			}

			const sentAt = this.clock.now();
			startedAt ??= sentAt;
			if (mutating) {
				this.throttle.markSent(sentAt);
			}

			let response: Response | undefined;
			let text = "";
			let outcome: AttemptOutcome;
			try {
				response = await this.transport.send(request);
				if (readBody || response.status >= 400) {
					text = await readText(response, signal);
				}
				outcome = httpResponse(response.status, response.headers, text);
			} catch (error) {
				const failure = transportError(error, signal);
				if (!(failure instanceof TransportError)) {
					throw failure;
				}
				response = undefined;
				outcome = transportFailure(failure);
			}

			const now = this.clock.now();
			const decision = this.policy.evaluate(
				outcome,
				attempt,
				now - startedAt,
				now,
			);

			if (decision.action === "retry") {
				if (outcome.kind === "transport") {
					debug(
						"request failed: %s; waiting %dms and retrying",
						outcome.error.message,
						decision.waitMillis,
					);
				} else {
					debug(
						"server returned %d response; waiting %dms and retrying",
						outcome.status,
						decision.waitMillis,
					);
				}
				await this.clock.sleep(decision.waitMillis, signal);
				continue;
			}

			if (decision.action === "success" && response !== undefined) {
				if (attempt > 1) {
					debug("succeeded after %d retries", attempt - 1);
				}
				return { response, text };
			}

			const reason =
				decision.action === "giveUp" ? decision.reason : "no response";
			if (outcome.kind === "transport") {
				debug("giving up (%s): %s", reason, outcome.error.message);
				throw outcome.error;
			}

			debug("giving up on %d response (%s)", outcome.status, reason);
			throw new HttpError({
				status: outcome.status,
				statusText:
					response?.statusText || STATUS_CODES[outcome.status] || "",
				url:
					response === undefined
						? withQuery(request.url, request.query)
						: responseUrl(response, request),
				body: outcome.body,
			});
		}
	}

	/** Release the transport. Terminal: every later dispatch fails. */
	public async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		debug("closing dispatcher for %s", this.baseUrl);
		if (this.token !== undefined) {
			Redacted.unsafeWipe(this.token);
		}
		await this.transport.close?.();
	}
}
