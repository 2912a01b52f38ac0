import createDebug from "debug";
import type { QueryParams } from "../common.js";
import { bodyReadError, ClosedClientError } from "../error.js";
import { withQuery } from "../utils.js";

const debug = createDebug("ghdispatch:transport");

export type TransportRequest = {
	method: string;
	/** Absolute URL, without the query parameters below. */
	url: string;
	headers: Record<string, string>;
	body?: string | Uint8Array;
	query?: QueryParams;
	/**
	 * Per-attempt timeout. Covers the whole body, except with `stream`, where
	 * it only covers the wait for the response headers.
	 */
	timeoutMillis?: number;
	/** Hand back the body unread so the caller can consume it as a stream. */
	stream?: boolean;
	signal?: AbortSignal;
};

/**
 * Sends one HTTP request. Implementations reject when no response arrives
 * (connection failure, timeout, malformed request) and resolve with the
 * `Response` for every status code, errors included.
 */
export interface Transport {
	send(request: TransportRequest): Promise<Response>;
	/** Release pooled resources. No sends may follow. */
	close?(): void | Promise<void>;
}

function timeoutError(ms: number): Error {
	const error = new Error(`No response within ${ms}ms`);
	error.name = "TimeoutError";
	return error;
}

// Statuses whose responses must be constructed with a null body
const NULL_BODY_STATUSES: ReadonlySet<number> = new Set([101, 103, 204, 205, 304]);

/**
 * Transport backed by the global `fetch`.
 *
 * Unless `stream` is set, the body is buffered before `send` resolves, so
 * `timeoutMillis` and the abort signal cover the body as well as the headers.
 */
export class FetchTransport implements Transport {
	private closed = false;

	public async send(request: TransportRequest): Promise<Response> {
		if (this.closed) {
			throw new ClosedClientError("Transport has been closed");
		}

		const url = withQuery(request.url, request.query);
		const controller = new AbortController();
		const upstream = request.signal;
		const onAbort = () => controller.abort(upstream?.reason);
		if (upstream?.aborted) {
			onAbort();
		} else {
			upstream?.addEventListener("abort", onAbort, { once: true });
		}

		let timer: ReturnType<typeof setTimeout> | undefined;
		if (request.timeoutMillis !== undefined) {
			const ms = request.timeoutMillis;
			timer = setTimeout(() => controller.abort(timeoutError(ms)), ms);
		}

		try {
			debug("fetch %s %s", request.method, url);
			const response = await fetch(url, {
				method: request.method,
				headers: request.headers,
				body: request.body,
				signal: controller.signal,
			});
			if (
				request.stream ||
				response.body === null ||
				NULL_BODY_STATUSES.has(response.status)
			) {
				return response;
			}

			let body: ArrayBuffer;
			try {
				body = await response.arrayBuffer();
			} catch (error) {
				throw bodyReadError(
					controller.signal.aborted ? controller.signal.reason : error,
					upstream,
				);
			}
			return new Response(body, {
				status: response.status,
				statusText: response.statusText,
				headers: response.headers,
			});
		} finally {
			clearTimeout(timer);
			upstream?.removeEventListener("abort", onAbort);
		}
	}

	public close(): void {
		this.closed = true;
	}
}
