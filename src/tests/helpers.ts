import { CancelledError } from "../error.js";
import type { Clock } from "../lib/retry.js";
import type { Transport, TransportRequest } from "../lib/transport.js";

export const T0 = 1_700_000_000_000;

/**
 * Virtual clock: `sleep` records the requested delay and advances time
 * instantly, so retry and throttle timing can be asserted exactly.
 */
export class ManualClock implements Clock {
	public time: number;
	public readonly sleeps: number[] = [];

	constructor(start: number = T0) {
		this.time = start;
	}

	public now(): number {
		return this.time;
	}

	public async sleep(ms: number, signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			throw new CancelledError("Request cancelled while waiting");
		}
		this.sleeps.push(ms);
		this.time += ms;
	}
}

export type Reply =
	| Response
	| Error
	| ((request: TransportRequest) => Response | Promise<Response>);

export type RecordedRequest = TransportRequest & { at: number };

/** In-process transport that replays queued replies and records every send. */
export class FakeTransport implements Transport {
	public readonly requests: RecordedRequest[] = [];
	public closed = false;
	private readonly replies: Reply[] = [];
	private readonly clock?: Clock;

	constructor(clock?: Clock) {
		this.clock = clock;
	}

	public reply(...replies: Reply[]): this {
		this.replies.push(...replies);
		return this;
	}

	public async send(request: TransportRequest): Promise<Response> {
		this.requests.push({ ...request, at: this.clock?.now() ?? Date.now() });
		const next = this.replies.shift();
		if (next === undefined) {
			throw new Error(`unexpected request: ${request.method} ${request.url}`);
		}
		if (next instanceof Error) {
			throw next;
		}
		if (typeof next === "function") {
			return next(request);
		}
		return next;
	}

	public close(): void {
		this.closed = true;
	}
}

export function jsonResponse(
	body: unknown,
	init: { status?: number; statusText?: string; headers?: Record<string, string> } = {},
): Response {
	return new Response(JSON.stringify(body), {
		status: init.status ?? 200,
		statusText: init.statusText,
		headers: { "content-type": "application/json", ...init.headers },
	});
}

export function textResponse(
	body: string,
	init: { status?: number; statusText?: string; headers?: Record<string, string> } = {},
): Response {
	return new Response(body, {
		status: init.status ?? 200,
		statusText: init.statusText,
		headers: init.headers,
	});
}

/** A 200 response whose body breaks off after `prefix`. */
export function truncatedResponse(prefix: string): Response {
	const body = new ReadableStream<Uint8Array>({
		start(controller) {
			controller.enqueue(new TextEncoder().encode(prefix));
			controller.error(new TypeError("terminated"));
		},
	});
	return new Response(body, { status: 200 });
}

export function connectionError(code: string): Error {
	return Object.assign(new Error(`connect ${code}`), { code });
}

/** Collect all items from an async iterable into an array. */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
	const result: T[] = [];
	for await (const item of iterable) {
		result.push(item);
	}
	return result;
}
