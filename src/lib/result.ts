/**
 * Outcome and decision types for a single request attempt.
 */

import type { TransportError } from "../error.js";

/**
 * What one attempt produced: either the transport failed before a response
 * arrived, or the server answered. `body` is only read for error statuses.
 */
export type AttemptOutcome =
	| { kind: "transport"; error: TransportError }
	| {
			kind: "response";
			status: number;
			headers: Headers;
			body: string;
	  };

export type RetryDecision =
	| { action: "retry"; waitMillis: number }
	| { action: "giveUp"; reason: string }
	| { action: "success" };

export function transportFailure(error: TransportError): AttemptOutcome {
	return { kind: "transport", error };
}

export function httpResponse(
	status: number,
	headers: Headers,
	body: string = "",
): AttemptOutcome {
	return { kind: "response", status, headers, body };
}

export function retry(waitMillis: number): RetryDecision {
	return { action: "retry", waitMillis };
}

export function giveUp(reason: string): RetryDecision {
	return { action: "giveUp", reason };
}

export function success(): RetryDecision {
	return { action: "success" };
}
