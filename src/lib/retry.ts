import createDebug from "debug";
import { CancelledError } from "../error.js";
import type { AttemptOutcome, RetryDecision } from "./result.js";
import { giveUp, retry, success } from "./result.js";

const debug = createDebug("ghdispatch:retry");

/**
 * Retry configuration for failed and rate-limited requests.
 */
export type RetryConfig = {
	/**
	 * Number of retries after the first attempt. 0 disables retrying.
	 * @default 10
	 */
	maxRetries: number;
	/**
	 * Scale of the backoff curve. The first retry waits a tenth of this.
	 * @default 1000
	 */
	backoffFactorMillis: number;
	/**
	 * Growth rate of the backoff curve: retry `n` waits
	 * `backoffFactorMillis * backoffBase ** (n - 1)`.
	 * @default 1.25
	 */
	backoffBase: number;
	/**
	 * Upper bound of a uniformly random amount added to each backoff after the first.
	 * @default 0
	 */
	backoffJitterMillis: number;
	/**
	 * Cap on the computed backoff. Server-provided waits are not capped.
	 * @default 120000
	 */
	backoffMaxMillis: number;
	/**
	 * Overall budget for one request, measured from its first attempt.
	 * A retry whose wait would cross it is not attempted. `null` means unbounded.
	 * @default 300000
	 */
	totalWaitMillis: number | null;
	/**
	 * Statuses that are always retried.
	 * @default 500..599
	 */
	retryStatuses: ReadonlySet<number>;
};

function statusRange(from: number, to: number): ReadonlySet<number> {
	const statuses = new Set<number>();
	for (let status = from; status <= to; status++) {
		statuses.add(status);
	}
	return statuses;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
	maxRetries: 10,
	backoffFactorMillis: 1000,
	backoffBase: 1.25,
	backoffJitterMillis: 0,
	backoffMaxMillis: 120_000,
	totalWaitMillis: 300_000,
	retryStatuses: statusRange(500, 599),
});

function assertNonNegative(name: string, value: number): void {
	if (!Number.isFinite(value) || value < 0) {
		throw new RangeError(`${name} must be a finite number >= 0, got ${value}`);
	}
}

/**
 * Merge a partial configuration over the defaults and validate it.
 * The result is frozen and safe to share between clients.
 */
export function resolveRetryConfig(
	config?: Partial<RetryConfig>,
): Readonly<RetryConfig> {
	// A key that is present but undefined keeps its default
	const defaults = DEFAULT_RETRY_CONFIG;
	const resolved: RetryConfig = {
		maxRetries: config?.maxRetries ?? defaults.maxRetries,
		backoffFactorMillis:
			config?.backoffFactorMillis ?? defaults.backoffFactorMillis,
		backoffBase: config?.backoffBase ?? defaults.backoffBase,
		backoffJitterMillis:
			config?.backoffJitterMillis ?? defaults.backoffJitterMillis,
		backoffMaxMillis: config?.backoffMaxMillis ?? defaults.backoffMaxMillis,
		totalWaitMillis:
			config?.totalWaitMillis === undefined
				? defaults.totalWaitMillis
				: config.totalWaitMillis,
		retryStatuses: config?.retryStatuses ?? defaults.retryStatuses,
	};

	if (!Number.isInteger(resolved.maxRetries) || resolved.maxRetries < 0) {
		throw new RangeError(
			`maxRetries must be a non-negative integer, got ${resolved.maxRetries}`,
		);
	}
	assertNonNegative("backoffFactorMillis", resolved.backoffFactorMillis);
	assertNonNegative("backoffBase", resolved.backoffBase);
	assertNonNegative("backoffJitterMillis", resolved.backoffJitterMillis);
	assertNonNegative("backoffMaxMillis", resolved.backoffMaxMillis);
	if (resolved.totalWaitMillis !== null) {
		assertNonNegative("totalWaitMillis", resolved.totalWaitMillis);
	}

	return Object.freeze(resolved);
}

/**
 * Source of wall-clock time and of delays. Swapped out in tests so that
 * retry and throttle timing can be asserted without waiting.
 */
export interface Clock {
	/** Milliseconds since the Unix epoch. */
	now(): number;
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Sleeps for the specified duration. Rejects with {@link CancelledError} if
 * the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new CancelledError("Request cancelled while waiting"));
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(new CancelledError("Request cancelled while waiting"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep,
};

const DIGITS = /^\d+$/;

/**
 * Milliseconds until the instant named by a `Retry-After` header, which is
 * either a number of seconds or an HTTP-date. Undefined when malformed.
 */
export function parseRetryAfter(
	value: string | null,
	nowMillis: number,
): number | undefined {
	if (value === null) return undefined;
	const trimmed = value.trim();
	if (DIGITS.test(trimmed)) {
		return Number(trimmed) * 1000;
	}
	const date = Date.parse(trimmed);
	if (Number.isNaN(date)) return undefined;
	return Math.max(0, date - nowMillis);
}

/**
 * Milliseconds until the Unix timestamp (in seconds) of an
 * `x-ratelimit-reset` header. Undefined when malformed.
 */
export function parseRateLimitReset(
	value: string | null,
	nowMillis: number,
): number | undefined {
	if (value === null) return undefined;
	const trimmed = value.trim();
	if (!DIGITS.test(trimmed)) return undefined;
	return Math.max(0, Number(trimmed) * 1000 - nowMillis);
}

function isRateLimitBody(body: string): boolean {
	return body.toLowerCase().includes("rate limit");
}

/**
 * Decides, for one finished attempt, whether to stop, retry, or accept the
 * response, and how long to wait before the retry. Pure apart from the
 * jitter random source.
 */
export class RetryPolicy {
	public readonly config: Readonly<RetryConfig>;
	private readonly random: () => number;

	constructor(
		config: Readonly<RetryConfig> = DEFAULT_RETRY_CONFIG,
		random: () => number = Math.random,
	) {
		this.config = config;
		this.random = random;
	}

	/**
	 * Computed backoff before the retry that follows attempt `attempt` (1-based).
	 * The first retry always waits `backoffFactorMillis / 10`.
	 */
	public backoff(attempt: number): number {
		const { backoffFactorMillis, backoffBase, backoffJitterMillis } =
			this.config;
		if (attempt < 2) {
			return backoffFactorMillis * 0.1;
		}
		let delay = backoffFactorMillis * backoffBase ** (attempt - 1);
		if (backoffJitterMillis > 0) {
			delay += this.random() * backoffJitterMillis;
		}
		return Math.max(0, Math.min(delay, this.config.backoffMaxMillis));
	}

	/**
	 * Whether the outcome is eligible for a retry at all, ignoring attempt
	 * counts and budgets.
	 */
	public isRetryable(outcome: AttemptOutcome): boolean {
		if (outcome.kind === "transport") {
			return outcome.error.retryable;
		}
		if (outcome.status === 403) {
			// A plain 403 is a permission problem, not a rate limit
			return (
				outcome.headers.has("retry-after") || isRateLimitBody(outcome.body)
			);
		}
		return this.config.retryStatuses.has(outcome.status);
	}

	/**
	 * Wait requested by the server through `Retry-After` or, once the rate
	 * limit is used up, `x-ratelimit-reset`. Undefined when there is none.
	 */
	public serverWait(
		outcome: AttemptOutcome,
		nowMillis: number,
	): number | undefined {
		if (outcome.kind !== "response") return undefined;
		const { headers } = outcome;

		const hints: number[] = [];
		const retryAfter = parseRetryAfter(headers.get("retry-after"), nowMillis);
		if (retryAfter !== undefined) {
			hints.push(retryAfter);
		}

		const exhausted =
			headers.get("x-ratelimit-remaining")?.trim() === "0" ||
			(outcome.status === 403 && isRateLimitBody(outcome.body));
		if (exhausted) {
			const reset = parseRateLimitReset(
				headers.get("x-ratelimit-reset"),
				nowMillis,
			);
			if (reset !== undefined) {
				hints.push(reset);
			}
		}

		return hints.length > 0 ? Math.max(...hints) : undefined;
	}

	/**
	 * @param attempt 1-based number of the attempt that produced `outcome`
	 * @param elapsedMillis time since the first attempt began
	 * @param nowMillis wall-clock time, for resolving absolute reset timestamps
	 */
	public evaluate(
		outcome: AttemptOutcome,
		attempt: number,
		elapsedMillis: number,
		nowMillis: number,
	): RetryDecision {
		if (outcome.kind === "response" && outcome.status < 400) {
			return success();
		}

		if (!this.isRetryable(outcome)) {
			debug("attempt %d not retryable", attempt);
			return giveUp("not retryable");
		}

		if (attempt > this.config.maxRetries) {
			debug("retries exhausted after %d attempts", attempt);
			return giveUp("retries exhausted");
		}

		let waitMillis = this.backoff(attempt);
		const hinted = this.serverWait(outcome, nowMillis);
		if (hinted !== undefined && hinted > waitMillis) {
			debug("server asked for %dms instead of %dms", hinted, waitMillis);
			waitMillis = hinted;
		}

		const { totalWaitMillis } = this.config;
		if (totalWaitMillis !== null && elapsedMillis + waitMillis > totalWaitMillis) {
			debug(
				"waiting %dms would exceed total budget of %dms (elapsed %dms)",
				waitMillis,
				totalWaitMillis,
				elapsedMillis,
			);
			return giveUp("total wait budget exceeded");
		}

		return retry(waitMillis);
	}
}
