import createDebug from "debug";

const debug = createDebug("ghdispatch:throttle");

export const MUTATING_METHODS: ReadonlySet<string> = new Set([
	"POST",
	"PATCH",
	"PUT",
	"DELETE",
]);

export function isMutating(method: string): boolean {
	return MUTATING_METHODS.has(method.toUpperCase());
}

/**
 * Keeps mutating requests made through one client at least `delayMillis`
 * apart, across every endpoint and every retry attempt.
 *
 * Slots are reserved synchronously in {@link waitIfNeeded}: concurrent
 * async callers sharing a client each get their own slot.
 */
export class MutationThrottle {
	public readonly delayMillis: number;
	private lastSentAt: number | undefined = undefined;
	/** Reserved slots whose request has not gone out yet. */
	private readonly pending: number[] = [];

	constructor(delayMillis: number) {
		if (!Number.isFinite(delayMillis) || delayMillis < 0) {
			throw new RangeError(
				`mutationDelayMillis must be a finite number >= 0, got ${delayMillis}`,
			);
		}
		this.delayMillis = delayMillis;
	}

	/**
	 * Reserve the next send slot and return how long the caller has to sleep
	 * before sending. Always 0 for non-mutating requests and for the first
	 * mutating request.
	 */
	public waitIfNeeded(mutating: boolean, nowMillis: number): number {
		if (!mutating) return 0;

		const last = this.lastMutation;
		const sendAt =
			last === undefined
				? nowMillis
				: Math.max(nowMillis, last + this.delayMillis);
		this.pending.push(sendAt);

		const wait = sendAt - nowMillis;
		if (wait > 0) {
			debug("sleeping %dms between mutating requests", wait);
		}
		return wait;
	}

	/**
	 * Record the instant a mutating request actually went out. Settles every
	 * reservation up to that instant.
	 */
	public markSent(nowMillis: number): void {
		this.lastSentAt =
			this.lastSentAt === undefined
				? nowMillis
				: Math.max(this.lastSentAt, nowMillis);
		for (let i = this.pending.length - 1; i >= 0; i--) {
			const slot = this.pending[i];
			if (slot !== undefined && slot <= nowMillis) {
				this.pending.splice(i, 1);
			}
		}
	}

	/**
	 * Give back a slot reserved by {@link waitIfNeeded} for a request that was
	 * abandoned before it was sent.
	 */
	public release(slotMillis: number): void {
		const index = this.pending.indexOf(slotMillis);
		if (index >= 0) {
			this.pending.splice(index, 1);
			debug("released mutation slot at %d", slotMillis);
		}
	}

	/** Timestamp of the latest mutating send or reserved slot, if any. */
	public get lastMutation(): number | undefined {
		const times =
			this.lastSentAt === undefined
				? this.pending
				: [this.lastSentAt, ...this.pending];
		return times.length > 0 ? Math.max(...times) : undefined;
	}
}
