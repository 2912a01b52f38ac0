/**
 * Opaque holder for secrets (access tokens). Prints as `<redacted>` through
 * `String()`, `JSON.stringify` and Node's `util.inspect`, so a client object
 * can be logged without leaking its token.
 */
export interface Redacted {
	toString(): string;
	toJSON(): string;
}

const redactedRegistry = new WeakMap<Redacted, string>();

const NodeInspectSymbol = Symbol.for("nodejs.util.inspect.custom");

const proto = {
	toString() {
		return "<redacted>";
	},
	toJSON() {
		return "<redacted>";
	},
	[NodeInspectSymbol]() {
		return "<redacted>";
	},
};

export const make = (secret: string): Redacted => {
	const redacted: Redacted = Object.create(proto);
	redactedRegistry.set(redacted, secret);
	return redacted;
};

export const value = (self: Redacted): string => {
	const secret = redactedRegistry.get(self);
	if (secret === undefined) {
		throw new Error("Unable to get redacted value");
	}
	return secret;
};

export const unsafeWipe = (self: Redacted): boolean =>
	redactedRegistry.delete(self);
