import type { Regex } from "./regex.ts";
import { AlwaysFalse, AlwaysTrue, Equal, List, Prefix, Substring } from "./string-matchers.ts";
import type { TextSink } from "./types.ts";

/** Base class for every error this package throws. */
export class MatcherError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "MatcherError";
	}
}

/**
 * Discriminated union of all payload types.
 *
 * Regex is part of the union even in the lite build, but only as a type: the
 * lite entry point exports no way to construct one.
 */
export type Payload = AlwaysFalse | AlwaysTrue | Equal | Prefix | Substring | Regex | List;

export type PayloadKind = Payload["kind"];

/** One handler per payload kind. Adding a kind breaks every visitor until it is handled. */
export type PayloadVisitor<R> = {
	readonly [K in PayloadKind]: (payload: Extract<Payload, { kind: K }>) => R;
};

const PAYLOAD_KINDS: ReadonlySet<string> = new Set<PayloadKind>([
	"alwaysFalse",
	"alwaysTrue",
	"equal",
	"prefix",
	"substring",
	"regex",
	"list",
]);

/** Values StringMatcher.from() converts without naming a payload. */
export type MatcherLike = boolean | string | readonly string[] | Payload;

/** Exhaustive case analysis over a payload. */
export function visitPayload<R>(payload: Payload, visitor: PayloadVisitor<R>): R {
	switch (payload.kind) {
		case "alwaysFalse":
			return visitor.alwaysFalse(payload);
		case "alwaysTrue":
			return visitor.alwaysTrue(payload);
		case "equal":
			return visitor.equal(payload);
		case "prefix":
			return visitor.prefix(payload);
		case "substring":
			return visitor.substring(payload);
		case "regex":
			return visitor.regex(payload);
		case "list":
			return visitor.list(payload);
		default:
			return unreachable(payload);
	}
}

/**
 * A string matcher holding exactly one payload.
 *
 * Construct it from a payload, or through one of the named shortcuts:
 *
 *   StringMatcher.fromEqual("highway").match("highway");   // true
 *   StringMatcher.fromList(["primary", "secondary"]).describe();  // "list[[primary][secondary]]"
 *   StringMatcher.of(new Prefix("foot")).match("footway");  // true
 *
 * The matcher itself is frozen; the payload is held by reference, so a List
 * payload still grows through `add()`.
 */
export class StringMatcher {
	readonly payload: Payload;

	constructor(payload: Payload = new AlwaysFalse()) {
		this.payload = payload;
		Object.freeze(this);
	}

	static alwaysFalse(): StringMatcher {
		return new StringMatcher(new AlwaysFalse());
	}

	static alwaysTrue(): StringMatcher {
		return new StringMatcher(new AlwaysTrue());
	}

	/** `true` → always_true, `false` → always_false. */
	static fromBool(result: boolean): StringMatcher {
		return result ? StringMatcher.alwaysTrue() : StringMatcher.alwaysFalse();
	}

	static fromEqual(value: string): StringMatcher {
		return new StringMatcher(new Equal(value));
	}

	static fromPrefix(value: string): StringMatcher {
		return new StringMatcher(new Prefix(value));
	}

	static fromSubstring(value: string): StringMatcher {
		return new StringMatcher(new Substring(value));
	}

	/** The values are copied; later changes to the caller's array do not leak in. */
	static fromList(values: Iterable<string>): StringMatcher {
		return new StringMatcher(new List(values));
	}

	static of(payload: Payload): StringMatcher {
		return new StringMatcher(payload);
	}

	/**
	 * Restricted conversion from a literal. Booleans, strings, string arrays and
	 * payloads are accepted; anything else throws rather than being coerced.
	 */
	static from(value: MatcherLike): StringMatcher {
		if (typeof value === "boolean") return StringMatcher.fromBool(value);
		if (typeof value === "string") return StringMatcher.fromEqual(value);
		if (isStringList(value)) return StringMatcher.fromList(value);
		if (isPayload(value)) return new StringMatcher(value);
		throw new MatcherError(`cannot build a string matcher from ${describeValue(value)}`);
	}

	get kind(): PayloadKind {
		return this.payload.kind;
	}

	match(input: string): boolean {
		return this.payload.match(input);
	}

	/** Diagnostic text for logs. Never use it for equality or control flow. */
	describe(): string {
		return this.payload.describe();
	}

	/** Write describe() into a sink, e.g. `matcher.print(process.stderr)`. */
	print(sink: TextSink): void {
		sink.write(this.describe());
	}

	toString(): string {
		return this.describe();
	}
}

function isStringList(value: unknown): value is readonly string[] {
	return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isPayload(value: unknown): value is Payload {
	return (
		typeof value === "object" &&
		value !== null &&
		"kind" in value &&
		typeof value.kind === "string" &&
		PAYLOAD_KINDS.has(value.kind) &&
		"match" in value &&
		typeof value.match === "function"
	);
}

function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "an array with non-string entries";
	return `a value of type ${typeof value}`;
}

function unreachable(payload: never): never {
	throw new MatcherError(`unknown payload: ${JSON.stringify(payload)}`);
}
