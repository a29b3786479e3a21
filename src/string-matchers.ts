import type { MatchStrategy } from "./types.ts";

/** Never matches. */
export class AlwaysFalse implements MatchStrategy {
	readonly kind = "alwaysFalse";

	match(_input: string): boolean {
		return false;
	}

	describe(): string {
		return "always_false";
	}
}

/** Always matches. */
export class AlwaysTrue implements MatchStrategy {
	readonly kind = "alwaysTrue";

	match(_input: string): boolean {
		return true;
	}

	describe(): string {
		return "always_true";
	}
}

/** Exact string equality. Case-sensitive, code unit for code unit. */
export class Equal implements MatchStrategy {
	readonly kind = "equal";

	constructor(readonly value: string) {}

	match(input: string): boolean {
		return input === this.value;
	}

	describe(): string {
		return `equal[${this.value}]`;
	}
}

/** String prefix match. The empty prefix matches everything. */
export class Prefix implements MatchStrategy {
	readonly kind = "prefix";

	constructor(readonly value: string) {}

	match(input: string): boolean {
		return input.startsWith(this.value);
	}

	describe(): string {
		return `prefix[${this.value}]`;
	}
}

/** Substring containment. The empty substring matches everything. */
export class Substring implements MatchStrategy {
	readonly kind = "substring";

	constructor(readonly value: string) {}

	match(input: string): boolean {
		return input.includes(this.value);
	}

	describe(): string {
		return `substring[${this.value}]`;
	}
}

/**
 * Matches if the input equals any of the stored strings.
 *
 * Duplicates are kept and order is preserved for describe(). `add()` is the
 * only mutating operation on any payload: it appends in place and returns the
 * same list so calls can be chained. Serialize access yourself if a list is
 * shared while it is still being built.
 */
export class List implements MatchStrategy {
	readonly kind = "list";
	private readonly entries: string[];

	constructor(values: Iterable<string> = []) {
		this.entries = [...values];
	}

	get values(): readonly string[] {
		return this.entries;
	}

	add(value: string): this {
		this.entries.push(value);
		return this;
	}

	match(input: string): boolean {
		return this.entries.includes(input);
	}

	describe(): string {
		return `list[${this.entries.map((v) => `[${v}]`).join("")}]`;
	}
}
