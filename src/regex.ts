import { MatcherError, StringMatcher } from "./matcher.ts";
import { re2Engine } from "./re2.ts";
import type { MatchStrategy } from "./types.ts";

/**
 * A pattern compiled by some regex engine. `search` finds the pattern anywhere
 * in the input; anchoring is up to the pattern itself.
 */
export interface CompiledPattern {
	readonly source: string;
	search(input: string): boolean;
}

/**
 * Pluggable regex capability. `compile` throws on a pattern or flag the
 * engine rejects; Regex turns that into an InvalidPatternError.
 *
 * `flags` uses the RegExp letters (`i`, `m`, `s`, `u`). The stateful `g` and
 * `y` never reach an engine.
 */
export interface RegexEngine {
	readonly name: string;
	compile(pattern: string, flags?: string): CompiledPattern;
}

/** A regex pattern the engine refused to compile. The engine's error is the `cause`. */
export class InvalidPatternError extends MatcherError {
	readonly pattern: string;
	readonly engine: string;

	constructor(pattern: string, engine: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`invalid regex pattern "${pattern}" (${engine}): ${reason}`, { cause });
		this.name = "InvalidPatternError";
		this.pattern = pattern;
		this.engine = engine;
	}
}

/**
 * Engine backed by the JavaScript RegExp. Backtracking, so patterns like
 * `(a+)+$` can take exponential time on hostile input; prefer the RE2 engine
 * for patterns you do not control.
 */
export const nativeEngine: RegexEngine = {
	name: "native",
	compile(pattern: string, flags = ""): CompiledPattern {
		const re = new RegExp(pattern, flags);
		return {
			source: pattern,
			search: (input: string) => re.test(input),
		};
	},
};

const ENGINES: ReadonlyMap<string, RegexEngine> = new Map([
	[re2Engine.name, re2Engine],
	[nativeEngine.name, nativeEngine],
]);

/** Look up a shipped engine by name, as written in a regex config. */
export function regexEngine(name: string): RegexEngine {
	const engine = ENGINES.get(name);
	if (engine === undefined) {
		const known = [...ENGINES.keys()].sort().join(", ");
		throw new MatcherError(`unknown regex engine "${name}" (available: ${known})`);
	}
	return engine;
}

/**
 * Regular expression payload with search semantics.
 *
 * Pattern text and RegExp objects are compiled by `engine`, RE2 unless told
 * otherwise; a RegExp contributes its source and flags, not its own compiled
 * form. A pattern some other engine already compiled is taken as is and takes
 * no engine. Compilation happens here, so a bad pattern fails construction
 * instead of the first match.
 */
export class Regex implements MatchStrategy {
	readonly kind = "regex";
	readonly compiled: CompiledPattern;
	/** Flags without `g` and `y`. */
	readonly flags: string;
	/** Name of the engine that compiled the pattern, `null` for a precompiled one. */
	readonly engine: string | null;

	constructor(pattern: string, engine?: RegexEngine, flags?: string);
	constructor(pattern: RegExp, engine?: RegexEngine);
	constructor(pattern: CompiledPattern);
	constructor(
		pattern: string | RegExp | CompiledPattern,
		engine: RegexEngine = re2Engine,
		flags = "",
	) {
		if (pattern instanceof RegExp) {
			this.flags = statelessFlags(pattern.flags);
			this.compiled = compileWith(engine, pattern.source, this.flags);
			this.engine = engine.name;
		} else if (typeof pattern === "string") {
			this.flags = statelessFlags(flags);
			this.compiled = compileWith(engine, pattern, this.flags);
			this.engine = engine.name;
		} else {
			this.flags = "";
			this.compiled = pattern;
			this.engine = null;
		}
	}

	get pattern(): string {
		return this.compiled.source;
	}

	match(input: string): boolean {
		return this.compiled.search(input);
	}

	/** The pattern is left out on purpose; read `pattern` if you need it. */
	describe(): string {
		return "regex";
	}
}

/**
 * Create a StringMatcher holding a Regex payload. Throws InvalidPatternError,
 * so no matcher exists for a pattern the engine rejects.
 */
export function fromRegex(pattern: string, engine?: RegexEngine, flags?: string): StringMatcher;
export function fromRegex(pattern: RegExp, engine?: RegexEngine): StringMatcher;
export function fromRegex(pattern: CompiledPattern): StringMatcher;
export function fromRegex(
	pattern: string | RegExp | CompiledPattern,
	engine?: RegexEngine,
	flags?: string,
): StringMatcher {
	if (pattern instanceof RegExp) return new StringMatcher(new Regex(pattern, engine));
	if (typeof pattern === "string") return new StringMatcher(new Regex(pattern, engine, flags));
	return new StringMatcher(new Regex(pattern));
}

// `g` and `y` make RegExp.test() stateful through lastIndex.
function statelessFlags(flags: string): string {
	return flags.replace(/[gy]/g, "");
}

function compileWith(engine: RegexEngine, pattern: string, flags: string): CompiledPattern {
	try {
		return engine.compile(pattern, flags);
	} catch (e) {
		throw new InvalidPatternError(pattern, engine.name, e);
	}
}
