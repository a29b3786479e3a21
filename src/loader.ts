/**
 * Turns parsed config into runtime matchers, enforcing size limits.
 *
 * The loader never imports a regex engine itself. Regex configs are compiled
 * through `LoadOptions.compileRegex`. The full entry point supplies one that
 * honours the config's flags and engine name; the lite entry point supplies
 * none and rejects them.
 */

import {
	AlwaysConfig,
	ListConfig,
	RegexConfig,
	type StringMatcherConfig,
	TextMatchConfig,
	parseStringMatcherConfig,
} from "./config.ts";
import { MatcherError, StringMatcher } from "./matcher.ts";
import type { Regex } from "./regex.ts";
import { Equal, List, Prefix, Substring } from "./string-matchers.ts";

// =====================================================================
// Limits
// =====================================================================

export const MAX_PATTERN_LENGTH = 8192;
export const MAX_REGEX_PATTERN_LENGTH = 4096;
export const MAX_LIST_ENTRIES = 4096;

// =====================================================================
// Error types
// =====================================================================

/** A config payload was semantically invalid. */
export class InvalidConfigError extends MatcherError {
	readonly source: string;

	constructor(source: string, options?: ErrorOptions) {
		super(`invalid config: ${source}`, options);
		this.name = "InvalidConfigError";
		this.source = source;
	}
}

/** A match value or pattern exceeds the length limit. */
export class PatternTooLongError extends MatcherError {
	readonly length: number;
	readonly max: number;

	constructor(length: number, max: number) {
		super(`pattern length ${length} exceeds maximum ${max}`);
		this.name = "PatternTooLongError";
		this.length = length;
		this.max = max;
	}
}

/** A list config has more entries than allowed. */
export class TooManyListEntriesError extends MatcherError {
	readonly count: number;
	readonly max: number;

	constructor(count: number, max: number) {
		super(`too many list entries: ${count} exceeds maximum ${max}`);
		this.name = "TooManyListEntriesError";
		this.count = count;
		this.max = max;
	}
}

// =====================================================================
// Loading
// =====================================================================

export interface LoadOptions {
	/** Compiles a regex config. Without it, regex configs are rejected. */
	readonly compileRegex?: (config: RegexConfig) => Regex;
}

/** Load a StringMatcher from a parsed config. */
export function loadStringMatcher(
	config: StringMatcherConfig,
	options: LoadOptions = {},
): StringMatcher {
	if (config instanceof AlwaysConfig) {
		return StringMatcher.fromBool(config.result);
	}
	if (config instanceof TextMatchConfig) {
		checkPatternLength(config.value, MAX_PATTERN_LENGTH);
		switch (config.variant) {
			case "equal":
				return new StringMatcher(new Equal(config.value));
			case "prefix":
				return new StringMatcher(new Prefix(config.value));
			case "substring":
				return new StringMatcher(new Substring(config.value));
		}
	}
	if (config instanceof RegexConfig) {
		return new StringMatcher(compileRegexConfig(config, options));
	}
	if (config instanceof ListConfig) {
		if (config.values.length > MAX_LIST_ENTRIES) {
			throw new TooManyListEntriesError(config.values.length, MAX_LIST_ENTRIES);
		}
		for (const value of config.values) {
			checkPatternLength(value, MAX_PATTERN_LENGTH);
		}
		return new StringMatcher(new List(config.values));
	}
	throw new InvalidConfigError("unknown matcher config type");
}

/** parseStringMatcherConfig() followed by loadStringMatcher(). */
export function loadStringMatcherFromData(data: unknown, options: LoadOptions = {}): StringMatcher {
	return loadStringMatcher(parseStringMatcherConfig(data), options);
}

function compileRegexConfig(config: RegexConfig, options: LoadOptions): Regex {
	checkPatternLength(config.pattern, MAX_REGEX_PATTERN_LENGTH);
	if (options.compileRegex === undefined) {
		throw new InvalidConfigError("regex matchers are not available in this build");
	}
	try {
		return options.compileRegex(config);
	} catch (e) {
		throw new InvalidConfigError(
			`invalid regex pattern: ${e instanceof Error ? e.message : String(e)}`,
			{ cause: e },
		);
	}
}

function checkPatternLength(value: string, max: number): void {
	if (value.length > max) {
		throw new PatternTooLongError(value.length, max);
	}
}
