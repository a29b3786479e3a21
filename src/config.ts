/**
 * Config types for declarative matcher construction.
 *
 * The same JSON/YAML shape is accepted everywhere a matcher can be written
 * down (files, fixtures, API payloads). Construction path:
 *   dict -> parseStringMatcherConfig() -> StringMatcherConfig -> loadStringMatcher() -> StringMatcher
 *
 * | Config                 | Payload                |
 * |------------------------|------------------------|
 * | { always: boolean }    | AlwaysTrue/AlwaysFalse |
 * | { equal: string }      | Equal                  |
 * | { prefix: string }     | Prefix                 |
 * | { substring: string }  | Substring              |
 * | { regex: string }      | Regex (RE2, no flags)  |
 * | { regex: { pattern, flags?, engine? } } | Regex  |
 * | { list: string[] }     | List                   |
 */

import { MatcherError, type StringMatcher, visitPayload } from "./matcher.ts";

// =====================================================================
// Config types
// =====================================================================

const DEFAULT_REGEX_ENGINE = "re2";

/** always_true or always_false. */
export class AlwaysConfig {
	constructor(readonly result: boolean) {}
}

export type TextVariant = "equal" | "prefix" | "substring";

/** Equal, Prefix or Substring over a single string. */
export class TextMatchConfig {
	constructor(
		readonly variant: TextVariant,
		readonly value: string,
	) {}
}

/**
 * Regex pattern text, compiled when the config is loaded. `flags` uses the
 * RegExp letters; `engine` names a shipped engine ("re2" or "native").
 */
export class RegexConfig {
	constructor(
		readonly pattern: string,
		readonly flags: string = "",
		readonly engine: string = DEFAULT_REGEX_ENGINE,
	) {}
}

/** Membership in a list of strings. */
export class ListConfig {
	constructor(readonly values: readonly string[]) {}
}

export type StringMatcherConfig = AlwaysConfig | TextMatchConfig | RegexConfig | ListConfig;

// =====================================================================
// Parsing (unknown -> config types)
// =====================================================================

const VARIANT_KEYS = ["always", "equal", "list", "prefix", "regex", "substring"] as const;

/** Error parsing a config dict into config types. */
export class ConfigParseError extends MatcherError {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

/**
 * Parse an unknown value into a StringMatcherConfig.
 *
 * Only the structure is checked here. Limits and regex compilation are
 * applied by loadStringMatcher().
 */
export function parseStringMatcherConfig(data: unknown): StringMatcherConfig {
	if (!isRecord(data)) {
		throw new ConfigParseError(`matcher config must be an object, got ${typeName(data)}`);
	}

	const keys = Object.keys(data).sort();
	const [key] = keys;
	if (keys.length !== 1 || key === undefined) {
		throw new ConfigParseError(
			`matcher config must contain exactly one of [${VARIANT_KEYS.join(", ")}], got keys: [${keys.join(", ")}]`,
		);
	}
	const value = data[key];

	if (key === "always") {
		if (typeof value !== "boolean") {
			throw new ConfigParseError(`'always' value must be a boolean, got ${typeName(value)}`);
		}
		return new AlwaysConfig(value);
	}
	if (isTextVariant(key)) return new TextMatchConfig(key, expectString(key, value));
	if (key === "regex") return parseRegexConfig(value);
	if (key === "list") return new ListConfig(expectStringList(value));

	throw new ConfigParseError(
		`unknown matcher variant "${key}", expected one of [${VARIANT_KEYS.join(", ")}]`,
	);
}

const REGEX_KEYS = ["engine", "flags", "pattern"];

function parseRegexConfig(value: unknown): RegexConfig {
	if (typeof value === "string") return new RegexConfig(value);
	if (!isRecord(value)) {
		throw new ConfigParseError(
			`'regex' value must be a string or an object, got ${typeName(value)}`,
		);
	}
	const unknownKeys = Object.keys(value).filter((k) => !REGEX_KEYS.includes(k));
	if (unknownKeys.length > 0) {
		throw new ConfigParseError(
			`'regex' object has unknown keys [${unknownKeys.sort().join(", ")}], expected [${REGEX_KEYS.join(", ")}]`,
		);
	}
	const pattern = expectString("regex.pattern", value.pattern);
	const flags = value.flags === undefined ? "" : expectString("regex.flags", value.flags);
	const engine =
		value.engine === undefined ? DEFAULT_REGEX_ENGINE : expectString("regex.engine", value.engine);
	return new RegexConfig(pattern, flags, engine);
}

function expectString(key: string, value: unknown): string {
	if (typeof value !== "string") {
		throw new ConfigParseError(`'${key}' value must be a string, got ${typeName(value)}`);
	}
	return value;
}

function expectStringList(value: unknown): string[] {
	if (!Array.isArray(value)) {
		throw new ConfigParseError(`'list' value must be an array, got ${typeName(value)}`);
	}
	return value.map((entry, i) => {
		if (typeof entry !== "string") {
			throw new ConfigParseError(`'list' entry ${i} must be a string, got ${typeName(entry)}`);
		}
		return entry;
	});
}

function isTextVariant(key: string): key is TextVariant {
	return key === "equal" || key === "prefix" || key === "substring";
}

function isRecord(data: unknown): data is Record<string, unknown> {
	return typeof data === "object" && data !== null && !Array.isArray(data);
}

function typeName(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

// =====================================================================
// Serialization (StringMatcher -> config types)
// =====================================================================

/**
 * The config that loads back into an equivalent matcher. Regex configs keep
 * the pattern, flags and engine name.
 *
 * Throws MatcherError for a Regex built from a CompiledPattern: nothing
 * records how it was compiled, so there is no config for it.
 */
export function toStringMatcherConfig(matcher: StringMatcher): StringMatcherConfig {
	return visitPayload<StringMatcherConfig>(matcher.payload, {
		alwaysFalse: () => new AlwaysConfig(false),
		alwaysTrue: () => new AlwaysConfig(true),
		equal: (p) => new TextMatchConfig("equal", p.value),
		prefix: (p) => new TextMatchConfig("prefix", p.value),
		substring: (p) => new TextMatchConfig("substring", p.value),
		regex: (p) => {
			if (p.engine === null) {
				throw new MatcherError(
					`regex "${p.pattern}" was compiled outside any engine and has no config form`,
				);
			}
			return new RegexConfig(p.pattern, p.flags, p.engine);
		},
		list: (p) => new ListConfig([...p.values]),
	});
}

/** Plain JSON form of a config, the inverse of parseStringMatcherConfig(). */
export function configToJson(config: StringMatcherConfig): Record<string, unknown> {
	if (config instanceof AlwaysConfig) return { always: config.result };
	if (config instanceof TextMatchConfig) return { [config.variant]: config.value };
	if (config instanceof RegexConfig) {
		if (config.flags === "" && config.engine === DEFAULT_REGEX_ENGINE) {
			return { regex: config.pattern };
		}
		const regex: Record<string, string> = { pattern: config.pattern };
		if (config.flags !== "") regex.flags = config.flags;
		if (config.engine !== DEFAULT_REGEX_ENGINE) regex.engine = config.engine;
		return { regex };
	}
	return { list: [...config.values] };
}
