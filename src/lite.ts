// Lite build: the same API as the full entry point minus the regex capability.
// Nothing reachable from here loads a regex engine.

// Core types
export type { MatchStrategy, TextSink } from "./types.ts";

// Payloads
export { AlwaysFalse, AlwaysTrue, Equal, List, Prefix, Substring } from "./string-matchers.ts";

// Matcher
export { MatcherError, StringMatcher, visitPayload } from "./matcher.ts";
export type { MatcherLike, Payload, PayloadKind, PayloadVisitor } from "./matcher.ts";

// Config
export {
	AlwaysConfig,
	ConfigParseError,
	ListConfig,
	RegexConfig,
	TextMatchConfig,
	configToJson,
	parseStringMatcherConfig,
	toStringMatcherConfig,
} from "./config.ts";
export type { StringMatcherConfig, TextVariant } from "./config.ts";

// Loader
export {
	InvalidConfigError,
	MAX_LIST_ENTRIES,
	MAX_PATTERN_LENGTH,
	MAX_REGEX_PATTERN_LENGTH,
	PatternTooLongError,
	TooManyListEntriesError,
	loadStringMatcher,
	loadStringMatcherFromData,
} from "./loader.ts";
export type { LoadOptions } from "./loader.ts";
