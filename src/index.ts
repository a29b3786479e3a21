import type { StringMatcherConfig } from "./config.ts";
import {
	type LoadOptions,
	loadStringMatcher as loadWithOptions,
	loadStringMatcherFromData as loadDataWithOptions,
} from "./loader.ts";
import type { StringMatcher } from "./matcher.ts";
import { Regex, regexEngine } from "./regex.ts";

// Everything the lite build has, with the loaders replaced below.
export * from "./lite.ts";

// Regex capability
export { InvalidPatternError, Regex, fromRegex, nativeEngine, regexEngine } from "./regex.ts";
export type { CompiledPattern, RegexEngine } from "./regex.ts";
export { re2Engine } from "./re2.ts";

const defaultLoadOptions: LoadOptions = {
	compileRegex: (config) =>
		new Regex(config.pattern, regexEngine(config.engine), config.flags),
};

/** Load a StringMatcher from a parsed config. Regex configs compile with the engine they name. */
export function loadStringMatcher(
	config: StringMatcherConfig,
	options: LoadOptions = {},
): StringMatcher {
	return loadWithOptions(config, { ...defaultLoadOptions, ...options });
}

/** parseStringMatcherConfig() followed by loadStringMatcher(). */
export function loadStringMatcherFromData(data: unknown, options: LoadOptions = {}): StringMatcher {
	return loadDataWithOptions(data, { ...defaultLoadOptions, ...options });
}
