import { RE2JS } from "re2js";

import type { CompiledPattern, RegexEngine } from "./regex.ts";

// `u` is accepted and ignored: RE2 always matches on code points.
const RE2_FLAGS: Readonly<Record<string, number>> = {
	i: RE2JS.CASE_INSENSITIVE,
	m: RE2JS.MULTILINE,
	s: RE2JS.DOTALL,
	u: 0,
};

/**
 * Regex engine on RE2 for guaranteed linear-time matching.
 * Uses RE2JS.compile().matcher().find() which searches anywhere in the string.
 *
 * RE2 does not support backreferences or lookahead/lookbehind because they
 * require backtracking. Patterns using them are rejected at compile time.
 */
export const re2Engine: RegexEngine = {
	name: "re2",
	compile(pattern: string, flags = ""): CompiledPattern {
		const compiled = RE2JS.compile(pattern, re2Flags(flags));
		return {
			source: pattern,
			search: (input: string) => compiled.matcher(input).find(),
		};
	},
};

function re2Flags(flags: string): number {
	let bits = 0;
	for (const flag of flags) {
		const bit = RE2_FLAGS[flag];
		if (bit === undefined) {
			throw new Error(`unsupported flag "${flag}"`);
		}
		bits |= bit;
	}
	return bits;
}
