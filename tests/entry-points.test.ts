/**
 * The full and lite entry points expose the same API apart from the regex
 * capability.
 */

import { describe, expect, it } from "vitest";

import * as full from "../src/index.ts";
import * as lite from "../src/lite.ts";

describe("full entry point", () => {
	it("exports the regex capability", () => {
		expect(typeof full.fromRegex).toBe("function");
		expect(typeof full.Regex).toBe("function");
		expect(full.re2Engine.name).toBe("re2");
		expect(full.nativeEngine.name).toBe("native");
	});

	it("loads regex configs with RE2 by default", () => {
		const m = full.loadStringMatcherFromData({ regex: "^res.*ial$" });
		expect(m.match("residential")).toBe(true);
		expect(() => full.loadStringMatcherFromData({ regex: "(a)\\1" })).toThrow(
			full.InvalidConfigError,
		);
	});

	it("lets the caller swap the regex compiler", () => {
		const m = full.loadStringMatcher(new full.RegexConfig("(a)\\1"), {
			compileRegex: (config) => new full.Regex(config.pattern, full.nativeEngine),
		});
		expect(m.match("aa")).toBe(true);
	});

	it("compiles with the engine and flags a regex config names", () => {
		const native = full.loadStringMatcherFromData({
			regex: { pattern: "(a)\\1", engine: "native" },
		});
		expect(native.match("xaax")).toBe(true);
		const folded = full.loadStringMatcherFromData({ regex: { pattern: "WAY", flags: "i" } });
		expect(folded.match("footway")).toBe(true);
	});

	it("rejects a regex config naming an unknown engine", () => {
		expect(() =>
			full.loadStringMatcherFromData({ regex: { pattern: "a", engine: "pcre" } }),
		).toThrow(
			'invalid config: invalid regex pattern: unknown regex engine "pcre" (available: native, re2)',
		);
	});
});

describe("lite entry point", () => {
	it("omits the regex capability", () => {
		expect("fromRegex" in lite).toBe(false);
		expect("Regex" in lite).toBe(false);
		expect("re2Engine" in lite).toBe(false);
		expect("nativeEngine" in lite).toBe(false);
	});

	it("rejects regex configs", () => {
		expect(() => lite.loadStringMatcherFromData({ regex: "a+" })).toThrow(
			"invalid config: regex matchers are not available in this build",
		);
	});

	it("shares everything else with the full entry point", () => {
		const liteNames = Object.keys(lite).sort();
		const fullNames = new Set(Object.keys(full));
		for (const name of liteNames) expect(fullNames.has(name)).toBe(true);
		expect(lite.StringMatcher).toBe(full.StringMatcher);
	});

	it("builds every non-regex matcher", () => {
		expect(lite.StringMatcher.from("highway").match("highway")).toBe(true);
		expect(lite.StringMatcher.of(new lite.Prefix("foot")).match("footway")).toBe(true);
		expect(lite.StringMatcher.from(["primary", "secondary"]).match("secondary")).toBe(true);
	});
});
