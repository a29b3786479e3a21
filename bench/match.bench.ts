/**
 * Match benchmarks: the hot path of every payload, hit and miss, plus list
 * scaling.
 *
 * Run: npm run bench
 */

import { bench, run, summary } from "mitata";

import { StringMatcher, fromRegex, nativeEngine } from "../src/index.ts";

// ── Core scenarios ───────────────────────────────────────────────────────────

summary(() => {
	const m = StringMatcher.fromEqual("highway");
	bench("equal_hit", () => m.match("highway"));
	bench("equal_miss", () => m.match("footway"));
});

summary(() => {
	const m = StringMatcher.fromPrefix("foot");
	bench("prefix_hit", () => m.match("footway"));
	bench("prefix_miss", () => m.match("sidewalk"));
});

summary(() => {
	const m = StringMatcher.fromSubstring("way");
	bench("substring_hit", () => m.match("motorway_link"));
	bench("substring_miss", () => m.match("residential"));
});

summary(() => {
	const re2 = fromRegex(String.raw`^(primary|secondary)(_link)?$`);
	const native = fromRegex(/^(primary|secondary)(_link)?$/, nativeEngine);
	bench("regex_re2_hit", () => re2.match("secondary_link"));
	bench("regex_native_hit", () => native.match("secondary_link"));
});

// ── List scaling ─────────────────────────────────────────────────────────────

summary(() => {
	for (const n of [4, 32, 256]) {
		const values = Array.from({ length: n }, (_, i) => `value_${i}`);
		const m = StringMatcher.fromList(values);
		const last = `value_${n - 1}`;
		bench(`list_${n}_last_hit`, () => m.match(last));
		bench(`list_${n}_miss`, () => m.match("absent"));
	}
});

await run();
