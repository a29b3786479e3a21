/**
 * ReDoS comparison between the two regex engines.
 *
 * The native engine backtracks, so `(a+)+$` against `"a" * N + "X"` takes
 * O(2^N). RE2 stays linear.
 *
 * SAFETY: capped at N=20. N=25 can take seconds on the native engine and
 * N=30 may hang indefinitely.
 *
 * Run: npx tsx bench/redos.bench.ts
 */

import { bench, run, summary } from "mitata";

import { fromRegex, nativeEngine, re2Engine } from "../src/index.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

const REDOS_PATTERN = String.raw`(a+)+$`;
const SAFE_PATTERN = String.raw`^a+X$`;

function pathologicalInput(n: number): string {
	return `${"a".repeat(n)}X`;
}

// ── ReDoS pattern, both engines ──────────────────────────────────────────────

summary(() => {
	for (const n of [5, 10, 15, 20]) {
		const re2 = fromRegex(REDOS_PATTERN, re2Engine);
		const native = fromRegex(REDOS_PATTERN, nativeEngine);
		const value = pathologicalInput(n);
		bench(`redos_re2_n${n}`, () => re2.match(value));
		bench(`redos_native_n${n}`, () => native.match(value));
	}
});

// ── Safe regex for comparison ────────────────────────────────────────────────

summary(() => {
	for (const n of [10, 20]) {
		const m = fromRegex(SAFE_PATTERN);
		const value = pathologicalInput(n);
		bench(`safe_regex_n${n}`, () => m.match(value));
	}
});

await run();
