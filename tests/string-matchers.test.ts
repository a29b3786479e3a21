import { describe, expect, it } from "vitest";

import {
	AlwaysFalse,
	AlwaysTrue,
	Equal,
	List,
	Prefix,
	Substring,
} from "../src/string-matchers.ts";

describe("AlwaysFalse", () => {
	it("never matches", () => {
		const m = new AlwaysFalse();
		expect(m.match("")).toBe(false);
		expect(m.match("anything")).toBe(false);
	});

	it("describes itself", () => {
		expect(new AlwaysFalse().describe()).toBe("always_false");
	});
});

describe("AlwaysTrue", () => {
	it("always matches", () => {
		const m = new AlwaysTrue();
		expect(m.match("")).toBe(true);
		expect(m.match("anything")).toBe(true);
	});

	it("describes itself", () => {
		expect(new AlwaysTrue().describe()).toBe("always_true");
	});
});

describe("Equal", () => {
	it("matches exact string", () => {
		expect(new Equal("highway").match("highway")).toBe(true);
	});

	it("is case-sensitive", () => {
		expect(new Equal("highway").match("Highway")).toBe(false);
	});

	it("rejects partial match", () => {
		expect(new Equal("high").match("highway")).toBe(false);
		expect(new Equal("highway").match("high")).toBe(false);
	});

	it("handles empty string", () => {
		const m = new Equal("");
		expect(m.match("")).toBe(true);
		expect(m.match("a")).toBe(false);
	});

	it("compares non-ASCII text code unit for code unit", () => {
		expect(new Equal("straße").match("straße")).toBe(true);
		expect(new Equal("straße").match("strasse")).toBe(false);
	});

	it("describes itself with its value", () => {
		expect(new Equal("foo").describe()).toBe("equal[foo]");
	});
});

describe("Prefix", () => {
	it("matches prefix", () => {
		expect(new Prefix("foot").match("footway")).toBe(true);
	});

	it("exact is prefix", () => {
		expect(new Prefix("foot").match("foot")).toBe(true);
	});

	it("rejects non-match", () => {
		expect(new Prefix("foot").match("sidewalk")).toBe(false);
	});

	it("rejects input shorter than the prefix", () => {
		expect(new Prefix("footway").match("foot")).toBe(false);
	});

	it("empty prefix matches anything", () => {
		expect(new Prefix("").match("anything")).toBe(true);
		expect(new Prefix("").match("")).toBe(true);
	});

	it("describes itself with its value", () => {
		expect(new Prefix("foot").describe()).toBe("prefix[foot]");
	});
});

describe("Substring", () => {
	it("matches substring", () => {
		expect(new Substring("way").match("footway")).toBe(true);
		expect(new Substring("otw").match("footway")).toBe(true);
	});

	it("rejects non-match", () => {
		expect(new Substring("xyz").match("footway")).toBe(false);
	});

	it("empty substring matches anything", () => {
		expect(new Substring("").match("anything")).toBe(true);
		expect(new Substring("").match("")).toBe(true);
	});

	it("describes itself with its value", () => {
		expect(new Substring("way").describe()).toBe("substring[way]");
	});
});

describe("List", () => {
	it("matches any member", () => {
		const m = new List(["primary", "secondary", "tertiary"]);
		expect(m.match("secondary")).toBe(true);
		expect(m.match("residential")).toBe(false);
	});

	it("empty list matches nothing", () => {
		expect(new List().match("")).toBe(false);
	});

	it("compares members by exact equality", () => {
		expect(new List(["primary"]).match("primary_link")).toBe(false);
	});

	it("add() extends membership and chains", () => {
		const m = new List(["a"]);
		expect(m.match("z")).toBe(false);
		const returned = m.add("y").add("z");
		expect(returned).toBe(m);
		expect(m.match("z")).toBe(true);
		expect(m.values).toEqual(["a", "y", "z"]);
	});

	it("copies the input so later changes to it do not leak in", () => {
		const values = ["a"];
		const m = new List(values);
		values.push("b");
		expect(m.match("b")).toBe(false);
	});

	it("keeps duplicates and order in describe()", () => {
		expect(new List(["a", "b"]).describe()).toBe("list[[a][b]]");
		expect(new List(["b", "a", "b"]).describe()).toBe("list[[b][a][b]]");
		expect(new List().describe()).toBe("list[]");
	});
});
