import { describe, expect, it } from "vitest";

import { joinUrl, percentDecode, splitUrl } from "../src/url";

describe("splitUrl", () => {
	it("splits every component", () => {
		expect(splitUrl("https://user@example.com:8080/a/b;v=1?x=1&y=2#frag")).toEqual({
			scheme: "https",
			authority: "user@example.com:8080",
			path: "/a/b",
			params: "v=1",
			query: "x=1&y=2",
			fragment: "frag",
		});
	});

	it("only takes params from the last path segment", () => {
		const parts = splitUrl("https://example.com/a;b/c");
		expect(parts.path).toBe("/a;b/c");
		expect(parts.params).toBeUndefined();
	});

	it("lower-cases the scheme", () => {
		expect(joinUrl(splitUrl("HTTPS://Example.com/A?Q=1"))).toBe("https://Example.com/A?Q=1");
	});

	it("treats a string without a scheme as a path", () => {
		expect(splitUrl("not-a-valid-url")).toEqual({ path: "not-a-valid-url", query: "", fragment: "" });
	});

	it("keeps a host without a path", () => {
		expect(splitUrl("https://example.com?a=1")).toMatchObject({ authority: "example.com", path: "", query: "a=1" });
	});
});

describe("joinUrl", () => {
	it.each([
		"https://example.com/a/b;v=1?x=1#frag",
		"https://example.com",
		"file:///tmp/x",
		"mailto:someone@example.com",
		"relative/path?q=1",
	])("reassembles %s", (url) => {
		expect(joinUrl(splitUrl(url))).toBe(url);
	});

	it("drops empty query and fragment separators", () => {
		expect(joinUrl(splitUrl("https://example.com/p?#"))).toBe("https://example.com/p");
	});
});

describe("percentDecode", () => {
	it("decodes escapes as UTF-8", () => {
		expect(percentDecode("https%3A%2F%2Fexample.com%2F%3Fa%3D1")).toBe("https://example.com/?a=1");
		expect(percentDecode("%E2%82%AC5")).toBe("€5");
	});

	it("leaves plus signs and malformed escapes alone", () => {
		expect(percentDecode("a+b")).toBe("a+b");
		expect(percentDecode("100%")).toBe("100%");
		expect(percentDecode("%zz%41")).toBe("%zzA");
	});

	it("replaces invalid byte sequences", () => {
		expect(percentDecode("%FFx")).toBe("\uFFFDx");
	});
});
