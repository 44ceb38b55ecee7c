import { describe, it, expect } from "vitest";
import { maxLineWidth, splitLines, wrapText } from "../lib/wrap.js";

describe("wrap", () => {
	describe("wrapText", () => {
		it("returns a single empty line for empty input", () => {
			expect(wrapText("", 5)).toEqual([""]);
		});

		it("returns a single empty line for whitespace wider than the limit", () => {
			expect(wrapText("   ", 1)).toEqual([""]);
		});

		it("keeps text that already fits untouched", () => {
			expect(wrapText("hello world", 20)).toEqual(["hello world"]);
			expect(wrapText("  Some Data  ", 20)).toEqual(["  Some Data  "]);
		});

		it("fills lines greedily", () => {
			expect(wrapText("the quick brown fox", 10)).toEqual(["the quick", "brown fox"]);
		});

		it("treats newlines as whitespace", () => {
			expect(wrapText("one\ntwo", 10)).toEqual(["one two"]);
		});

		it("hard-breaks tokens wider than the limit", () => {
			expect(wrapText("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
		});

		it("continues filling after a hard-broken token", () => {
			expect(wrapText("ab abcdefghij cd", 4)).toEqual(["ab", "abcd", "efgh", "ij", "cd"]);
			expect(wrapText("abcdefg h", 5)).toEqual(["abcde", "fg h"]);
		});

		it("appends the continuation marker to broken chunks", () => {
			expect(wrapText("abcdefghij", 4, { marker: "-" })).toEqual(["abc-", "def-", "ghij"]);
		});

		it("drops a marker that leaves no room for text", () => {
			expect(wrapText("abc", 1, { marker: "-" })).toEqual(["a", "b", "c"]);
		});

		it("breaks wide characters by display width", () => {
			expect(wrapText("中中中", 4)).toEqual(["中中", "中"]);
			expect(wrapText("中a", 1)).toEqual(["中", "a"]);
		});

		it("keeps escape sequences attached to their tokens", () => {
			expect(wrapText("\u001b[31mred apple\u001b[0m", 5)).toEqual(["\u001b[31mred", "apple\u001b[0m"]);
		});

		it("treats limits below one as one", () => {
			expect(wrapText("ab", 0)).toEqual(["a", "b"]);
		});
	});

	describe("splitLines", () => {
		it("splits on LF and CRLF only", () => {
			expect(splitLines("a\r\nb\nc d")).toEqual(["a", "b", "c d"]);
		});

		it("returns one line for text without breaks", () => {
			expect(splitLines("")).toEqual([""]);
		});
	});

	describe("maxLineWidth", () => {
		it("returns the widest line", () => {
			expect(maxLineWidth(["ab", "\u001b[1mabcd\u001b[0m", "中"])).toBe(4);
			expect(maxLineWidth([])).toBe(0);
		});
	});
});
