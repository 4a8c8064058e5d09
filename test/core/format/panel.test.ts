// CHANGE: Unit tests for boxed panels and centring

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { center, centerBlock, renderPanel } from "../../../src/core/format/panel.js";

describe("renderPanel", () => {
	it("fits the box to its content", () => {
		expect(renderPanel(["hi"])).toEqual(["╭────╮", "│ hi │", "╰────╯"]);
	});

	it("pads shorter lines to the widest one", () => {
		expect(renderPanel(["a", "abc"])).toEqual([
			"╭─────╮",
			"│ a   │",
			"│ abc │",
			"╰─────╯",
		]);
	});

	it("keeps every line the same length", () => {
		fc.assert(
			fc.property(fc.array(fc.string({ maxLength: 30 }), { maxLength: 8 }), (lines) => {
				const rendered = renderPanel(lines);
				const width = rendered[0]?.length ?? 0;
				return rendered.every((line) => line.length === width);
			}),
		);
	});
});

describe("center", () => {
	it("puts the odd space on the right", () => {
		expect(center("ab", 5)).toBe(" ab  ");
		expect(center("7", 3)).toBe(" 7 ");
	});

	it("truncates text wider than the field", () => {
		expect(center("abcdef", 3)).toBe("abc");
	});

	it("always returns exactly the requested width", () => {
		fc.assert(
			fc.property(fc.string({ maxLength: 20 }), fc.nat(40), (text, width) =>
				center(text, width).length === width,
			),
		);
	});
});

describe("centerBlock", () => {
	it("centres lines within the block width", () => {
		expect(centerBlock(["ab", "abcd"], 6)).toEqual(["  ab  ", " abcd "]);
	});

	it("never truncates a line wider than the block", () => {
		expect(centerBlock(["abcdefgh"], 4)).toEqual(["abcdefgh"]);
	});
});
