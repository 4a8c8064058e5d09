// CHANGE: Unit tests for ASCII diagram rendering

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { FieldSpec } from "../../../src/core/diagram/field.js";
import { type BitLayout, buildLayout } from "../../../src/core/diagram/layout.js";
import {
	renderDiagram,
	sectionsOf,
	segmentsOf,
} from "../../../src/core/diagram/render.js";

function layoutOf(width: number, fields: readonly FieldSpec[]): BitLayout {
	const built = buildLayout(width, fields, undefined);
	if (Either.isLeft(built)) throw new Error(built.left.detail);
	return built.right;
}

const opAndRd = layoutOf(8, [
	{ name: "op", hi: 7, lo: 6, value: 2n },
	{ name: "Rd", hi: 2, lo: 0, value: undefined },
]);

describe("sectionsOf", () => {
	it("splits from the most significant bit down", () => {
		expect(sectionsOf(32, 8)).toEqual([
			[31, 24],
			[23, 16],
			[15, 8],
			[7, 0],
		]);
	});

	it("clamps the section to the diagram width", () => {
		expect(sectionsOf(8, 32)).toEqual([[7, 0]]);
	});
});

describe("segmentsOf", () => {
	it("merges uncovered bits into one unnamed segment", () => {
		expect(segmentsOf(opAndRd, 7, 0)).toEqual([
			{ label: "op", hi: 7, lo: 6 },
			{ label: "", hi: 5, lo: 3 },
			{ label: "Rd", hi: 2, lo: 0 },
		]);
	});

	it("splits a field that straddles two sections", () => {
		const layout = layoutOf(8, [{ name: "imm", hi: 5, lo: 2, value: undefined }]);
		expect(segmentsOf(layout, 7, 4)).toEqual([
			{ label: "", hi: 7, lo: 6 },
			{ label: "imm", hi: 5, lo: 4 },
		]);
		expect(segmentsOf(layout, 3, 0)).toEqual([
			{ label: "imm", hi: 3, lo: 2 },
			{ label: "", hi: 1, lo: 0 },
		]);
	});
});

describe("renderDiagram", () => {
	it("draws names, known values and borders", () => {
		expect(renderDiagram(opAndRd, 8)).toBe(
			[
			"  7   6   5   4   3   2   1   0",
			"+-------+-----------+-----------+",
			"|  op   |           |    Rd     |",
			"| 1   0 |           |           |",
			"+-------+-----------+-----------+",
			].join("\n"),
		);
	});

	it("omits the value row of sections without known bits", () => {
		expect(renderDiagram(opAndRd, 4)).toBe(
			[
			"  7   6   5   4",
			"+-------+-------+",
			"|  op   |       |",
			"| 1   0 |       |",
			"+-------+-------+",
			"",
			"  3   2   1   0",
			"+---+-----------+",
			"|   |    Rd     |",
			"+---+-----------+",
			].join("\n"),
		);
	});

	it("prints the title above the first section", () => {
		const layout = layoutOf(32, [
			{ name: undefined, hi: 31, lo: 0, value: 0xd503201fn },
		]);
		expect(renderDiagram(layout, 16, "NOP").split("\n")).toEqual([
			"NOP",
			"",
			" 31  30  29  28  27  26  25  24  23  22  21  20  19  18  17  16",
			"+---------------------------------------------------------------+",
			"|                                                               |",
			"| 1   1   0   1   0   1   0   1   0   0   0   0   0   0   1   1 |",
			"+---------------------------------------------------------------+",
			"",
			" 15  14  13  12  11  10   9   8   7   6   5   4   3   2   1   0",
			"+---------------------------------------------------------------+",
			"|                                                               |",
			"| 0   0   1   0   0   0   0   0   0   0   0   1   1   1   1   1 |",
			"+---------------------------------------------------------------+",
		]);
	});
});
