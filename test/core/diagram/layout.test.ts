// CHANGE: Unit tests for layout validation and bit resolution

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import type { FieldSpec } from "../../../src/core/diagram/field.js";
import { type BitLayout, buildLayout, fieldAt } from "../../../src/core/diagram/layout.js";

const field = (
	name: string | undefined,
	hi: number,
	lo: number,
	value?: bigint,
): FieldSpec => ({ name, hi, lo, value });

function layoutOf(
	width: number,
	fields: readonly FieldSpec[],
	overlay?: bigint,
): BitLayout {
	const built = buildLayout(width, fields, overlay);
	if (Either.isLeft(built)) throw new Error(built.left.detail);
	return built.right;
}

const errorOf = (
	width: number,
	fields: readonly FieldSpec[],
	overlay?: bigint,
): string =>
	Either.match(buildLayout(width, fields, overlay), {
		onLeft: (error) => error.detail,
		onRight: () => "<no error>",
	});

describe("buildLayout", () => {
	it("sorts fields and sets the bits of their values", () => {
		const layout = layoutOf(8, [field("Rd", 2, 0), field("op", 7, 6, 2n)]);
		expect(layout.fields.map((f) => f.name)).toEqual(["op", "Rd"]);
		expect(layout.bits).toEqual([
			undefined,
			undefined,
			undefined,
			undefined,
			undefined,
			undefined,
			0,
			1,
		]);
	});

	it("lets an overlay value set every bit", () => {
		const layout = layoutOf(8, [field("op", 7, 6, 2n)], 0xa5n);
		expect(layout.bits).toEqual([1, 0, 1, 0, 0, 1, 0, 1]);
	});

	it("rejects fields outside the width and overlapping fields", () => {
		expect(errorOf(8, [field("x", 8, 8)])).toBe("field 'x[8]' exceeds the 8-bit width");
		expect(errorOf(8, [field("b", 5, 0), field("a", 7, 4)])).toBe(
			"fields 'a[7:4]' and 'b[5:0]' overlap",
		);
	});

	it("rejects overlays that do not fit or disagree with a field", () => {
		expect(errorOf(8, [], 0x100n)).toBe("value 0x100 does not fit in 8 bits");
		expect(errorOf(8, [field("op", 7, 6, 2n)], 0n)).toBe(
			"value 0x0 conflicts with field 'op[7:6]'",
		);
	});

	it("reproduces any overlay from its bits", () => {
		fc.assert(
			fc.property(fc.bigInt({ min: 0n, max: 255n }), (value) => {
				const layout = layoutOf(8, [], value);
				const rebuilt = layout.bits.reduce<bigint>(
					(acc, bit, position) => (bit === 1 ? acc | (1n << BigInt(position)) : acc),
					0n,
				);
				return rebuilt === value;
			}),
		);
	});
});

describe("fieldAt", () => {
	it("finds the field covering a position", () => {
		const layout = layoutOf(8, [field("op", 7, 6), field("Rd", 2, 0)]);
		expect(fieldAt(layout, 6)?.name).toBe("op");
		expect(fieldAt(layout, 4)).toBeUndefined();
		expect(fieldAt(layout, 0)?.name).toBe("Rd");
	});
});
