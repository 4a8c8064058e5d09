// CHANGE: Validate fields against a fixed width and resolve every bit's known value
// PURITY: CORE
// EFFECT: Either<BitLayout, DiagramError>
// INVARIANT: Fields are disjoint, lie in [0, width) and agree with the overlay value
// COMPLEXITY: O(f log f + w) where f = |fields|, w = width

import { Either } from "effect";

import { DiagramError } from "../errors.js";
import { type FieldSpec, fieldWidth, fitsIn, formatField } from "./field.js";

export type BitValue = 0 | 1 | undefined;

export interface BitLayout {
	readonly width: number;
	/** Sorted from most to least significant. */
	readonly fields: readonly FieldSpec[];
	/** Indexed by bit position. */
	readonly bits: readonly BitValue[];
}

const bitOf = (value: bigint, position: number): 0 | 1 =>
	((value >> BigInt(position)) & 1n) === 1n ? 1 : 0;

const sliceOf = (value: bigint, field: FieldSpec): bigint =>
	(value >> BigInt(field.lo)) & ((1n << BigInt(fieldWidth(field))) - 1n);

function checkFields(
	width: number,
	sorted: readonly FieldSpec[],
): DiagramError | undefined {
	let previous: FieldSpec | undefined;
	for (const field of sorted) {
		if (field.hi >= width) {
			return new DiagramError({
				detail: `field '${formatField(field)}' exceeds the ${width}-bit width`,
			});
		}
		if (previous !== undefined && previous.lo <= field.hi) {
			return new DiagramError({
				detail: `fields '${formatField(previous)}' and '${formatField(field)}' overlap`,
			});
		}
		previous = field;
	}
	return undefined;
}

function checkOverlay(
	width: number,
	fields: readonly FieldSpec[],
	overlay: bigint,
): DiagramError | undefined {
	if (!fitsIn(overlay, width)) {
		return new DiagramError({
			detail: `value 0x${overlay.toString(16)} does not fit in ${width} bits`,
		});
	}
	const conflicting = fields.find(
		(field) => field.value !== undefined && sliceOf(overlay, field) !== field.value,
	);
	return conflicting === undefined
		? undefined
		: new DiagramError({
				detail: `value 0x${overlay.toString(16)} conflicts with field '${formatField(conflicting)}'`,
			});
}

/**
 * Build the layout for a `width`-bit diagram.
 *
 * @param overlay - value covering every bit, if any
 *
 * @example
 * ```ts
 * buildLayout(8, [{ name: "op", hi: 7, lo: 6, value: 2n }], undefined);
 * // Right({ width: 8, fields: [...], bits: [u, u, u, u, u, u, 0, 1] })
 * ```
 */
export function buildLayout(
	width: number,
	fields: readonly FieldSpec[],
	overlay: bigint | undefined,
): Either.Either<BitLayout, DiagramError> {
	const sorted = [...fields].sort((a, b) => b.hi - a.hi);
	const fieldError = checkFields(width, sorted);
	if (fieldError !== undefined) return Either.left(fieldError);
	if (overlay !== undefined) {
		const overlayError = checkOverlay(width, sorted, overlay);
		if (overlayError !== undefined) return Either.left(overlayError);
	}

	const bits: BitValue[] = Array.from({ length: width }, (_, position) =>
		overlay === undefined ? undefined : bitOf(overlay, position),
	);
	for (const field of sorted) {
		const value = field.value;
		if (value === undefined || overlay !== undefined) continue;
		for (let position = field.lo; position <= field.hi; position++) {
			bits[position] = bitOf(value, position - field.lo);
		}
	}
	return Either.right({ width, fields: sorted, bits });
}

/**
 * Field covering a bit position, if any.
 */
export function fieldAt(
	layout: BitLayout,
	position: number,
): FieldSpec | undefined {
	return layout.fields.find(
		(field) => field.lo <= position && position <= field.hi,
	);
}
