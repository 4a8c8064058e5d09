// CHANGE: ASCII rendering of a bit layout, one block per section
// PURITY: CORE
// FORMAT THEOREM: every bit owns a 4-column cell, so all rows of a section have length 1 + 4·|section|
// INVARIANT: Sections are emitted most significant first
// COMPLEXITY: O(w · f) where w = width, f = |fields|

import { center } from "../format/panel.js";
import { type BitLayout, type BitValue, fieldAt } from "./layout.js";

/** Columns per bit, including the separator that follows it. */
const CELL = 4;

export interface Segment {
	readonly label: string;
	readonly hi: number;
	readonly lo: number;
}

/**
 * Split [0, width) into sections of `sectionWidth` bits (clamped to width),
 * from the top down.
 */
export function sectionsOf(
	width: number,
	sectionWidth: number,
): ReadonlyArray<readonly [number, number]> {
	const size = Math.max(1, Math.min(sectionWidth, width));
	const sections: Array<readonly [number, number]> = [];
	for (let top = width - 1; top >= 0; top -= size) {
		sections.push([top, Math.max(0, top - size + 1)]);
	}
	return sections;
}

/**
 * Segments of one section: the parts of fields that fall inside it, with
 * uncovered runs of bits merged into unnamed segments.
 */
export function segmentsOf(
	layout: BitLayout,
	hi: number,
	lo: number,
): readonly Segment[] {
	const segments: Segment[] = [];
	let position = hi;
	while (position >= lo) {
		const field = fieldAt(layout, position);
		if (field !== undefined) {
			const bottom = Math.max(field.lo, lo);
			segments.push({ label: field.name ?? "", hi: position, lo: bottom });
			position = bottom - 1;
			continue;
		}
		let bottom = position;
		while (bottom - 1 >= lo && fieldAt(layout, bottom - 1) === undefined) {
			bottom -= 1;
		}
		segments.push({ label: "", hi: position, lo: bottom });
		position = bottom - 1;
	}
	return segments;
}

const segmentWidth = (segment: Segment): number => segment.hi - segment.lo + 1;

const innerWidth = (segment: Segment): number =>
	CELL * segmentWidth(segment) - 1;

function positionsOf(hi: number, lo: number): readonly number[] {
	return Array.from({ length: hi - lo + 1 }, (_, offset) => hi - offset);
}

const digit = (bit: BitValue): string => (bit === undefined ? "" : String(bit));

function renderSection(
	layout: BitLayout,
	hi: number,
	lo: number,
): readonly string[] {
	const segments = segmentsOf(layout, hi, lo);
	const header = ` ${positionsOf(hi, lo)
		.map((position) => center(String(position), CELL - 1))
		.join(" ")}`.trimEnd();
	const border = `+${segments.map((s) => `${"-".repeat(innerWidth(s))}+`).join("")}`;
	const names = `|${segments.map((s) => `${center(s.label, innerWidth(s))}|`).join("")}`;

	const rows = [header, border, names];
	const hasValues = positionsOf(hi, lo).some(
		(position) => layout.bits[position] !== undefined,
	);
	if (hasValues) {
		const values = segments.map((s) =>
			positionsOf(s.hi, s.lo)
				.map((position) => center(digit(layout.bits[position]), CELL - 1))
				.join(" "),
		);
		rows.push(`|${values.map((cells) => `${cells}|`).join("")}`);
	}
	rows.push(border);
	return rows;
}

/**
 * Render the whole layout.
 *
 * @param title - printed above the first section when given
 *
 * @example
 * ```ts
 * renderDiagram(layout, 8);
 * // "  7   6   5   4   3   2   1   0\n+-------+-----...
 * ```
 */
export function renderDiagram(
	layout: BitLayout,
	sectionWidth: number,
	title?: string,
): string {
	const blocks = sectionsOf(layout.width, sectionWidth).map(([hi, lo]) =>
		renderSection(layout, hi, lo).join("\n"),
	);
	const body = blocks.join("\n\n");
	return title === undefined ? body : `${title}\n\n${body}`;
}
