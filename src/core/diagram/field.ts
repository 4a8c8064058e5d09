// CHANGE: Parse "{name}[hi{:lo}]{=value}" field descriptions
// PURITY: CORE
// EFFECT: Either<FieldSpec, DiagramError>
// INVARIANT: ∀ f: parseField(s) = Right(f) → 63 ≥ f.hi ≥ f.lo ≥ 0 ∧ (f.value = undefined ∨ f.value < 2^(f.hi-f.lo+1))
// COMPLEXITY: O(|s|)

import { Either } from "effect";

import { DiagramError } from "../errors.js";

/**
 * A contiguous run of bits, optionally named and optionally holding a value.
 */
export interface FieldSpec {
	readonly name: string | undefined;
	readonly hi: number;
	readonly lo: number;
	readonly value: bigint | undefined;
}

const FIELD_PATTERN =
	/^(?<name>[A-Za-z_][\w<>.]*)?\[(?<hi>\d+)(?::(?<lo>\d+))?\](?:=(?<value>\S+))?$/u;

const NUMBER_PATTERN = /^(?:0x[0-9a-f]+|0b[01]+|\d+)$/iu;

/** Highest bit of the widest diagram (a 64-bit register). */
export const MAX_FIELD_BIT = 63;

/**
 * Parse a decimal, `0x` hexadecimal or `0b` binary literal.
 *
 * @returns undefined for anything else, including negative numbers
 */
export function parseNumber(text: string): bigint | undefined {
	const normalized = text.trim().replace(/^0X/u, "0x").replace(/^0B/u, "0b");
	return NUMBER_PATTERN.test(normalized) ? BigInt(normalized) : undefined;
}

export const fieldWidth = (field: FieldSpec): number => field.hi - field.lo + 1;

export const fitsIn = (value: bigint, width: number): boolean =>
	value < 1n << BigInt(width);

/**
 * Canonical text form, used in error messages.
 *
 * @example
 * ```ts
 * formatField({ name: "Rn", hi: 9, lo: 5, value: undefined }); // "Rn[9:5]"
 * ```
 */
export function formatField(field: FieldSpec): string {
	const range = field.hi === field.lo ? `${field.hi}` : `${field.hi}:${field.lo}`;
	return `${field.name ?? ""}[${range}]`;
}

export function parseField(text: string): Either.Either<FieldSpec, DiagramError> {
	const groups = FIELD_PATTERN.exec(text.trim())?.groups;
	const rawHi = groups?.["hi"];
	if (groups === undefined || rawHi === undefined) {
		return Either.left(
			new DiagramError({ detail: `invalid field description '${text}'` }),
		);
	}
	const hi = Number.parseInt(rawHi, 10);
	const rawLo = groups["lo"];
	const lo = rawLo === undefined ? hi : Number.parseInt(rawLo, 10);
	if (hi > MAX_FIELD_BIT) {
		return Either.left(
			new DiagramError({
				detail: `field '${text}': bit ${hi} is above bit ${MAX_FIELD_BIT}`,
			}),
		);
	}
	if (hi < lo) {
		return Either.left(
			new DiagramError({
				detail: `field '${text}': high bit ${hi} is below low bit ${lo}`,
			}),
		);
	}

	const rawValue = groups["value"];
	const value = rawValue === undefined ? undefined : parseNumber(rawValue);
	if (rawValue !== undefined && value === undefined) {
		return Either.left(
			new DiagramError({ detail: `field '${text}': invalid value '${rawValue}'` }),
		);
	}
	const width = hi - lo + 1;
	if (value !== undefined && !fitsIn(value, width)) {
		return Either.left(
			new DiagramError({
				detail: `field '${text}': value ${rawValue ?? ""} does not fit in ${width} bit(s)`,
			}),
		);
	}
	return Either.right({ name: groups["name"], hi, lo, value });
}

/**
 * Parse every description, stopping at the first invalid one.
 */
export function parseFields(
	texts: readonly string[],
): Either.Either<readonly FieldSpec[], DiagramError> {
	const fields: FieldSpec[] = [];
	for (const text of texts) {
		const parsed = parseField(text);
		if (Either.isLeft(parsed)) return Either.left(parsed.left);
		fields.push(parsed.right);
	}
	return Either.right(fields);
}
