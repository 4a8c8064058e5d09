// CHANGE: Catalog of named encodings and registers, validated from untrusted JSON
// PURITY: CORE
// INVARIANT: Lookups are case-insensitive; entries are stored under lower-case keys
// COMPLEXITY: O(n) to validate, O(1) per lookup

import { Either } from "effect";

import { DiagramError } from "../errors.js";
import type { DiagramKind } from "../models.js";
import {
	isJSONObject,
	isStringArray,
	type JSONValue,
} from "../types/json.js";

export interface CatalogEntry {
	readonly title: string;
	readonly fields: readonly string[];
}

export type Catalog = Readonly<
	Record<DiagramKind, ReadonlyMap<string, CatalogEntry>>
>;

function entriesOf(
	kind: DiagramKind,
	section: JSONValue | undefined,
): Either.Either<ReadonlyMap<string, CatalogEntry>, DiagramError> {
	if (!isJSONObject(section)) {
		return Either.left(
			new DiagramError({ detail: `catalog section '${kind}' must be an object` }),
		);
	}
	const entries = new Map<string, CatalogEntry>();
	for (const [name, raw] of Object.entries(section)) {
		if (!isJSONObject(raw)) {
			return Either.left(
				new DiagramError({ detail: `catalog entry '${kind}.${name}' must be an object` }),
			);
		}
		const title = raw["title"];
		const fields = raw["fields"];
		if (typeof title !== "string" || !isStringArray(fields)) {
			return Either.left(
				new DiagramError({
					detail: `catalog entry '${kind}.${name}' needs a string 'title' and a string array 'fields'`,
				}),
			);
		}
		entries.set(name.toLowerCase(), { title, fields });
	}
	return Either.right(entries);
}

/**
 * Validate parsed catalog JSON.
 */
export function catalogFromJSON(
	json: JSONValue,
): Either.Either<Catalog, DiagramError> {
	if (!isJSONObject(json)) {
		return Either.left(new DiagramError({ detail: "catalog must be a JSON object" }));
	}
	return Either.flatMap(entriesOf("opcode", json["opcode"]), (opcode) =>
		Either.map(entriesOf("register", json["register"]), (register) => ({
			opcode,
			register,
		})),
	);
}

export function lookupEntry(
	catalog: Catalog,
	kind: DiagramKind,
	name: string,
): Either.Either<CatalogEntry, DiagramError> {
	const entry = catalog[kind].get(name.toLowerCase());
	if (entry !== undefined) return Either.right(entry);
	const subject = kind === "opcode" ? "instruction" : "register";
	return Either.left(new DiagramError({ detail: `unknown ${subject} '${name}'` }));
}

export const diagramWidth = (kind: DiagramKind): number =>
	kind === "opcode" ? 32 : 64;
