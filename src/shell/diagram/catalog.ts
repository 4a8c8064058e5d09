// CHANGE: Load the bundled diagram catalog shipped next to the package
// PURITY: SHELL (filesystem read)
// EFFECT: Effect<Catalog, DiagramError>
// INVARIANT: The catalog path resolves the same way from src/ and dist/
// COMPLEXITY: O(n) where n = catalog size

import * as fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { Effect, Either } from "effect";

import { type Catalog, catalogFromJSON } from "../../core/diagram/catalog.js";
import { DiagramError } from "../../core/errors.js";
import { parseJSON } from "../../core/types/json.js";

export const DEFAULT_CATALOG_PATH = fileURLToPath(
	new URL("../../../data/diagram-catalog.json", import.meta.url),
);

export function loadCatalog(
	file: string = DEFAULT_CATALOG_PATH,
): Effect.Effect<Catalog, DiagramError> {
	return Effect.tryPromise({
		try: () => fs.readFile(file, "utf8"),
		catch: (error) =>
			new DiagramError({
				detail: `failed to read diagram catalog '${file}': ${error instanceof Error ? error.message : String(error)}`,
			}),
	}).pipe(
		Effect.flatMap((text) => {
			const json = parseJSON(text);
			return json === undefined
				? Effect.fail(
						new DiagramError({ detail: `diagram catalog '${file}' is not valid JSON` }),
					)
				: Either.match(catalogFromJSON(json), {
						onLeft: (error) => Effect.fail(error),
						onRight: (catalog) => Effect.succeed(catalog),
					});
		}),
	);
}
