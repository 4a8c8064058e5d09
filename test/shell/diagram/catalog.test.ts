// CHANGE: Tests for loading the bundled diagram catalog from disk

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { diagramWidth } from "../../../src/core/diagram/catalog.js";
import { parseFields } from "../../../src/core/diagram/field.js";
import { buildLayout } from "../../../src/core/diagram/layout.js";
import type { DiagramKind } from "../../../src/core/models.js";
import { loadCatalog } from "../../../src/shell/diagram/catalog.js";

const KINDS: readonly DiagramKind[] = ["opcode", "register"];

describe("loadCatalog", () => {
	it("loads the bundled catalog and every entry lays out cleanly", async () => {
		const catalog = await Effect.runPromise(loadCatalog());
		expect(catalog.opcode.get("nop")?.title).toBe("NOP");
		for (const kind of KINDS) {
			for (const [name, entry] of catalog[kind]) {
				const layout = Either.flatMap(parseFields(entry.fields), (fields) =>
					buildLayout(diagramWidth(kind), fields, undefined),
				);
				expect(Either.isRight(layout), `${kind} ${name}`).toBe(true);
			}
		}
	});

	it("reports a missing file", async () => {
		const file = path.join(os.tmpdir(), "metalbox-missing", "catalog.json");
		const error = await Effect.runPromise(Effect.flip(loadCatalog(file)));
		expect(error.detail.startsWith(`failed to read diagram catalog '${file}': `)).toBe(true);
	});

	it("reports invalid JSON", async () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "metalbox-catalog-"));
		const file = path.join(dir, "catalog.json");
		fs.writeFileSync(file, "{ opcode", "utf-8");
		try {
			const error = await Effect.runPromise(Effect.flip(loadCatalog(file)));
			expect(error.detail).toBe(`diagram catalog '${file}' is not valid JSON`);
		} finally {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});
});
