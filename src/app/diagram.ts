// CHANGE: Utility diagram commands (opcode, register)
// PURITY: APP
// EFFECT: Effect<ExitCode, DiagramError, Reporter>
// INVARIANT: Nothing is printed unless the whole layout is valid
// COMPLEXITY: O(w · f) rendering, see core/diagram/render

import { Effect } from "effect";

import {
	diagramWidth,
	lookupEntry,
} from "../core/diagram/catalog.js";
import { parseFields, parseNumber } from "../core/diagram/field.js";
import { buildLayout } from "../core/diagram/layout.js";
import { renderDiagram } from "../core/diagram/render.js";
import { DiagramError } from "../core/errors.js";
import type { DiagramCommand, ExitCode } from "../core/models.js";
import { loadCatalog } from "../shell/diagram/catalog.js";
import { Reporter } from "../shell/output/reporter.js";

const parseOverlay = (
	text: string | undefined,
): Effect.Effect<bigint | undefined, DiagramError> => {
	if (text === undefined) return Effect.succeed(undefined);
	const value = parseNumber(text);
	return value === undefined
		? Effect.fail(new DiagramError({ detail: `invalid value '${text}'` }))
		: Effect.succeed(value);
};

/**
 * Field descriptions and title for the diagram: from the catalog when a name
 * is given, else the manual `--field` list.
 */
const resolveFields = (
	command: DiagramCommand,
): Effect.Effect<
	{ readonly title: string | undefined; readonly fields: readonly string[] },
	DiagramError
> => {
	const name = command.name;
	if (name === undefined) {
		return Effect.succeed({ title: undefined, fields: command.fields ?? [] });
	}
	return Effect.gen(function* () {
		const catalog = yield* loadCatalog();
		const entry = yield* lookupEntry(catalog, command.diagram, name);
		return { title: entry.title, fields: entry.fields };
	});
};

export function runDiagram(
	command: DiagramCommand,
): Effect.Effect<ExitCode, DiagramError, Reporter> {
	return Effect.gen(function* () {
		const reporter = yield* Reporter;
		const { title, fields: descriptions } = yield* resolveFields(command);
		const fields = yield* parseFields(descriptions);
		const overlay = yield* parseOverlay(command.value);
		const layout = yield* buildLayout(
			diagramWidth(command.diagram),
			fields,
			overlay,
		);
		yield* reporter.print(renderDiagram(layout, command.sectionWidth, title));
		return 0;
	});
}
