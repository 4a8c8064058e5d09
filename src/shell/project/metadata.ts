// CHANGE: Read the project's metadata file from disk
// PURITY: SHELL (filesystem read)
// EFFECT: Effect<ProjectMetadata | undefined, never, Reporter>
// INVARIANT: A missing or broken file is never an error, only a debug message
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect, Option } from "effect";

import {
	METADATA_FILE,
	parseProjectMetadata,
} from "../../core/project/metadata.js";
import type { ProjectMetadata } from "../../core/models.js";
import { Reporter } from "../output/reporter.js";

/**
 * Load `metalbox.json` from the project root.
 *
 * @returns undefined when the file is absent, unreadable or invalid
 */
export function readProjectMetadata(
	workdir: string,
): Effect.Effect<ProjectMetadata | undefined, never, Reporter> {
	return Effect.gen(function* () {
		const reporter = yield* Reporter;
		const file = path.join(workdir, METADATA_FILE);
		yield* reporter.debug(`trying to read project config file at '${file}'...`);

		const text = yield* Effect.tryPromise({
			try: () => fs.readFile(file, "utf8"),
			catch: (error) => (error instanceof Error ? error.message : String(error)),
		}).pipe(
			Effect.tapError((message) =>
				reporter.debug(`failed to open the project's '${METADATA_FILE}' file: ${message}`),
			),
			Effect.option,
		);
		if (Option.isNone(text)) return undefined;

		const parsed = parseProjectMetadata(text.value);
		if (parsed.kind === "invalid") {
			yield* reporter.debug(parsed.reason);
			return undefined;
		}
		return parsed.metadata;
	});
}
