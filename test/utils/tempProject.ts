// CHANGE: Test helper to create isolated temporary project directories
// INVARIANT: Every directory lives under os.tmpdir() and is removed by cleanup()

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import type { JSONObject } from "../../src/core/types/json.js";

/**
 * Options controlling which files a temporary project contains.
 *
 * Invariants:
 * - metadata is written as metalbox.json when it is an object
 * - rawMetadata is written verbatim, so invalid JSON can be tested
 */
export interface TempProjectOptions {
	readonly metadata?: JSONObject;
	readonly rawMetadata?: string;
}

/**
 * Result of creating a temporary project.
 *
 * Postconditions:
 * - cwd points to the root directory of the temporary project
 * - cleanup() removes the temporary directory recursively
 */
export interface TempProject {
	readonly cwd: string;
	readonly cleanup: () => void;
}

export function createTempProject(
	options: TempProjectOptions = {},
): TempProject {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "metalbox-test-"));
	const file = path.join(cwd, "metalbox.json");

	if (options.metadata !== undefined) {
		fs.writeFileSync(file, `${JSON.stringify(options.metadata, null, 2)}\n`, {
			encoding: "utf-8",
		});
	} else if (options.rawMetadata !== undefined) {
		fs.writeFileSync(file, options.rawMetadata, { encoding: "utf-8" });
	}

	return {
		cwd,
		cleanup: (): void => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}
