// CHANGE: Validate the optional per-project metadata file
// PURITY: CORE
// INVARIANT: Unknown keys are ignored; invalid values behave as if absent
// COMPLEXITY: O(n) where n = |text|

import {
	OPTIMIZATION_LEVELS,
	type OptimizationLevel,
	type ProjectMetadata,
} from "../models.js";
import { isJSONObject, parseJSON } from "../types/json.js";
import { FALLBACK_OPTIMIZATION } from "./toolchain.js";

export const METADATA_FILE = "metalbox.json";

/**
 * Result of reading metadata, keeping the reason it is missing for debug logs.
 */
export type MetadataResult =
	| { readonly kind: "found"; readonly metadata: ProjectMetadata }
	| { readonly kind: "invalid"; readonly reason: string };

/**
 * Parse the contents of `metalbox.json`.
 *
 * @example
 * ```ts
 * parseProjectMetadata('{ "optimize": 2, "supports-run": true }');
 * // { kind: "found", metadata: { optimize: 2, supportsRun: true } }
 * ```
 */
export function parseProjectMetadata(text: string): MetadataResult {
	const json = parseJSON(text);
	if (json === undefined) {
		return { kind: "invalid", reason: `failed to parse the project's '${METADATA_FILE}' file` };
	}
	if (!isJSONObject(json)) {
		return { kind: "invalid", reason: `'${METADATA_FILE}' must contain a JSON object` };
	}
	const optimize = json["optimize"];
	const level = OPTIMIZATION_LEVELS.find((candidate) => candidate === optimize);
	return {
		kind: "found",
		metadata: {
			optimize: level,
			supportsRun: json["supports-run"] === true,
		},
	};
}

/**
 * Optimisation level a project builds with when none is given on the command line.
 */
export function defaultOptimization(
	metadata: ProjectMetadata | undefined,
): OptimizationLevel {
	return metadata?.optimize ?? FALLBACK_OPTIMIZATION;
}

export type RunSupport = "supported" | "unsupported" | "unknown";

export function runSupport(metadata: ProjectMetadata | undefined): RunSupport {
	if (metadata === undefined) return "unknown";
	return metadata.supportsRun ? "supported" : "unsupported";
}

/**
 * Warning shown before simulating a project that may not support it.
 */
export function runSupportWarning(support: RunSupport): string | undefined {
	switch (support) {
		case "supported":
			return undefined;
		case "unknown":
			return "Unable to determine whether this project supports being run on QEMU.";
		case "unsupported":
			return "Project config file states it does not support being run on QEMU.";
	}
}
