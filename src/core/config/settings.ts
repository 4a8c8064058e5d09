// CHANGE: Resolve environment-derived defaults as a pure function of the environment map
// PURITY: CORE
// INVARIANT: Unset or blank variables fall back to built-in defaults
// COMPLEXITY: O(1)

import type { Settings } from "../models.js";

export const DEFAULT_SETTINGS: Settings = {
	image: "metalbox/backend",
	tag: "latest",
	debug: false,
	docker: "docker",
};

export type Environment = Readonly<Record<string, string | undefined>>;

const nonBlank = (value: string | undefined): string | undefined =>
	value !== undefined && value.trim().length > 0 ? value.trim() : undefined;

const isTruthyFlag = (value: string | undefined): boolean => {
	const normalized = nonBlank(value)?.toLowerCase();
	return normalized === "1" || normalized === "true" || normalized === "yes";
};

/**
 * Read METALBOX_* variables into Settings.
 *
 * @example
 * ```ts
 * settingsFromEnv({ METALBOX_TAG: "v3" });
 * // { image: "metalbox/backend", tag: "v3", debug: false, docker: "docker" }
 * ```
 */
export function settingsFromEnv(env: Environment): Settings {
	return {
		image: nonBlank(env["METALBOX_IMAGE"]) ?? DEFAULT_SETTINGS.image,
		tag: nonBlank(env["METALBOX_TAG"]) ?? DEFAULT_SETTINGS.tag,
		debug: isTruthyFlag(env["METALBOX_DEBUG"]),
		docker: nonBlank(env["METALBOX_DOCKER"]) ?? DEFAULT_SETTINGS.docker,
	};
}
