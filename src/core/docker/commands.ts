// CHANGE: Pure builders for every docker argv the CLI issues
// PURITY: CORE
// INVARIANT: Containers started by the CLI always carry MANAGED_LABEL, so prune can find them
// COMPLEXITY: O(n) where n = |env| + |command|

import type { ImageRef } from "../models.js";

/** Mount point of the host project inside the container. */
export const CONTAINER_WORKDIR = "/project";

export const MANAGED_LABEL = "dev.metalbox.managed=true";

/** Container IDs are shortened to this many characters for display. */
export const CONTAINER_ID_LENGTH = 16;

export interface ContainerRunSpec extends ImageRef {
	readonly command: readonly string[];
	readonly hostWorkdir?: string;
	readonly env?: Readonly<Record<string, string>>;
	readonly detached: boolean;
	readonly tty: boolean;
}

export const imageReference = (ref: ImageRef): string =>
	`${ref.image}:${ref.tag}`;

/**
 * `docker run` arguments for a throwaway container.
 *
 * @invariant detached containers always get a TTY so `docker attach` can drive them
 *
 * @example
 * ```ts
 * buildRunArgs({ image: "metalbox/backend", tag: "latest", command: ["make", "all"],
 *   hostWorkdir: "/home/me/proj", env: { OPTIMIZE: "1" }, detached: false, tty: false });
 * // ["run", "--rm", "--label", "dev.metalbox.managed=true", "--interactive",
 * //  "--volume", "/home/me/proj:/project", "--workdir", "/project",
 * //  "--env", "OPTIMIZE=1", "metalbox/backend:latest", "make", "all"]
 * ```
 */
export function buildRunArgs(spec: ContainerRunSpec): readonly string[] {
	const args: string[] = ["run", "--rm", "--label", MANAGED_LABEL];
	if (spec.detached) {
		args.push("--detach", "--interactive", "--tty");
	} else {
		args.push("--interactive");
		if (spec.tty) args.push("--tty");
	}
	if (spec.hostWorkdir !== undefined) {
		args.push(
			"--volume",
			`${spec.hostWorkdir}:${CONTAINER_WORKDIR}`,
			"--workdir",
			CONTAINER_WORKDIR,
		);
	}
	for (const [key, value] of Object.entries(spec.env ?? {})) {
		args.push("--env", `${key}=${value}`);
	}
	args.push(imageReference(spec), ...spec.command);
	return args;
}

export function buildExecArgs(
	containerId: string,
	command: readonly string[],
	tty: boolean,
): readonly string[] {
	return [
		"exec",
		"--interactive",
		...(tty ? ["--tty"] : []),
		containerId,
		...command,
	];
}

export const buildAttachArgs = (containerId: string): readonly string[] => [
	"attach",
	containerId,
];

export const buildPullArgs = (ref: ImageRef): readonly string[] => [
	"pull",
	imageReference(ref),
];

export const buildListManagedArgs = (): readonly string[] => [
	"ps",
	"--all",
	"--quiet",
	"--filter",
	`label=${MANAGED_LABEL}`,
];

export const buildRemoveArgs = (
	containerIds: readonly string[],
): readonly string[] => ["rm", "--force", ...containerIds];

export const buildVersionArgs = (): readonly string[] => ["--version"];

/**
 * Container ID from `docker run --detach` output, shortened for display.
 *
 * @returns undefined when the output carries no ID
 */
export function shortContainerId(output: string): string | undefined {
	const id = output
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.find((line) => line.length > 0);
	return id?.slice(0, CONTAINER_ID_LENGTH);
}

/** One ID per non-blank line of `docker ps --quiet` output. */
export function parseContainerIds(output: string): readonly string[] {
	return output
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}

const SAFE_SHELL_WORD = /^[\w@%+=:,./-]+$/u;

/**
 * Render a command line the way a user would type it, for logs.
 *
 * @example
 * ```ts
 * formatCommandLine("lldb", ["--one-line", "gdb-remote localhost:1234"]);
 * // "lldb --one-line 'gdb-remote localhost:1234'"
 * ```
 */
export function formatCommandLine(
	command: string,
	args: readonly string[],
): string {
	return [command, ...args]
		.map((word) =>
			SAFE_SHELL_WORD.test(word)
				? word
				: `'${word.replace(/'/gu, `'\\''`)}'`,
		)
		.join(" ");
}
