// CHANGE: Domain models for parsed commands and their settings
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Process exit status propagated to the shell.
 *
 * @remarks
 * Subprocess exit statuses are passed through unchanged, so this is any
 * integer rather than a 0/1 flag.
 */
export type ExitCode = number;

export const MAKE_TARGETS = [
	"all",
	"clean",
	"rebuild",
	"dis",
	"syms",
	"sects",
] as const;

export type MakeTarget = (typeof MAKE_TARGETS)[number];

export const OPTIMIZATION_LEVELS = [0, 1, 2, 3] as const;

export type OptimizationLevel = (typeof OPTIMIZATION_LEVELS)[number];

export const SECTION_WIDTHS = [8, 16, 32, 64] as const;

export type SectionWidth = (typeof SECTION_WIDTHS)[number];

/** Docker image reference split into repository and tag. */
export interface ImageRef {
	readonly image: string;
	readonly tag: string;
}

export interface MakeCommand extends ImageRef {
	readonly kind: "make";
	readonly workdir: string;
	readonly target: MakeTarget;
	readonly optimize: OptimizationLevel | undefined;
	readonly interleave: boolean;
}

export interface RunCommand extends ImageRef {
	readonly kind: "run";
	readonly workdir: string;
	readonly spawnGdbServer: boolean;
}

export interface DebugCommand {
	readonly kind: "debug";
	readonly containerId: string;
}

export interface PullCommand extends ImageRef {
	readonly kind: "pull";
}

export interface PruneCommand {
	readonly kind: "prune";
}

/** Which catalog a diagram is drawn from; opcodes are 32 bits, registers 64. */
export type DiagramKind = "opcode" | "register";

export interface DiagramCommand {
	readonly kind: "diagram";
	readonly diagram: DiagramKind;
	readonly name: string | undefined;
	readonly fields: readonly string[] | undefined;
	readonly sectionWidth: SectionWidth;
	readonly value: string | undefined;
}

export type Command =
	| MakeCommand
	| RunCommand
	| DebugCommand
	| PullCommand
	| PruneCommand
	| DiagramCommand;

/**
 * Outcome of parsing argv: either a command to run, or an informational
 * screen (help/version) that is printed and exits 0.
 */
export type Invocation =
	| {
			readonly kind: "command";
			readonly command: Command;
			readonly debug: boolean;
	  }
	| { readonly kind: "help"; readonly text: string }
	| { readonly kind: "version"; readonly text: string };

/**
 * Settings resolved from the environment that seed CLI defaults.
 */
export interface Settings {
	readonly image: string;
	readonly tag: string;
	readonly debug: boolean;
	readonly docker: string;
}

/**
 * Project metadata read from `metalbox.json`.
 */
export interface ProjectMetadata {
	readonly optimize: OptimizationLevel | undefined;
	readonly supportsRun: boolean;
}
