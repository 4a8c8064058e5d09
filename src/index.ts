// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP effects
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN PROGRAM (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Whole CLI as an Effect that never fails.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runCli } from "metalbox";
 *
 * const exitCode = await Effect.runPromise(
 *   runCli(["utility", "opcode", "add"], {
 *     cwd: process.cwd(),
 *     env: process.env,
 *     interactive: false,
 *     color: false,
 *   }),
 * );
 * ```
 */
export {
	type CliContext,
	type CliLayerFactory,
	executeCommand,
	liveLayer,
	reportError,
	runCli,
} from "./app/main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	Command,
	DebugCommand,
	DiagramCommand,
	DiagramKind,
	ExitCode,
	ImageRef,
	Invocation,
	MakeCommand,
	MakeTarget,
	OptimizationLevel,
	ProjectMetadata,
	PruneCommand,
	PullCommand,
	RunCommand,
	SectionWidth,
	Settings,
} from "./core/models.js";
export {
	type AppError,
	DiagramError,
	DockerError,
	describeError,
	ExecError,
	SimulationError,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE FUNCTIONS (Pure)
// ═══════════════════════════════════════════════════════════════════════════════

export { parseArgv } from "./core/cli/parser.js";
export { renderHelp, renderUsage, renderVersion } from "./core/cli/help.js";
export { settingsFromEnv } from "./core/config/settings.js";
export { type FieldSpec, parseField, parseFields } from "./core/diagram/field.js";
export { type BitLayout, buildLayout } from "./core/diagram/layout.js";
export { renderDiagram } from "./core/diagram/render.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES (Effect Context tags)
// ═══════════════════════════════════════════════════════════════════════════════

export { Docker, type DockerService } from "./shell/docker/client.js";
export { Reporter, type ReporterService } from "./shell/output/reporter.js";
export {
	type ProcessResult,
	ProcessRunner,
	type ProcessRunnerService,
} from "./shell/process/runner.js";
