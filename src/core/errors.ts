// CHANGE: Typed domain error ADT for the CLI, built on Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Command line could not be turned into a command.
 *
 * @invariant message.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly message: string;
	readonly usage: string;
}> {}

/**
 * A process could not be spawned at all (missing binary, permissions).
 * A process that ran and exited non-zero is not an ExecError.
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Docker ran but reported failure for a bookkeeping operation
 * (listing or removing containers).
 */
export class DockerError extends Data.TaggedError("DockerError")<{
	readonly operation: "ps" | "rm" | "version";
	readonly detail: string;
}> {}

/**
 * The detached QEMU container did not start.
 */
export class SimulationError extends Data.TaggedError("SimulationError")<{
	readonly detail: string;
}> {}

/**
 * Invalid field description, layout or catalog lookup for bit diagrams.
 */
export class DiagramError extends Data.TaggedError("DiagramError")<{
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures.
 */
export type AppError =
	| UsageError
	| ExecError
	| DockerError
	| SimulationError
	| DiagramError;

/**
 * One-line, user-facing description of an application error.
 *
 * @pure true
 */
export function describeError(error: AppError): string {
	switch (error._tag) {
		case "UsageError":
			return error.message;
		case "Exec":
			return `failed to execute '${error.command}': ${error.detail}`;
		case "DockerError":
			return `docker ${error.operation} failed: ${error.detail}`;
		case "SimulationError":
			return error.detail;
		case "DiagramError":
			return error.detail;
	}
}
