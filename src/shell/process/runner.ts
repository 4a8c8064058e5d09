// CHANGE: Process runner service over node:child_process
// PURITY: SHELL (spawns external commands)
// EFFECT: Effect<ProcessResult, ExecError>
// INVARIANT: A process that ran yields its exit status; only a failed spawn is an error
// COMPLEXITY: O(n) where n = captured output length

import { spawn } from "node:child_process";
import { constants } from "node:os";
import { Context, Effect, Layer } from "effect";

import { formatCommandLine } from "../../core/docker/commands.js";
import { ExecError } from "../../core/errors.js";

/**
 * - inherit: the child owns the terminal (interactive make, QEMU, LLDB)
 * - capture: stdout and stderr are collected for the caller
 */
export type StdioMode = "inherit" | "capture";

export interface ProcessResult {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

export interface ProcessRunnerService {
	readonly run: (
		command: string,
		args: readonly string[],
		mode: StdioMode,
	) => Effect.Effect<ProcessResult, ExecError>;
}

export class ProcessRunner extends Context.Tag("ProcessRunner")<
	ProcessRunner,
	ProcessRunnerService
>() {}

const signalNumbers = new Map<string, number>(Object.entries(constants.signals));

/**
 * Shell convention for a process killed by a signal: 128 + signal number.
 */
function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
	if (code !== null) return code;
	if (signal !== null) return 128 + (signalNumbers.get(signal) ?? 0);
	return 1;
}

/**
 * Spawn a process without a shell and wait for it to close.
 *
 * @pure false (spawns a child process)
 * @invariant the returned effect resumes exactly once
 */
export function spawnProcess(
	command: string,
	args: readonly string[],
	mode: StdioMode,
): Effect.Effect<ProcessResult, ExecError> {
	return Effect.async<ProcessResult, ExecError>((resume) => {
		let settled = false;
		let stdout = "";
		let stderr = "";
		const child = spawn(command, [...args], {
			stdio: mode === "inherit" ? "inherit" : ["inherit", "pipe", "pipe"],
		});

		child.stdout?.setEncoding("utf8");
		child.stderr?.setEncoding("utf8");
		child.stdout?.on("data", (chunk: string) => {
			stdout += chunk;
		});
		child.stderr?.on("data", (chunk: string) => {
			stderr += chunk;
		});

		child.once("error", (error) => {
			if (settled) return;
			settled = true;
			resume(
				Effect.fail(
					new ExecError({
						command: formatCommandLine(command, args),
						detail: error.message,
					}),
				),
			);
		});
		child.once("close", (code, signal) => {
			if (settled) return;
			settled = true;
			resume(
				Effect.succeed({ exitCode: exitCodeOf(code, signal), stdout, stderr }),
			);
		});

		return Effect.sync(() => {
			if (!settled) child.kill();
		});
	});
}

export const ProcessRunnerLive = Layer.succeed(ProcessRunner, {
	run: spawnProcess,
});
