// CHANGE: Project commands (make, run, debug, pull, prune) composed from SHELL services
// PURITY: APP (no process.exit; returns ExitCode as value)
// EFFECT: Effect<ExitCode, ExecError | DockerError | SimulationError, Docker | Reporter>
// INVARIANT: Exit statuses of make, QEMU, LLDB and docker are returned unchanged
// COMPLEXITY: O(1) orchestration plus external process time

import { Effect } from "effect";

import { shortContainerId } from "../core/docker/commands.js";
import {
	type DockerError,
	type ExecError,
	SimulationError,
} from "../core/errors.js";
import type {
	DebugCommand,
	ExitCode,
	MakeCommand,
	PruneCommand,
	PullCommand,
	RunCommand,
} from "../core/models.js";
import { qemuHelpPanel } from "../core/project/messages.js";
import {
	defaultOptimization,
	runSupport,
	runSupportWarning,
} from "../core/project/metadata.js";
import {
	lldbCommand,
	makeInvocation,
	qemuCommand,
} from "../core/project/toolchain.js";
import { Docker } from "../shell/docker/client.js";
import { Reporter } from "../shell/output/reporter.js";
import { readProjectMetadata } from "../shell/project/metadata.js";

/**
 * `project make`: run the Makefile target in a throwaway container.
 *
 * @returns exit status of `make`
 */
export function runMake(
	command: MakeCommand,
): Effect.Effect<ExitCode, ExecError, Docker | Reporter> {
	return Effect.gen(function* () {
		const docker = yield* Docker;
		const optimize =
			command.optimize ??
			defaultOptimization(yield* readProjectMetadata(command.workdir));
		const invocation = makeInvocation(
			command.target,
			optimize,
			command.interleave,
		);
		return yield* docker.run({
			image: command.image,
			tag: command.tag,
			hostWorkdir: command.workdir,
			command: invocation.command,
			env: invocation.env,
		});
	});
}

/**
 * `project run`: rebuild, then simulate the kernel under QEMU.
 *
 * With the GDB server the simulation starts detached and paused; the CLI
 * prints how to attach the debugger and then attaches to QEMU's console.
 */
export function runSimulation(
	command: RunCommand,
): Effect.Effect<ExitCode, ExecError | SimulationError, Docker | Reporter> {
	return Effect.gen(function* () {
		const docker = yield* Docker;
		const reporter = yield* Reporter;

		const built = yield* runMake({
			kind: "make",
			image: command.image,
			tag: command.tag,
			workdir: command.workdir,
			target: "rebuild",
			optimize: undefined,
			interleave: false,
		});
		if (built !== 0) return built;

		const warning = runSupportWarning(
			runSupport(yield* readProjectMetadata(command.workdir)),
		);
		if (warning !== undefined) yield* reporter.warn(warning);

		const spec = {
			image: command.image,
			tag: command.tag,
			hostWorkdir: command.workdir,
			command: qemuCommand(command.spawnGdbServer),
		};
		if (!command.spawnGdbServer) {
			yield* reporter.info(qemuHelpPanel().join("\n"));
			return yield* docker.run(spec);
		}

		const started = yield* docker.runDetached(spec);
		const containerId =
			started.exitCode === 0 ? shortContainerId(started.stdout) : undefined;
		if (containerId === undefined) {
			const stderr = started.stderr.trim();
			if (stderr.length > 0) yield* reporter.error(stderr);
			return yield* Effect.fail(
				new SimulationError({ detail: "failed to start QEMU simulation" }),
			);
		}

		yield* reporter.info(qemuHelpPanel(containerId).join("\n"));
		return yield* docker.attach(containerId);
	});
}

/**
 * `project debug`: LLDB inside the simulation's container, connected to QEMU's GDB server.
 */
export function runDebugger(
	command: DebugCommand,
): Effect.Effect<ExitCode, ExecError, Docker> {
	return Effect.flatMap(Docker, (docker) =>
		docker.exec(command.containerId, lldbCommand()),
	);
}

export function runPull(
	command: PullCommand,
): Effect.Effect<ExitCode, ExecError, Docker> {
	return Effect.flatMap(Docker, (docker) =>
		docker.pull({ image: command.image, tag: command.tag }),
	);
}

/**
 * `project prune`: force-remove every container the CLI has started.
 *
 * @returns 0; failures surface as DockerError
 */
export function runPrune(
	_command: PruneCommand,
): Effect.Effect<ExitCode, ExecError | DockerError, Docker | Reporter> {
	return Effect.gen(function* () {
		const docker = yield* Docker;
		const reporter = yield* Reporter;
		const containerIds = yield* docker.listManaged();
		if (containerIds.length === 0) {
			yield* reporter.info("No lingering containers to clean up.");
			return 0;
		}
		yield* docker.remove(containerIds);
		yield* reporter.info(`Removed ${containerIds.length} container(s).`);
		return 0;
	});
}
