// CHANGE: Docker CLI client as an Effect service over ProcessRunner
// PURITY: SHELL (executes docker)
// EFFECT: Effect<A, ExecError | DockerError, never> per operation
// INVARIANT: Every invocation is debug-logged before it runs
// COMPLEXITY: O(1) per call plus process execution time

import { Context, Effect, Layer } from "effect";

import {
	buildAttachArgs,
	buildExecArgs,
	buildListManagedArgs,
	buildPullArgs,
	buildRemoveArgs,
	buildRunArgs,
	buildVersionArgs,
	type ContainerRunSpec,
	formatCommandLine,
	parseContainerIds,
} from "../../core/docker/commands.js";
import { DockerError, type ExecError } from "../../core/errors.js";
import type { ExitCode, ImageRef } from "../../core/models.js";
import { Reporter } from "../output/reporter.js";
import {
	type ProcessResult,
	ProcessRunner,
	type StdioMode,
} from "../process/runner.js";

/** Container settings without the terminal flags, which the client decides. */
export type ContainerSpec = Omit<ContainerRunSpec, "detached" | "tty">;

export interface DockerService {
	/** Run to completion in a throwaway container that owns the terminal. */
	readonly run: (spec: ContainerSpec) => Effect.Effect<ExitCode, ExecError>;
	/** Start a detached container; stdout carries its ID. */
	readonly runDetached: (
		spec: ContainerSpec,
	) => Effect.Effect<ProcessResult, ExecError>;
	readonly attach: (containerId: string) => Effect.Effect<ExitCode, ExecError>;
	readonly exec: (
		containerId: string,
		command: readonly string[],
	) => Effect.Effect<ExitCode, ExecError>;
	readonly pull: (ref: ImageRef) => Effect.Effect<ExitCode, ExecError>;
	readonly listManaged: () => Effect.Effect<
		readonly string[],
		ExecError | DockerError
	>;
	readonly remove: (
		containerIds: readonly string[],
	) => Effect.Effect<void, ExecError | DockerError>;
	readonly version: () => Effect.Effect<string, ExecError | DockerError>;
}

export class Docker extends Context.Tag("Docker")<Docker, DockerService>() {}

export interface DockerOptions {
	/** docker executable name or path */
	readonly binary: string;
	/** whether our own stdin is a terminal, so `--tty` can be requested */
	readonly tty: boolean;
}

const failureDetail = (result: ProcessResult): string => {
	const stderr = result.stderr.trim();
	return stderr.length > 0 ? stderr : `exited with status ${result.exitCode}`;
};

/**
 * Build the Docker service on top of the process runner and reporter.
 */
export const makeDockerLayer = (
	options: DockerOptions,
): Layer.Layer<Docker, never, ProcessRunner | Reporter> =>
	Layer.effect(
		Docker,
		Effect.gen(function* () {
			const runner = yield* ProcessRunner;
			const reporter = yield* Reporter;

			const invoke = (
				args: readonly string[],
				mode: StdioMode,
			): Effect.Effect<ProcessResult, ExecError> =>
				reporter
					.debug(`$ ${formatCommandLine(options.binary, args)}`)
					.pipe(Effect.zipRight(runner.run(options.binary, args, mode)));

			const exitCodeOf = (
				args: readonly string[],
			): Effect.Effect<ExitCode, ExecError> =>
				invoke(args, "inherit").pipe(Effect.map((result) => result.exitCode));

			const expectSuccess = (
				operation: DockerError["operation"],
				args: readonly string[],
			): Effect.Effect<ProcessResult, ExecError | DockerError> =>
				invoke(args, "capture").pipe(
					Effect.filterOrFail(
						(result) => result.exitCode === 0,
						(result) =>
							new DockerError({ operation, detail: failureDetail(result) }),
					),
				);

			const service: DockerService = {
				run: (spec) =>
					exitCodeOf(buildRunArgs({ ...spec, detached: false, tty: options.tty })),
				runDetached: (spec) =>
					invoke(buildRunArgs({ ...spec, detached: true, tty: true }), "capture"),
				attach: (containerId) => exitCodeOf(buildAttachArgs(containerId)),
				exec: (containerId, command) =>
					exitCodeOf(buildExecArgs(containerId, command, options.tty)),
				pull: (ref) => exitCodeOf(buildPullArgs(ref)),
				listManaged: () =>
					expectSuccess("ps", buildListManagedArgs()).pipe(
						Effect.map((result) => parseContainerIds(result.stdout)),
					),
				remove: (containerIds) =>
					containerIds.length === 0
						? Effect.void
						: expectSuccess("rm", buildRemoveArgs(containerIds)).pipe(Effect.asVoid),
				version: () =>
					expectSuccess("version", buildVersionArgs()).pipe(
						Effect.map((result) => result.stdout.trim()),
					),
			};
			return service;
		}),
	);
