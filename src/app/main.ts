// CHANGE: CLI program: parse argv, build layers, dispatch, render errors
// PURITY: APP (pure composition of SHELL effects)
// EFFECT: Effect<ExitCode, never, never>
// INVARIANT: Every AppError is rendered and mapped to an exit code here; nothing below exits
// COMPLEXITY: O(n) parsing where n = |argv|, plus the command itself

import { Effect, Either, Layer } from "effect";
import { match } from "ts-pattern";

import { parseArgv } from "../core/cli/parser.js";
import { type Environment, settingsFromEnv } from "../core/config/settings.js";
import {
	type AppError,
	describeError,
	type UsageError,
} from "../core/errors.js";
import type {
	Command,
	ExitCode,
	Invocation,
	Settings,
} from "../core/models.js";
import { checkDockerAvailable } from "../shell/analysis/preflight.js";
import { Docker, makeDockerLayer } from "../shell/docker/client.js";
import { makeReporterLayer, Reporter } from "../shell/output/reporter.js";
import { ProcessRunnerLive } from "../shell/process/runner.js";
import { runDiagram } from "./diagram.js";
import {
	runDebugger,
	runMake,
	runPrune,
	runPull,
	runSimulation,
} from "./project.js";

export const USAGE_EXIT_CODE = 2;
export const FAILURE_EXIT_CODE = 1;

/**
 * Process-level facts the CLI needs from its host.
 */
export interface CliContext {
	readonly cwd: string;
	readonly env: Environment;
	/** stdin is a terminal: containers get `--tty` */
	readonly interactive: boolean;
	/** stdout supports ANSI colors */
	readonly color: boolean;
}

export type CliLayerFactory = (
	settings: Settings,
	debug: boolean,
	context: CliContext,
) => Layer.Layer<Docker | Reporter>;

/**
 * Production services: console reporter, docker over `child_process.spawn`.
 */
export const liveLayer: CliLayerFactory = (settings, debug, context) => {
	const reporter = makeReporterLayer({ debug, color: context.color });
	const docker = makeDockerLayer({
		binary: settings.docker,
		tty: context.interactive,
	}).pipe(Layer.provide(Layer.merge(ProcessRunnerLive, reporter)));
	return Layer.merge(reporter, docker);
};

const requiresDocker = (command: Command): boolean => command.kind !== "diagram";

/**
 * Route a parsed command to its program.
 */
export function executeCommand(
	command: Command,
): Effect.Effect<ExitCode, AppError, Docker | Reporter> {
	return match<Command, Effect.Effect<ExitCode, AppError, Docker | Reporter>>(
		command,
	)
		.with({ kind: "make" }, (make) => runMake(make))
		.with({ kind: "run" }, (run) => runSimulation(run))
		.with({ kind: "debug" }, (debug) => runDebugger(debug))
		.with({ kind: "pull" }, (pull) => runPull(pull))
		.with({ kind: "prune" }, (prune) => runPrune(prune))
		.with({ kind: "diagram" }, (diagram) => runDiagram(diagram))
		.exhaustive();
}

const reportUsageError = (
	error: UsageError,
): Effect.Effect<ExitCode, never, Reporter> =>
	Effect.gen(function* () {
		const reporter = yield* Reporter;
		yield* reporter.printError(error.usage);
		yield* reporter.error(error.message);
		return USAGE_EXIT_CODE;
	});

/**
 * Render an application error and choose the exit code.
 *
 * @returns 2 for usage errors, 1 otherwise
 */
export function reportError(
	error: AppError,
): Effect.Effect<ExitCode, never, Reporter> {
	if (error._tag === "UsageError") return reportUsageError(error);
	return Effect.gen(function* () {
		const reporter = yield* Reporter;
		yield* reporter.error(describeError(error));
		yield* reporter.debug(error.stack ?? error._tag);
		return FAILURE_EXIT_CODE;
	});
}

const runInvocation = (
	invocation: Invocation,
): Effect.Effect<ExitCode, never, Docker | Reporter> =>
	Effect.gen(function* () {
		const reporter = yield* Reporter;
		if (invocation.kind !== "command") {
			yield* reporter.print(invocation.text);
			return 0;
		}
		const command = invocation.command;
		if (requiresDocker(command)) {
			const available = yield* checkDockerAvailable();
			if (!available) return FAILURE_EXIT_CODE;
		}
		return yield* executeCommand(command).pipe(Effect.catchAll(reportError));
	});

/**
 * Whole CLI as one effect.
 *
 * @param argv - arguments after the program name
 * @param layerFor - service factory; tests pass fakes here
 * @returns exit code; never fails
 *
 * @example
 * ```ts
 * const code = await Effect.runPromise(
 *   runCli(["project", "make", "all"], { cwd, env: process.env, interactive: true, color: true }),
 * );
 * ```
 */
export function runCli(
	argv: readonly string[],
	context: CliContext,
	layerFor: CliLayerFactory = liveLayer,
): Effect.Effect<ExitCode> {
	const settings = settingsFromEnv(context.env);
	return Either.match(parseArgv(argv, { cwd: context.cwd, settings }), {
		onLeft: (error) =>
			reportUsageError(error).pipe(
				Effect.provide(layerFor(settings, settings.debug, context)),
			),
		onRight: (invocation) =>
			runInvocation(invocation).pipe(
				Effect.provide(
					layerFor(
						settings,
						invocation.kind === "command" ? invocation.debug : settings.debug,
						context,
					),
				),
			),
	});
}
