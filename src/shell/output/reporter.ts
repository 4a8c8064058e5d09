// CHANGE: Console-backed reporter service for all user-facing output
// PURITY: SHELL (console I/O)
// INVARIANT: debug() prints nothing unless debug mode is on; warnings and errors go to stderr
// COMPLEXITY: O(n) where n = message length

import { Context, Effect, Layer } from "effect";

export interface ReporterService {
	readonly info: (message: string) => Effect.Effect<void>;
	readonly warn: (message: string) => Effect.Effect<void>;
	readonly error: (message: string) => Effect.Effect<void>;
	readonly debug: (message: string) => Effect.Effect<void>;
	/** Raw stdout output (diagrams, help screens, panels). */
	readonly print: (text: string) => Effect.Effect<void>;
	/** Raw stderr output (usage lines). */
	readonly printError: (text: string) => Effect.Effect<void>;
}

export class Reporter extends Context.Tag("Reporter")<
	Reporter,
	ReporterService
>() {}

export interface ReporterOptions {
	readonly debug: boolean;
	readonly color: boolean;
}

const ANSI = {
	green: "\u001b[32m",
	yellow: "\u001b[33m",
	red: "\u001b[31m",
	dim: "\u001b[2m",
	reset: "\u001b[0m",
} as const;

type Tone = Exclude<keyof typeof ANSI, "reset">;

/**
 * Build a reporter that writes through `console`.
 *
 * @example
 * ```ts
 * const reporter = makeConsoleReporter({ debug: false, color: false });
 * Effect.runSync(reporter.warn("project has no metalbox.json"));
 * // stderr: "warning: project has no metalbox.json"
 * ```
 */
export function makeConsoleReporter(options: ReporterOptions): ReporterService {
	const paint = (tone: Tone, text: string): string =>
		options.color ? `${ANSI[tone]}${text}${ANSI.reset}` : text;

	return {
		info: (message) => Effect.sync(() => console.log(paint("green", message))),
		warn: (message) =>
			Effect.sync(() => console.error(paint("yellow", `warning: ${message}`))),
		error: (message) =>
			Effect.sync(() => console.error(paint("red", `error: ${message}`))),
		debug: (message) =>
			options.debug
				? Effect.sync(() => console.error(paint("dim", `[debug] ${message}`)))
				: Effect.void,
		print: (text) => Effect.sync(() => console.log(text)),
		printError: (text) => Effect.sync(() => console.error(text)),
	};
}

export const makeReporterLayer = (
	options: ReporterOptions,
): Layer.Layer<Reporter> => Layer.succeed(Reporter, makeConsoleReporter(options));
