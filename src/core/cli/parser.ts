// CHANGE: Table-driven argv parser producing a typed Invocation
// PURITY: CORE
// EFFECT: Either<Invocation, UsageError>
// INVARIANT: ∀ argv: parseArgv(argv) is Right(invocation) ∨ Left(UsageError); never throws
// COMPLEXITY: O(n) where n = |argv|

import * as path from "node:path";
import { Either } from "effect";

import { UsageError } from "../errors.js";
import {
	type Command,
	type Invocation,
	MAKE_TARGETS,
	OPTIMIZATION_LEVELS,
	SECTION_WIDTHS,
	type Settings,
} from "../models.js";
import { renderHelp, renderUsage, renderVersion } from "./help.js";
import {
	type CommandName,
	type CommandSpec,
	findCommand,
	findGroup,
	findOption,
	GLOBAL_OPTIONS,
	GROUPS,
	type GroupSpec,
	type OptionSpec,
	commandsOf,
} from "./spec.js";

/** Value collected for a single destination. */
export type RawValue = boolean | string | readonly string[];

export type RawValues = Readonly<Record<string, RawValue>>;

/** Inputs that seed defaults which depend on the environment. */
export interface ParseContext {
	readonly cwd: string;
	readonly settings: Settings;
}

type ParseResult<A> = Either.Either<A, UsageError>;

const quoteList = (items: readonly string[]): string =>
	items.map((item) => `'${item}'`).join(", ");

const isOptionToken = (token: string): boolean =>
	token.startsWith("-") && token.length > 1;

/**
 * Split `--long=value` and `-Xvalue` into flag and inline value.
 *
 * @invariant token starts with "-"
 */
function splitOptionToken(token: string): {
	readonly flag: string;
	readonly inline: string | undefined;
} {
	if (token.startsWith("--")) {
		const eq = token.indexOf("=");
		return eq === -1
			? { flag: token, inline: undefined }
			: { flag: token.slice(0, eq), inline: token.slice(eq + 1) };
	}
	return token.length > 2
		? { flag: token.slice(0, 2), inline: token.slice(2) }
		: { flag: token, inline: undefined };
}

function checkChoice(
	label: string,
	value: string,
	choices: readonly string[] | undefined,
	usage: string,
): ParseResult<string> {
	if (choices === undefined || choices.includes(value)) {
		return Either.right(value);
	}
	return Either.left(
		new UsageError({
			message: `argument ${label}: invalid choice: '${value}' (choose from ${quoteList(choices)})`,
			usage,
		}),
	);
}

interface Consumed {
	readonly value: RawValue;
	readonly next: number;
}

/**
 * Consume the option at argv[index] and its values.
 *
 * @returns the collected value and the index of the last consumed token
 */
function consumeOption(
	option: OptionSpec,
	flag: string,
	inline: string | undefined,
	argv: readonly string[],
	index: number,
	usage: string,
): ParseResult<Consumed> {
	const label = option.flags.join("/");
	const fail = (message: string): ParseResult<Consumed> =>
		Either.left(new UsageError({ message: `argument ${label}: ${message}`, usage }));

	switch (option.arity) {
		case "flag":
			return inline === undefined
				? Either.right({ value: true, next: index })
				: fail(`ignored explicit argument '${inline}'`);
		case "single": {
			const candidate = inline ?? argv[index + 1];
			if (
				candidate === undefined ||
				(inline === undefined && isOptionToken(candidate))
			) {
				return fail("expected one argument");
			}
			const next = inline === undefined ? index + 1 : index;
			return Either.map(
				checkChoice(flag, candidate, option.choices, usage),
				(value) => ({ value, next }),
			);
		}
		case "some": {
			const values: string[] = inline === undefined ? [] : [inline];
			let next = index;
			while (next + 1 < argv.length) {
				const candidate = argv[next + 1] ?? "";
				if (isOptionToken(candidate)) break;
				values.push(candidate);
				next += 1;
			}
			return values.length === 0
				? fail("expected at least one argument")
				: Either.right({ value: values, next });
		}
	}
}

/**
 * Assign collected positionals to the command's positional slots.
 */
function assignPositionals(
	command: CommandSpec,
	positionals: readonly string[],
	usage: string,
): ParseResult<Record<string, RawValue>> {
	const assigned: Record<string, RawValue> = {};
	let rest = positionals;

	for (const spec of command.positionals) {
		if (spec.arity === "many") {
			assigned[spec.dest] = rest;
			rest = [];
			continue;
		}
		const [first, ...remaining] = rest;
		if (first === undefined) {
			if (spec.arity === "required") {
				return Either.left(
					new UsageError({
						message: `the following arguments are required: ${spec.metavar}`,
						usage,
					}),
				);
			}
			continue;
		}
		const checked = checkChoice(spec.metavar, first, spec.choices, usage);
		if (Either.isLeft(checked)) return Either.left(checked.left);
		assigned[spec.dest] = checked.right;
		rest = remaining;
	}

	if (rest.length > 0) {
		return Either.left(
			new UsageError({
				message: `unrecognized arguments: ${rest.join(" ")}`,
				usage,
			}),
		);
	}
	return Either.right(assigned);
}

const stringOf = (values: RawValues, dest: string): string | undefined => {
	const value = values[dest];
	return typeof value === "string" ? value : undefined;
};

const flagOf = (values: RawValues, dest: string): boolean =>
	values[dest] === true;

const listOf = (
	values: RawValues,
	dest: string,
): readonly string[] | undefined => {
	const value = values[dest];
	return Array.isArray(value) ? value : undefined;
};

type Builder = (
	values: RawValues,
	context: ParseContext,
	usage: string,
) => ParseResult<Command>;

const workdirOf = (values: RawValues, context: ParseContext): string =>
	path.resolve(context.cwd, stringOf(values, "workdir") ?? context.cwd);

const imageOf = (
	values: RawValues,
	context: ParseContext,
): { readonly image: string; readonly tag: string } => ({
	image: stringOf(values, "image") ?? context.settings.image,
	tag: stringOf(values, "tag") ?? context.settings.tag,
});

const buildMake: Builder = (values, context, usage) => {
	const rawTarget = stringOf(values, "target") ?? "all";
	const target = MAKE_TARGETS.find((candidate) => candidate === rawTarget);
	const rawOptimize = stringOf(values, "optimize");
	const optimize = OPTIMIZATION_LEVELS.find(
		(level) => String(level) === rawOptimize,
	);
	const interleave = flagOf(values, "interleave");

	if (target === undefined) {
		return Either.left(
			new UsageError({ message: `invalid target '${rawTarget}'`, usage }),
		);
	}
	if (interleave && target !== "dis") {
		return Either.left(
			new UsageError({
				message: "-S only available for Makefile target 'dis'",
				usage,
			}),
		);
	}
	return Either.right({
		kind: "make",
		...imageOf(values, context),
		workdir: workdirOf(values, context),
		target,
		optimize,
		interleave,
	});
};

const buildRun: Builder = (values, context) =>
	Either.right({
		kind: "run",
		...imageOf(values, context),
		workdir: workdirOf(values, context),
		spawnGdbServer: flagOf(values, "spawnGdbServer"),
	});

const buildDebug: Builder = (values, _context, usage) => {
	const containerId = stringOf(values, "containerId");
	return containerId === undefined
		? Either.left(
				new UsageError({
					message: "the following arguments are required: CONTAINER",
					usage,
				}),
			)
		: Either.right({ kind: "debug", containerId });
};

const buildPull: Builder = (values, context) =>
	Either.right({ kind: "pull", ...imageOf(values, context) });

const buildPrune: Builder = () => Either.right({ kind: "prune" });

function diagramBuilder(diagram: "opcode" | "register"): Builder {
	const subject = diagram === "opcode" ? "instruction" : "register";
	const article = diagram === "opcode" ? "an" : "a";
	return (values, _context, usage) => {
		const names = listOf(values, "name") ?? [];
		const fields = listOf(values, "field");
		const fail = (message: string): ParseResult<Command> =>
			Either.left(new UsageError({ message, usage }));

		if (names.length > 0 && fields !== undefined) {
			return fail(
				`manually specifying fields using --field is mutually exclusive with specifying ${article} ${subject} name`,
			);
		}
		if (names.length > 1) {
			return fail(`expected exactly one ${subject} name`);
		}
		if (names.length === 0 && fields === undefined) {
			return fail(`expected ${article} ${subject} name or --field descriptions`);
		}
		const rawWidth = stringOf(values, "sectionWidth") ?? "32";
		const sectionWidth =
			SECTION_WIDTHS.find((width) => String(width) === rawWidth) ?? 32;
		return Either.right({
			kind: "diagram",
			diagram,
			name: names[0],
			fields,
			sectionWidth,
			value: stringOf(values, "value"),
		});
	};
}

const BUILDERS: Readonly<Record<CommandName, Builder>> = {
	make: buildMake,
	run: buildRun,
	debug: buildDebug,
	pull: buildPull,
	prune: buildPrune,
	opcode: diagramBuilder("opcode"),
	register: diagramBuilder("register"),
};

interface ScanState {
	debug: boolean;
	group: GroupSpec | undefined;
	command: CommandSpec | undefined;
	readonly values: Record<string, RawValue>;
	readonly positionals: string[];
}

/**
 * Resolve a non-option token before the command is known:
 * first the group, then the command within it.
 */
function selectCommandPath(
	state: ScanState,
	token: string,
): UsageError | undefined {
	const usage = renderUsage(state.group, undefined);
	if (state.group === undefined) {
		state.group = findGroup(token);
		return state.group === undefined
			? new UsageError({
					message: `invalid choice: '${token}' (choose from ${quoteList(GROUPS.map((g) => g.name))})`,
					usage,
				})
			: undefined;
	}
	const group = state.group;
	state.command = findCommand(group, token);
	return state.command === undefined
		? new UsageError({
				message: `invalid choice: '${token}' (choose from ${quoteList(commandsOf(group).map((c) => c.name))})`,
				usage,
			})
		: undefined;
}

/**
 * Parse the arguments that follow the program name.
 *
 * @param argv - process.argv without the runtime and script entries
 * @param context - working directory and environment-derived defaults
 *
 * @pure true
 * @invariant help/version short-circuit the parse at the level reached so far
 *
 * @example
 * ```ts
 * parseArgv(["project", "make", "dis", "-S"], context);
 * // Right({ kind: "command", command: { kind: "make", target: "dis", interleave: true, ... } })
 * ```
 */
export function parseArgv(
	argv: readonly string[],
	context: ParseContext,
): ParseResult<Invocation> {
	const state: ScanState = {
		debug: context.settings.debug,
		group: undefined,
		command: undefined,
		values: {},
		positionals: [],
	};

	for (let index = 0; index < argv.length; index++) {
		const token = argv[index] ?? "";
		if (token.length === 0) continue;

		const global = findOption(GLOBAL_OPTIONS, token);
		if (global?.dest === "version") {
			return Either.right({ kind: "version", text: renderVersion() });
		}
		if (global?.dest === "help") {
			return Either.right({
				kind: "help",
				text: renderHelp(state.group, state.command),
			});
		}
		if (global?.dest === "debug") {
			state.debug = true;
			continue;
		}

		const command = state.command;
		const usage = renderUsage(state.group, command);
		if (!isOptionToken(token)) {
			if (command === undefined) {
				const error = selectCommandPath(state, token);
				if (error !== undefined) return Either.left(error);
			} else {
				state.positionals.push(token);
			}
			continue;
		}

		const { flag, inline } = splitOptionToken(token);
		const option =
			command === undefined ? undefined : findOption(command.options, flag);
		if (option === undefined) {
			return Either.left(
				new UsageError({ message: `unrecognized arguments: ${token}`, usage }),
			);
		}
		const consumed = consumeOption(option, flag, inline, argv, index, usage);
		if (Either.isLeft(consumed)) return Either.left(consumed.left);
		state.values[option.dest] = consumed.right.value;
		index = consumed.right.next;
	}

	return finishParse(state, context);
}

function finishParse(
	state: ScanState,
	context: ParseContext,
): ParseResult<Invocation> {
	const { group, command } = state;
	if (group === undefined) {
		return Either.left(
			new UsageError({
				message: `missing command group (choose from ${quoteList(GROUPS.map((g) => g.name))})`,
				usage: renderUsage(undefined, undefined),
			}),
		);
	}
	if (command === undefined) {
		return Either.left(
			new UsageError({
				message: `missing command (choose from ${quoteList(commandsOf(group).map((c) => c.name))})`,
				usage: renderUsage(group, undefined),
			}),
		);
	}

	const usage = renderUsage(group, command);
	const debug = state.debug;
	return Either.flatMap(
		assignPositionals(command, state.positionals, usage),
		(positionals) =>
			Either.map(
				BUILDERS[command.name]({ ...state.values, ...positionals }, context, usage),
				(built): Invocation => ({ kind: "command", command: built, debug }),
			),
	);
}
