// CHANGE: Usage and help screens rendered from the command table
// PURITY: CORE
// INVARIANT: Output depends only on the table; no terminal width probing
// COMPLEXITY: O(n) where n = options + positionals of the level rendered

import {
	type CommandSpec,
	commandsOf,
	DEBUG_OPTION,
	GLOBAL_OPTIONS,
	GROUPS,
	type GroupSpec,
	HELP_OPTION,
	type OptionSpec,
	type PositionalSpec,
	PROGRAM_NAME,
	VERSION,
} from "./spec.js";

const HELP_COLUMN = 24;

function optionValueLabel(option: OptionSpec): string {
	if (option.choices !== undefined) return `{${option.choices.join(",")}}`;
	return option.metavar ?? option.dest.toUpperCase();
}

function optionUsage(option: OptionSpec): string {
	const flag = option.flags[0] ?? option.dest;
	const label = optionValueLabel(option);
	switch (option.arity) {
		case "flag":
			return `[${flag}]`;
		case "single":
			return `[${flag} ${label}]`;
		case "some":
			return `[${flag} ${label} [${label} ...]]`;
	}
}

function positionalUsage(positional: PositionalSpec): string {
	switch (positional.arity) {
		case "optional":
			return `[${positional.metavar}]`;
		case "required":
			return positional.metavar;
		case "many":
			return `[${positional.metavar} ...]`;
	}
}

/**
 * One-line usage for the level reached so far.
 *
 * @example
 * ```ts
 * renderUsage(project, make);
 * // "usage: metalbox project make [-h] [-d] [-p PROJECT] ... [TARGET]"
 * ```
 */
export function renderUsage(
	group: GroupSpec | undefined,
	command: CommandSpec | undefined,
): string {
	const globals = [HELP_OPTION, DEBUG_OPTION].map(optionUsage);

	if (group === undefined) {
		const groups = `{${GROUPS.map((g) => g.name).join(",")}}`;
		return ["usage:", PROGRAM_NAME, ...globals, "[--version]", groups, "..."].join(" ");
	}
	if (command === undefined) {
		const commands = `{${commandsOf(group).map((c) => c.name).join(",")}}`;
		return ["usage:", PROGRAM_NAME, group.name, ...globals, commands, "..."].join(" ");
	}
	return [
		"usage:",
		PROGRAM_NAME,
		group.name,
		command.name,
		...globals,
		...command.options.map(optionUsage),
		...command.positionals.map(positionalUsage),
	].join(" ");
}

function helpLine(label: string, help: string): string {
	const indented = `  ${label}`;
	return indented.length < HELP_COLUMN - 1
		? `${indented.padEnd(HELP_COLUMN)}${help}`
		: `${indented}\n${" ".repeat(HELP_COLUMN)}${help}`;
}

function optionLabel(option: OptionSpec): string {
	if (option.arity === "flag") return option.flags.join(", ");
	const label = optionValueLabel(option);
	const suffix = option.arity === "some" ? ` ${label} [${label} ...]` : ` ${label}`;
	return option.flags.map((flag) => `${flag}${suffix}`).join(", ");
}

function withAliases(entry: {
	readonly name: string;
	readonly aliases: readonly string[];
}): string {
	return entry.aliases.length === 0
		? entry.name
		: `${entry.name} (${entry.aliases.join(", ")})`;
}

/**
 * Full help screen for the level reached so far.
 */
export function renderHelp(
	group: GroupSpec | undefined,
	command: CommandSpec | undefined,
): string {
	const lines: string[] = [renderUsage(group, command), ""];

	if (group === undefined) {
		lines.push("commands:");
		lines.push(...GROUPS.map((g) => helpLine(withAliases(g), g.help)));
	} else if (command === undefined) {
		lines.push(group.help, "", "commands:");
		lines.push(...commandsOf(group).map((c) => helpLine(withAliases(c), c.help)));
	} else {
		lines.push(command.description);
		if (command.positionals.length > 0) {
			lines.push("", "positional arguments:");
			lines.push(...command.positionals.map((p) => helpLine(p.metavar, p.help)));
		}
	}

	lines.push("", "options:");
	lines.push(...GLOBAL_OPTIONS.map((o) => helpLine(optionLabel(o), o.help)));

	if (command !== undefined && command.options.length > 0) {
		lines.push("", "command-specific options:");
		lines.push(...command.options.map((o) => helpLine(optionLabel(o), o.help)));
	}
	if (command?.epilog !== undefined) {
		lines.push("", command.epilog);
	}
	return lines.join("\n");
}

export function renderVersion(): string {
	return `${PROGRAM_NAME}-v${VERSION}`;
}
