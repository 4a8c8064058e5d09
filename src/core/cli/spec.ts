// CHANGE: Data-driven description of the command line surface
// PURITY: CORE
// INVARIANT: Every command belongs to exactly one group; names and aliases are unique within a group
// COMPLEXITY: O(1)

import {
	MAKE_TARGETS,
	OPTIMIZATION_LEVELS,
	SECTION_WIDTHS,
} from "../models.js";

export const PROGRAM_NAME = "metalbox";

export const VERSION = "1.2.2";

/**
 * How many values an option consumes.
 *
 * - flag: none, sets `true`
 * - single: exactly one
 * - some: one or more, up to the next option-looking token
 */
export type OptionArity = "flag" | "single" | "some";

export interface OptionSpec {
	readonly flags: readonly string[];
	readonly dest: string;
	readonly help: string;
	readonly arity: OptionArity;
	readonly metavar?: string;
	readonly choices?: readonly string[];
}

/**
 * - optional: zero or one value
 * - required: exactly one value
 * - many: any number of values
 */
export type PositionalArity = "optional" | "required" | "many";

export interface PositionalSpec {
	readonly dest: string;
	readonly metavar: string;
	readonly help: string;
	readonly arity: PositionalArity;
	readonly choices?: readonly string[];
}

export type GroupName = "project" | "utility";

export type CommandName =
	| "make"
	| "run"
	| "debug"
	| "pull"
	| "prune"
	| "opcode"
	| "register";

export interface GroupSpec {
	readonly name: GroupName;
	readonly aliases: readonly string[];
	readonly help: string;
}

export interface CommandSpec {
	readonly name: CommandName;
	readonly group: GroupName;
	readonly aliases: readonly string[];
	readonly help: string;
	readonly description: string;
	readonly options: readonly OptionSpec[];
	readonly positionals: readonly PositionalSpec[];
	readonly epilog?: string;
}

export const HELP_OPTION: OptionSpec = {
	flags: ["-h", "--help"],
	dest: "help",
	help: "show this help message and exit",
	arity: "flag",
};

export const DEBUG_OPTION: OptionSpec = {
	flags: ["-d"],
	dest: "debug",
	help: "enable logging verbose debug messages",
	arity: "flag",
};

export const VERSION_OPTION: OptionSpec = {
	flags: ["--version"],
	dest: "version",
	help: "display metalbox version info",
	arity: "flag",
};

/** Options understood at every level of the command tree. */
export const GLOBAL_OPTIONS: readonly OptionSpec[] = [
	HELP_OPTION,
	DEBUG_OPTION,
	VERSION_OPTION,
];

const projectOption: OptionSpec = {
	flags: ["-p"],
	dest: "workdir",
	metavar: "PROJECT",
	help: "path to the project (default: current directory)",
	arity: "single",
};

const imageOption: OptionSpec = {
	flags: ["-i"],
	dest: "image",
	metavar: "IMAGE",
	help: "override Docker image repository (default: $METALBOX_IMAGE or metalbox/backend)",
	arity: "single",
};

const tagOption: OptionSpec = {
	flags: ["-t"],
	dest: "tag",
	metavar: "TAG",
	help: "override Docker image tag (default: $METALBOX_TAG or latest)",
	arity: "single",
};

const fieldHelp =
	'The --field option may be used to manually describe fields in the form "{name}[hi{:lo}]{=value}". ' +
	'For example, "sf[31]" describes a one-bit field named "sf" at bit position 31, while ' +
	'"Rn[9:5]=0x5" describes a 5-bit wide field named "Rn" spanning bit positions 9 to 5 inclusive ' +
	'and with value 0x5. The name is also optional, so "[31]" describes an anonymous bit at position 31 ' +
	'with no value, while "[31:30]=0x3" describes an anonymous field spanning bits 31 to 30 inclusive ' +
	"with value 0x3.";

function diagramOptions(
	subject: string,
	overlayTarget: string,
): readonly OptionSpec[] {
	return [
		{
			flags: ["--field"],
			dest: "field",
			metavar: "F",
			help: `manually describe ${subject} (see below)`,
			arity: "some",
		},
		{
			flags: ["-s"],
			dest: "sectionWidth",
			help: "how many bits wide each section should be (default: 32)",
			arity: "single",
			choices: SECTION_WIDTHS.map(String),
		},
		{
			flags: ["--value"],
			dest: "value",
			metavar: "NUM",
			help: `overlay the given value over the entire ${overlayTarget}`,
			arity: "single",
		},
		{
			flags: ["--ascii"],
			dest: "ascii",
			help: "dump rendered ASCII diagram to stdout (default)",
			arity: "flag",
		},
	];
}

export const GROUPS: readonly GroupSpec[] = [
	{
		name: "project",
		aliases: ["proj", "p"],
		help: "build, run, disassemble, and debug bare metal projects",
	},
	{
		name: "utility",
		aliases: ["util", "u"],
		help: "utilities such as generating diagrams of instruction opcodes and system registers",
	},
];

export const COMMANDS: readonly CommandSpec[] = [
	{
		name: "make",
		group: "project",
		aliases: [],
		help: "invoke project Makefile",
		description: "Invokes a bare metal project Makefile inside the backend container.",
		options: [
			projectOption,
			imageOption,
			tagOption,
			{
				flags: ["-S"],
				dest: "interleave",
				help: "interleave source with disassembly (only available for 'dis' target)",
				arity: "flag",
			},
			{
				flags: ["-O"],
				dest: "optimize",
				help: "override project's default optimization level",
				arity: "single",
				choices: OPTIMIZATION_LEVELS.map(String),
			},
		],
		positionals: [
			{
				dest: "target",
				metavar: "TARGET",
				help: `Makefile target from {${MAKE_TARGETS.join(",")}} (default: all)`,
				arity: "optional",
				choices: MAKE_TARGETS,
			},
		],
	},
	{
		name: "run",
		group: "project",
		aliases: [],
		help: "run project on simulated hardware",
		description: "Runs a bare metal project on a simulated Raspberry Pi 3b.",
		options: [
			projectOption,
			imageOption,
			tagOption,
			{
				flags: ["-s"],
				dest: "spawnGdbServer",
				help: "spawn GDB debug server and pause simulation at kernel entrypoint",
				arity: "flag",
			},
		],
		positionals: [],
	},
	{
		name: "debug",
		group: "project",
		aliases: [],
		help: "attach debugger to live simulation",
		description: `Attaches an LLDB debug session to a live QEMU simulation started by \`${PROGRAM_NAME} project run -s\`.`,
		options: [],
		positionals: [
			{
				dest: "containerId",
				metavar: "CONTAINER",
				help: `container in which the QEMU simulation is running, as given by \`${PROGRAM_NAME} project run -s\``,
				arity: "required",
			},
		],
	},
	{
		name: "pull",
		group: "project",
		aliases: [],
		help: "pull the latest Docker image",
		description: "Pulls the backend Docker image from its registry.",
		options: [imageOption, tagOption],
		positionals: [],
	},
	{
		name: "prune",
		group: "project",
		aliases: [],
		help: "clean up any lingering Docker containers",
		description: `Cleans up any lingering Docker containers from previous ${PROGRAM_NAME} invocations.`,
		options: [],
		positionals: [],
	},
	{
		name: "opcode",
		group: "utility",
		aliases: ["op", "o"],
		help: "generate diagrams of instruction opcode encodings",
		description: "Generates diagrams of instruction opcode encodings.",
		options: diagramOptions(
			"an instruction opcode",
			"instruction opcode encoding",
		),
		positionals: [
			{
				dest: "name",
				metavar: "NAME",
				help: 'name of the instruction (example: "add")',
				arity: "many",
			},
		],
		epilog: fieldHelp,
	},
	{
		name: "register",
		group: "utility",
		aliases: ["reg", "r"],
		help: "generate diagrams of system registers",
		description: "Generates diagrams of system registers.",
		options: diagramOptions("a system register", "system register"),
		positionals: [
			{
				dest: "name",
				metavar: "NAME",
				help: 'name of the system register (example: "hcr_el2")',
				arity: "many",
			},
		],
		epilog: fieldHelp,
	},
];

const matchesName = (
	entry: { readonly name: string; readonly aliases: readonly string[] },
	token: string,
): boolean => entry.name === token || entry.aliases.includes(token);

export function findGroup(token: string): GroupSpec | undefined {
	return GROUPS.find((group) => matchesName(group, token));
}

export function commandsOf(group: GroupSpec): readonly CommandSpec[] {
	return COMMANDS.filter((command) => command.group === group.name);
}

export function findCommand(
	group: GroupSpec,
	token: string,
): CommandSpec | undefined {
	return commandsOf(group).find((command) => matchesName(command, token));
}

export function findOption(
	options: readonly OptionSpec[],
	flag: string,
): OptionSpec | undefined {
	return options.find((option) => option.flags.includes(flag));
}
