// CHANGE: Unit tests for usage and help rendering

import { describe, expect, it } from "vitest";

import {
	renderHelp,
	renderUsage,
	renderVersion,
} from "../../../src/core/cli/help.js";
import { findCommand, findGroup } from "../../../src/core/cli/spec.js";

const project = findGroup("project");
const utility = findGroup("u");

describe("renderUsage", () => {
	it("lists every option form of a command", () => {
		expect(utility).toBeDefined();
		if (utility === undefined) return;
		expect(renderUsage(utility, findCommand(utility, "opcode"))).toBe(
			"usage: metalbox utility opcode [-h] [-d] [--field F [F ...]] [-s {8,16,32,64}] [--value NUM] [--ascii] [NAME ...]",
		);
	});

	it("lists the commands of a group", () => {
		expect(renderUsage(utility, undefined)).toBe(
			"usage: metalbox utility [-h] [-d] {opcode,register} ...",
		);
	});
});

describe("renderHelp", () => {
	it("renders the top-level screen with aliases", () => {
		expect(renderHelp(undefined, undefined).split("\n")).toEqual([
			"usage: metalbox [-h] [-d] [--version] {project,utility} ...",
			"",
			"commands:",
			"  project (proj, p)     build, run, disassemble, and debug bare metal projects",
			"  utility (util, u)     utilities such as generating diagrams of instruction opcodes and system registers",
			"",
			"options:",
			"  -h, --help            show this help message and exit",
			"  -d                    enable logging verbose debug messages",
			"  --version             display metalbox version info",
		]);
	});

	it("renders a command without options or positionals", () => {
		expect(project).toBeDefined();
		if (project === undefined) return;
		expect(renderHelp(project, findCommand(project, "prune"))).toBe(
			[
				"usage: metalbox project prune [-h] [-d]",
				"",
				"Cleans up any lingering Docker containers from previous metalbox invocations.",
				"",
				"options:",
				"  -h, --help            show this help message and exit",
				"  -d                    enable logging verbose debug messages",
				"  --version             display metalbox version info",
			].join("\n"),
		);
	});

	it("renders positionals, command options and the epilog", () => {
		if (project === undefined || utility === undefined) return;
		const debug = renderHelp(project, findCommand(project, "debug")).split("\n");
		expect(debug).toContain("positional arguments:");
		expect(debug).toContain(
			"  CONTAINER             container in which the QEMU simulation is running, as given by `metalbox project run -s`",
		);

		const opcode = renderHelp(utility, findCommand(utility, "opcode")).split("\n");
		expect(opcode).toContain("command-specific options:");
		expect(opcode).toContain(
			"  --field F [F ...]     manually describe an instruction opcode (see below)",
		);
		expect(opcode.at(-1)?.startsWith("The --field option may be used")).toBe(true);
	});
});

describe("renderVersion", () => {
	it("prints the program name and version", () => {
		expect(renderVersion()).toBe("metalbox-v1.2.2");
	});
});
