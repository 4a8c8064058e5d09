// CHANGE: Commands run inside the backend container (make, QEMU, LLDB)
// PURITY: CORE
// INVARIANT: All tools read and write paths relative to the mounted project root
// COMPLEXITY: O(1)

import type { MakeTarget, OptimizationLevel } from "../models.js";

/** Linked kernel image produced by every project Makefile. */
export const KERNEL_ELF = "build/out.elf";

/** QEMU's `-s` shorthand listens for GDB on this port. */
export const GDB_PORT = 1234;

export const FALLBACK_OPTIMIZATION: OptimizationLevel = 1;

export interface ContainerInvocation {
	readonly command: readonly string[];
	readonly env: Readonly<Record<string, string>>;
}

/**
 * `make <target>` with the optimisation level (and interleave switch) passed
 * through the environment.
 *
 * @invariant INTERLEAVE is only ever set for the `dis` target
 */
export function makeInvocation(
	target: MakeTarget,
	optimize: OptimizationLevel,
	interleave: boolean,
): ContainerInvocation {
	const env: Record<string, string> = { OPTIMIZE: String(optimize) };
	if (target === "dis" && interleave) {
		env["INTERLEAVE"] = "1";
	}
	return { command: ["make", target], env };
}

/**
 * QEMU simulating a Raspberry Pi 3b; with the GDB server the CPU is halted
 * at the kernel entrypoint until a debugger continues it.
 */
export function qemuCommand(spawnGdbServer: boolean): readonly string[] {
	const base = [
		"qemu-system-aarch64",
		"-M",
		"raspi3b",
		"-nographic",
		"-kernel",
		KERNEL_ELF,
	];
	return spawnGdbServer ? [...base, "-s", "-S"] : base;
}

export function lldbCommand(): readonly string[] {
	return [
		"lldb",
		"-Q",
		"--one-line",
		`gdb-remote localhost:${GDB_PORT}`,
		KERNEL_ELF,
	];
}
