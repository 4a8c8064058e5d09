#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { runCli } from "../app/main.js";

/**
 * CLI entry point for metalbox.
 *
 * @remarks
 * - @invariant exit code is the command's status, 2 on usage errors
 * - @postcondition process terminates exactly once
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(
			runCli(process.argv.slice(2), {
				cwd: process.cwd(),
				env: process.env,
				interactive: process.stdin.isTTY === true,
				color: process.stdout.isTTY === true && process.env["NO_COLOR"] === undefined,
			}),
		);
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
