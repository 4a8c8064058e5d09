// CHANGE: Tests for the child_process runner using the current Node binary as the child
// INVARIANT: Children are short-lived scripts; nothing outside this machine is reached

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { ExecError } from "../../../src/core/errors.js";
import { spawnProcess } from "../../../src/shell/process/runner.js";

describe("spawnProcess", () => {
	it("captures output and the exit status", async () => {
		const result = await Effect.runPromise(
			spawnProcess(
				process.execPath,
				["-e", "process.stdout.write('out'); process.stderr.write('err'); process.exitCode = 4"],
				"capture",
			),
		);
		expect(result).toEqual({ exitCode: 4, stdout: "out", stderr: "err" });
	});

	it("maps death by signal to 128 + signal number", async () => {
		const result = await Effect.runPromise(
			spawnProcess(process.execPath, ["-e", "process.kill(process.pid, 'SIGTERM')"], "capture"),
		);
		expect(result.exitCode).toBe(143);
	});

	it("fails with ExecError when the binary cannot be spawned", async () => {
		const error = await Effect.runPromise(
			Effect.flip(spawnProcess("metalbox-no-such-binary", ["--version"], "capture")),
		);
		expect(error).toEqual(
			new ExecError({
				command: "metalbox-no-such-binary --version",
				detail: "spawn metalbox-no-such-binary ENOENT",
			}),
		);
	});
});
