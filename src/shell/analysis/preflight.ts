// CHANGE: Preflight check that the docker CLI is installed and reachable
// PURITY: SHELL (executes `docker --version`, console output)
// EFFECT: Effect<boolean, never, Docker | Reporter>
// INVARIANT: Project commands never touch containers when this returns false
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { describeError } from "../../core/errors.js";
import { Docker } from "../docker/client.js";
import { Reporter } from "../output/reporter.js";

const INSTALL_GUIDANCE = [
	"Docker is required to build, run and debug projects.",
	"Install: https://docs.docker.com/get-docker/",
	"Verify:  docker --version",
	"If Docker is installed under another name, set METALBOX_DOCKER to its path.",
];

/**
 * Probe the docker CLI, printing install guidance when it is missing.
 *
 * @returns true when docker answered `--version`
 */
export function checkDockerAvailable(): Effect.Effect<
	boolean,
	never,
	Docker | Reporter
> {
	return Effect.gen(function* () {
		const docker = yield* Docker;
		const reporter = yield* Reporter;
		return yield* docker.version().pipe(
			Effect.tap((version) => reporter.debug(`found ${version}`)),
			Effect.as(true),
			Effect.catchAll((error) =>
				Effect.gen(function* () {
					yield* reporter.error(`docker is not available (${describeError(error)})`);
					for (const line of INSTALL_GUIDANCE) {
						yield* reporter.info(`  ${line}`);
					}
					return false;
				}),
			),
		);
	});
}
