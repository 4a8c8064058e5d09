// CHANGE: Unit tests for project metadata validation

import { describe, expect, it } from "vitest";

import {
	defaultOptimization,
	parseProjectMetadata,
	runSupport,
	runSupportWarning,
} from "../../../src/core/project/metadata.js";

describe("parseProjectMetadata", () => {
	it("reads the optimisation level and run support", () => {
		expect(parseProjectMetadata('{ "optimize": 2, "supports-run": true }')).toEqual({
			kind: "found",
			metadata: { optimize: 2, supportsRun: true },
		});
	});

	it("ignores out-of-range values and unknown keys", () => {
		expect(
			parseProjectMetadata('{ "optimize": 7, "supports-run": "yes", "name": "uart" }'),
		).toEqual({
			kind: "found",
			metadata: { optimize: undefined, supportsRun: false },
		});
	});

	it("reports invalid JSON and non-objects", () => {
		expect(parseProjectMetadata("{ optimize: 2")).toEqual({
			kind: "invalid",
			reason: "failed to parse the project's 'metalbox.json' file",
		});
		expect(parseProjectMetadata("[1, 2]")).toEqual({
			kind: "invalid",
			reason: "'metalbox.json' must contain a JSON object",
		});
	});
});

describe("defaultOptimization", () => {
	it("prefers the project's level and falls back to 1", () => {
		expect(defaultOptimization({ optimize: 0, supportsRun: true })).toBe(0);
		expect(defaultOptimization({ optimize: undefined, supportsRun: true })).toBe(1);
		expect(defaultOptimization(undefined)).toBe(1);
	});
});

describe("runSupport", () => {
	it("warns unless the project declares support", () => {
		expect(runSupportWarning(runSupport({ optimize: 1, supportsRun: true }))).toBeUndefined();
		expect(runSupportWarning(runSupport({ optimize: 1, supportsRun: false }))).toBe(
			"Project config file states it does not support being run on QEMU.",
		);
		expect(runSupportWarning(runSupport(undefined))).toBe(
			"Unable to determine whether this project supports being run on QEMU.",
		);
	});
});
