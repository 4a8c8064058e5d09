// CHANGE: Unit tests for environment-derived settings

import { describe, expect, it } from "vitest";

import { DEFAULT_SETTINGS, settingsFromEnv } from "../../../src/core/config/settings.js";

describe("settingsFromEnv", () => {
	it("falls back to defaults for an empty environment", () => {
		expect(settingsFromEnv({})).toEqual(DEFAULT_SETTINGS);
	});

	it("reads and trims every variable", () => {
		expect(
			settingsFromEnv({
				METALBOX_IMAGE: " mirror/backend ",
				METALBOX_TAG: "v2",
				METALBOX_DEBUG: "TRUE",
				METALBOX_DOCKER: "/usr/local/bin/podman",
			}),
		).toEqual({
			image: "mirror/backend",
			tag: "v2",
			debug: true,
			docker: "/usr/local/bin/podman",
		});
	});

	it("treats blank values as unset", () => {
		expect(settingsFromEnv({ METALBOX_IMAGE: "   ", METALBOX_TAG: "" })).toEqual(
			DEFAULT_SETTINGS,
		);
	});

	it("accepts only 1, true and yes as debug switches", () => {
		expect(settingsFromEnv({ METALBOX_DEBUG: "1" }).debug).toBe(true);
		expect(settingsFromEnv({ METALBOX_DEBUG: "yes" }).debug).toBe(true);
		expect(settingsFromEnv({ METALBOX_DEBUG: "0" }).debug).toBe(false);
		expect(settingsFromEnv({ METALBOX_DEBUG: "on" }).debug).toBe(false);
	});
});
