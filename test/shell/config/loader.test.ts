import { afterEach, describe, expect, it, vi } from "vitest";

import {
	CONFIG_FILE_NAME,
	loadUtilitiesConfig,
	validateConfig,
} from "../../../src/shell/config/loader.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

describe("loadUtilitiesConfig", () => {
	let project: TempProject | undefined;

	afterEach(() => {
		project?.cleanup();
		project = undefined;
	});

	it("returns defaults without a config file", () => {
		project = createTempProject();
		expect(loadUtilitiesConfig(project.cwd)).toEqual({ contextAttributes: {} });
	});

	it("reads appRoot and context attributes", () => {
		project = createTempProject({
			[CONFIG_FILE_NAME]: JSON.stringify({
				appRoot: "app",
				contextAttributes: { shared: "/work/shared" },
			}),
		});
		expect(loadUtilitiesConfig(project.cwd)).toEqual({
			appRoot: "app",
			contextAttributes: { shared: "/work/shared" },
		});
	});

	it("falls back to defaults on malformed JSON", () => {
		const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
		project = createTempProject({ [CONFIG_FILE_NAME]: "{ not json" });

		expect(loadUtilitiesConfig(project.cwd)).toEqual({ contextAttributes: {} });
		expect(errorSpy).toHaveBeenCalledTimes(1);
	});
});

describe("validateConfig", () => {
	it("drops attributes that are not strings", () => {
		const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

		expect(
			validateConfig({ appRoot: 3, contextAttributes: { ok: "/x", bad: 1 } }),
		).toEqual({ contextAttributes: { ok: "/x" } });
		expect(warnSpy.mock.calls.map((call) => call[0])).toEqual([
			"⚠️  appRoot must be a string, ignoring it",
			"⚠️  contextAttributes.bad must be a string, ignoring it",
		]);
	});

	it("uses defaults for a non-object document", () => {
		vi.spyOn(console, "warn").mockImplementation(() => {});
		expect(validateConfig([1, 2])).toEqual({ contextAttributes: {} });
	});
});
