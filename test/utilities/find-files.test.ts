import * as fs from "node:fs";

import fc from "fast-check";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTransformationContext } from "../../src/core/context.js";
import { InvalidConfigurationError } from "../../src/core/errors.js";
import { relativePathOf } from "../../src/core/path/normalize.js";
import type { ExecutionResult } from "../../src/core/result.js";
import { FindFiles, NO_FILES_FOUND } from "../../src/utilities/find-files.js";
import { createTempProject, type TempProject } from "../utils/tempProject.js";

const context = createTransformationContext();

describe("FindFiles configuration", () => {
	it("forces recursion when a path regex is set", () => {
		const utility = new FindFiles().setRecursive(false).setPathRegex("sub");
		expect(utility.isRecursive()).toBe(true);
		expect(utility.getPathRegex()).toBe("sub");
	});

	it("clears the path regex when recursion is turned off", () => {
		const utility = new FindFiles({ nameRegex: ".*", pathRegex: "sub" });
		utility.setRecursive(false);
		expect(utility.getPathRegex()).toBeUndefined();
		expect(utility.isRecursive()).toBe(false);
	});

	it("keeps the invariants under any sequence of mutations", () => {
		const step = fc.oneof(
			fc.constantFrom("a", "b/.*", "src"),
			fc.boolean(),
		);
		fc.assert(
			fc.property(fc.array(step, { maxLength: 10 }), (steps) => {
				const utility = new FindFiles();
				for (const s of steps) {
					if (typeof s === "string") {
						utility.setPathRegex(s);
						expect(utility.isRecursive()).toBe(true);
					} else {
						utility.setRecursive(s);
						if (!s) expect(utility.getPathRegex()).toBeUndefined();
					}
				}
			}),
		);
	});

	it("rejects blank and invalid expressions at set time", () => {
		expect(() => new FindFiles().setNameRegex(" ")).toThrow(
			new InvalidConfigurationError({ message: "Name regex cannot be empty" }),
		);
		expect(() => new FindFiles().setPathRegex("")).toThrow(
			"Path regex cannot be empty",
		);
		expect(() => new FindFiles({ nameRegex: "(" })).toThrow(
			InvalidConfigurationError,
		);
	});

	it("describes the search root and recursion", () => {
		expect(new FindFiles({ nameRegex: ".*", recursive: false }).getDescription()).toBe(
			"Find files whose name and/or path match regular expression and are under the root folder only (not including sub-folders)",
		);
		expect(
			new FindFiles({ nameRegex: ".*", recursive: true })
				.relative("src/main")
				.getDescription(),
		).toBe(
			"Find files whose name and/or path match regular expression and are under src/main and sub-folders",
		);
	});
});

describe("FindFiles execution", () => {
	let project: TempProject;

	const relativeFiles = (result: ExecutionResult<readonly string[]>): readonly string[] =>
		result.tag === "Error"
			? []
			: result.value.map((file) => relativePathOf(project.cwd, file));

	beforeEach(() => {
		project = createTempProject({
			"a.txt": "",
			"b.log": "",
			"sub/c.txt": "",
		});
	});

	afterEach(() => {
		project.cleanup();
	});

	it("finds matching root files only when not recursive", () => {
		const utility = new FindFiles({ nameRegex: ".*\\.txt", recursive: false });
		const result = utility.execution(project.cwd, context);

		expect(result.tag).toBe("Value");
		expect(result.utility).toBe(utility);
		expect(relativeFiles(result)).toEqual(["a.txt"]);
	});

	it("finds files by directory path and becomes recursive", () => {
		const utility = new FindFiles().setPathRegex("sub");
		const result = utility.execution(project.cwd, context);

		expect(utility.isRecursive()).toBe(true);
		expect(result.tag).toBe("Value");
		expect(relativeFiles(result)).toEqual(["sub/c.txt"]);
	});

	it("searches under a relative root, matching paths from that root", () => {
		fs.mkdirSync(project.file("sub/deeper"));
		fs.writeFileSync(project.file("sub/deeper/e.txt"), "");
		const result = new FindFiles({ nameRegex: ".*\\.txt", pathRegex: "deeper" })
			.relative("sub")
			.execution(project.cwd, context);

		expect(relativeFiles(result)).toEqual(["sub/deeper/e.txt"]);
	});

	it("searches under a context attribute", () => {
		const shared = createTempProject({ "conf/app.properties": "" });
		try {
			const result = new FindFiles({ nameRegex: ".*\\.properties", recursive: true })
				.absolute("shared")
				.execution(project.cwd, createTransformationContext({ shared: shared.cwd }));
			expect(result.tag).toBe("Value");
			expect(result.tag !== "Error" && result.value).toEqual([
				shared.file("conf/app.properties"),
			]);
		} finally {
			shared.cleanup();
		}
	});

	it("warns with an empty list when nothing matches", () => {
		const result = new FindFiles({ nameRegex: ".*\\.java", recursive: true }).execution(
			project.cwd,
			context,
		);

		expect(result.tag).toBe("Warning");
		if (result.tag === "Warning") {
			expect(result.warningMessage).toBe(NO_FILES_FOUND);
			expect(result.value).toEqual([]);
		}
	});

	it("warns for an empty directory", () => {
		const empty = createTempProject();
		try {
			const result = new FindFiles().setRecursive(true).execution(empty.cwd, context);
			expect(result.tag).toBe("Warning");
		} finally {
			empty.cleanup();
		}
	});

	it("is idempotent on an unchanged tree", () => {
		const utility = new FindFiles({ nameRegex: ".*", recursive: true });
		const first = utility.execution(project.cwd, context);
		const second = utility.execution(project.cwd, context);

		expect(second.tag).toBe(first.tag);
		expect(relativeFiles(second)).toEqual(relativeFiles(first));
		expect(relativeFiles(first)).toEqual(["a.txt", "b.log", "sub/c.txt"]);
	});

	it("ignores a self-referencing link among the matches", () => {
		fs.symlinkSync(project.file("sub/loop"), project.file("sub/loop"));
		const result = new FindFiles({ nameRegex: ".*\\.txt", recursive: true }).execution(
			project.cwd,
			context,
		);

		expect(result.tag).toBe("Value");
		expect(relativeFiles(result)).toEqual(["a.txt", "sub/c.txt"]);
	});

	it("reports a missing search root as an ERROR result", () => {
		const result = new FindFiles().relative("missing").execution(project.cwd, context);

		expect(result.tag).toBe("Error");
		if (result.tag === "Error") {
			expect(result.failure.message).toBe(
				"Error happened when searching files under missing",
			);
			expect(result.failure.cause?.message).toMatch(/ENOENT/);
		}
	});

	it("reports an unknown context attribute as an ERROR result", () => {
		const result = new FindFiles().absolute("nowhere").execution(project.cwd, context);

		expect(result.tag).toBe("Error");
		if (result.tag === "Error") {
			expect(result.failure.message).toBe(
				"Search root could not be resolved: Context attribute 'nowhere' does not hold a path",
			);
		}
	});
});
