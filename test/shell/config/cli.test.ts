import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { parseCLIArgs } from "../../../src/shell/config/cli.js";

const usageMessage = (argv: readonly string[]): string | undefined => {
	const parsed = parseCLIArgs(argv);
	return Either.isLeft(parsed) ? parsed.left.message : undefined;
};

describe("parseCLIArgs", () => {
	it("parses find-files flags", () => {
		expect(
			Either.getOrUndefined(
				parseCLIArgs(["find-files", "--name", ".*\\.txt", "--recursive", "--root", "src"]),
			),
		).toEqual({
			command: "find-files",
			nameRegex: ".*\\.txt",
			pathRegex: undefined,
			recursive: true,
			root: "src",
			appRoot: undefined,
		});
	});

	it("defaults the descriptor file to pom.xml", () => {
		expect(
			Either.getOrUndefined(
				parseCLIArgs(["pom-parent-match", "--group", "com.test", "--artifact", "foo-parent"]),
			),
		).toEqual({
			command: "pom-parent-match",
			groupId: "com.test",
			artifactId: "foo-parent",
			version: undefined,
			file: "pom.xml",
			appRoot: undefined,
		});
	});

	it.each([
		[[], "Missing command"],
		[["explode"], "Unknown command: explode"],
		[["find-files", "--bogus"], "Unknown argument: --bogus"],
		[["find-files", "--name"], "Missing value for --name"],
		[["find-files", "--name", "--recursive"], "Missing value for --name"],
		[["pom-parent-match", "--group", "g"], "pom-parent-match requires --group and --artifact"],
		[
			["pom-parent-match", "--group", "g", "--artifact", "a", "--recursive"],
			"--recursive only applies to find-files",
		],
	])("rejects %j", (argv, message) => {
		expect(usageMessage(argv)).toBe(message);
	});
});
