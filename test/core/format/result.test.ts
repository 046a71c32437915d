import { describe, expect, it } from "vitest";

import { computeExitCode } from "../../../src/core/decision.js";
import { TransformationUtilityError } from "../../../src/core/errors.js";
import { formatResult } from "../../../src/core/format/result.js";
import { error, value, warning } from "../../../src/core/result.js";

const utility = { getDescription: () => "Find things" };
const display = (file: string): string => file.replace("/app/", "");

describe("formatResult", () => {
	it("lists found files relative to the app root", () => {
		expect(formatResult(value(utility, ["/app/a.txt", "/app/sub/c.txt"]), display)).toEqual([
			"✅ Find things",
			"  a.txt",
			"  sub/c.txt",
		]);
	});

	it("prints boolean payloads", () => {
		expect(formatResult(value(utility, false), display)).toEqual([
			"✅ Find things",
			"  result: false",
		]);
	});

	it("states the warning message", () => {
		expect(formatResult(warning(utility, "No files have been found", []), display)).toEqual([
			"⚠️  Find things",
			"  warning: No files have been found",
		]);
	});

	it("prints the failure chain", () => {
		const failure = new TransformationUtilityError({
			message: "checking failed",
			cause: new Error("bad xml"),
			suppressed: [new Error("close failed")],
		});
		expect(formatResult(error(utility, failure), display)).toEqual([
			"❌ Find things",
			"  error: checking failed",
			"  cause: bad xml",
			"  suppressed: close failed",
		]);
	});
});

describe("computeExitCode", () => {
	it("treats warnings as success", () => {
		expect(computeExitCode("Value")).toBe(0);
		expect(computeExitCode("Warning")).toBe(0);
		expect(computeExitCode("Error")).toBe(1);
	});
});
