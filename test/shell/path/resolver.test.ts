import * as path from "node:path";

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { createTransformationContext } from "../../../src/core/context.js";
import { LocationResolutionError } from "../../../src/core/errors.js";
import {
	absoluteLocation,
	APP_ROOT_LOCATION,
	relativeLocation,
} from "../../../src/core/location.js";
import { resolveLocation } from "../../../src/shell/path/resolver.js";

const appRoot = path.resolve("/work/app");
const context = createTransformationContext({
	shared: path.resolve("/work/shared"),
	relativeBase: "generated",
	blank: "  ",
});

type Location = Parameters<typeof resolveLocation>[2];

const resolve = (location: Location): string =>
	Effect.runSync(resolveLocation(appRoot, context, location));

const failure = (location: Location): LocationResolutionError =>
	Effect.runSync(Effect.flip(resolveLocation(appRoot, context, location)));

describe("resolveLocation", () => {
	it("resolves the default location to the app root", () => {
		expect(resolve(APP_ROOT_LOCATION)).toBe(appRoot);
	});

	it("treats a leading separator as relative to the app root", () => {
		expect(resolve(relativeLocation("/src/main/pom.xml"))).toBe(
			path.join(appRoot, "src", "main", "pom.xml"),
		);
	});

	it("accepts backslash separators", () => {
		expect(resolve(relativeLocation("src\\main"))).toBe(
			path.join(appRoot, "src", "main"),
		);
	});

	it("uses the context attribute as base for absolute locations", () => {
		expect(resolve(absoluteLocation("shared", "conf/pom.xml"))).toBe(
			path.resolve("/work/shared", "conf", "pom.xml"),
		);
	});

	it("resolves a relative attribute value against the app root", () => {
		expect(resolve(absoluteLocation("relativeBase"))).toBe(
			path.join(appRoot, "generated"),
		);
	});

	it.each(["missing", "blank"])("fails when attribute %s holds no path", (attribute) => {
		const error = failure(absoluteLocation(attribute));
		expect(error).toBeInstanceOf(LocationResolutionError);
		expect(error.attribute).toBe(attribute);
		expect(error.message).toBe(
			`Context attribute '${attribute}' does not hold a path`,
		);
	});
});
