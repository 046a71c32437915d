// Resolves a utility location into an absolute filesystem path
// PURITY: SHELL (reads process-independent inputs only, but produces host paths)
// EFFECT: Effect<string, LocationResolutionError>
// INVARIANT: Never throws; a missing context attribute is a typed failure
// COMPLEXITY: O(|path|)

import { Effect } from "effect";
import { match } from "ts-pattern";

import { LocationResolutionError } from "../../core/errors.js";
import {
	fromPosixPath,
	normalizeRelativeSpecifier,
} from "../../core/path/normalize.js";
import type { TransformationContext } from "../../core/types/context.js";
import type {
	AbsoluteLocation,
	UtilityLocation,
} from "../../core/types/location.js";
import { path } from "../utils/node-mods.js";

const underBase = (base: string, relativePath: string | undefined): string =>
	path.resolve(
		base,
		fromPosixPath(normalizeRelativeSpecifier(relativePath ?? ""), path.sep),
	);

function resolveAbsolute(
	appRoot: string,
	context: TransformationContext,
	location: AbsoluteLocation,
): Effect.Effect<string, LocationResolutionError> {
	const base = context.get(location.attribute);
	if (base === undefined || base.trim().length === 0) {
		return Effect.fail(
			new LocationResolutionError({
				attribute: location.attribute,
				message: `Context attribute '${location.attribute}' does not hold a path`,
			}),
		);
	}
	// A relative base is taken as relative to the application root.
	return Effect.succeed(
		underBase(path.resolve(appRoot, base), location.relativePath),
	);
}

/**
 * Turns a configured location into an absolute path.
 *
 * @param appRoot Absolute path of the transformed application
 * @param context Transformation context used by absolute locations
 * @param location Configured location
 *
 * @pure false (depends on the host path convention)
 * @effect Effect<string, LocationResolutionError>
 * @example
 * ```ts
 * Effect.runSync(resolveLocation("/app", context, relativeLocation("/pom.xml")));
 * // "/app/pom.xml"
 * ```
 */
export function resolveLocation(
	appRoot: string,
	context: TransformationContext,
	location: UtilityLocation,
): Effect.Effect<string, LocationResolutionError> {
	return match(location)
		.returnType<Effect.Effect<string, LocationResolutionError>>()
		.with({ kind: "relative" }, (relative) =>
			Effect.succeed(underBase(appRoot, relative.relativePath)),
		)
		.with({ kind: "absolute" }, (absolute) =>
			resolveAbsolute(appRoot, context, absolute),
		)
		.exhaustive();
}
