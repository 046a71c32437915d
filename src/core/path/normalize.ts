// Separator-independent path algebra for matching and reporting
// FORMAT THEOREM: ∀p, sep: toPosixPath(fromPosixPath(p, sep), sep) = p when p contains no sep
// PURITY: CORE
// INVARIANT: Every path handed to a regex uses "/" regardless of the host separator
// COMPLEXITY: O(n) where n = |path|

import * as path from "node:path";

import type { UtilityLocation } from "../types/location.js";

/**
 * Subset of `node:path` needed to compute relative paths.
 *
 * Passing `path.win32` or `path.posix` pins the host convention.
 */
export type PathApi = Pick<typeof path, "relative" | "sep">;

const ROOT_FOLDER = "the root folder";

/**
 * Replaces every occurrence of `sep` with "/".
 *
 * @pure true
 */
export function toPosixPath(value: string, sep: string = path.sep): string {
	return sep === "/" ? value : value.split(sep).join("/");
}

/**
 * Replaces every "/" with `sep`.
 *
 * @pure true
 */
export function fromPosixPath(value: string, sep: string = path.sep): string {
	return sep === "/" ? value : value.split("/").join(sep);
}

/**
 * Canonical form of a user supplied relative specifier.
 *
 * @returns "/"-separated path, no leading "/" or "./", no trailing "/", "" for the root
 *
 * @pure true
 * @example
 * ```ts
 * normalizeRelativeSpecifier("\\src\\\\main\\"); // "src/main"
 * normalizeRelativeSpecifier("./");              // ""
 * ```
 */
export function normalizeRelativeSpecifier(specifier: string): string {
	const segments = specifier
		.replace(/\\/g, "/")
		.split("/")
		.filter((segment) => segment.length > 0);
	while (segments[0] === ".") {
		segments.shift();
	}
	return segments.join("/");
}

/**
 * Path of `target` relative to `base` with "/" separators.
 *
 * @returns "" when target equals base
 *
 * @pure true
 * @invariant result never starts or ends with "/"
 */
export function relativePathOf(
	base: string,
	target: string,
	pathApi: PathApi = path,
): string {
	const relative = toPosixPath(pathApi.relative(base, target), pathApi.sep);
	return relative.replace(/^\/+|\/+$/g, "");
}

/**
 * Folder label for a relative path, naming the root explicitly.
 *
 * @pure true
 */
export function displayFolder(relativePath: string): string {
	const normalized = normalizeRelativeSpecifier(relativePath);
	return normalized.length === 0 ? ROOT_FOLDER : normalized;
}

/**
 * Text used by utility descriptions to name a configured location.
 *
 * @pure true
 */
export function describeLocation(location: UtilityLocation): string {
	if (location.kind === "relative") {
		return displayFolder(location.relativePath);
	}
	const base = `the location in context attribute '${location.attribute}'`;
	const nested =
		location.relativePath === undefined
			? ""
			: normalizeRelativeSpecifier(location.relativePath);
	return nested.length === 0 ? base : `${base}/${nested}`;
}
