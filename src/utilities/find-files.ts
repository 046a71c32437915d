// File search utility: name/path regular expressions plus a recursion policy
// FORMAT THEOREM: pathRegex ≠ ∅ ⇒ recursive; ¬recursive ⇒ pathRegex = ∅ (enforced at mutation time)
// PURITY: SHELL (execution walks the filesystem)
// EFFECT: execution is synchronous and returns ExecutionResult<ReadonlyArray<string>>
// INVARIANT: execution never throws; every failure becomes an ERROR result
// COMPLEXITY: O(n log n) where n = entries under the search root

import { Effect } from "effect";

import {
	describeThrown,
	TransformationUtilityError,
} from "../core/errors.js";
import {
	absoluteLocation,
	APP_ROOT_LOCATION,
	relativeLocation,
} from "../core/location.js";
import {
	describeLocation,
	displayFolder,
	relativePathOf,
} from "../core/path/normalize.js";
import { error, type ExecutionResult, value, warning } from "../core/result.js";
import { buildSearchPredicate } from "../core/search/filter.js";
import type { TransformationContext } from "../core/types/context.js";
import type { UtilityLocation } from "../core/types/location.js";
import { checkForEmptyString, compileFullMatch } from "../core/validation.js";
import { walkFiles } from "../shell/fs/walk.js";
import { resolveLocation } from "../shell/path/resolver.js";

const DESCRIPTION =
	"Find files whose name and/or path match regular expression and are under";

export const NO_FILES_FOUND = "No files have been found";

/**
 * Constructor options. `pathRegex` and `recursive: false` are mutually
 * exclusive; when both are given, the later setter wins (`recursive` is applied last).
 */
export interface FindFilesOptions {
	readonly nameRegex?: string;
	readonly pathRegex?: string;
	readonly recursive?: boolean;
}

/**
 * Finds files whose name and/or directory path match regular expressions.
 *
 * The search root defaults to the application root and can be moved with
 * {@link FindFiles.relative} or {@link FindFiles.absolute}. Path regular
 * expressions always use "/" as separator and are matched against the
 * directory of each file relative to the search root ("" for files directly
 * in the root). When nothing matches, the result is a WARNING carrying an
 * empty list.
 *
 * @example
 * ```ts
 * const result = new FindFiles({ nameRegex: ".*\\.java", pathRegex: "src/main/.*" })
 *   .execution("/work/app", context);
 * ```
 */
export class FindFiles {
	private nameRegex: string | undefined;
	private pathRegex: string | undefined;
	private recursive = false;
	private location: UtilityLocation = APP_ROOT_LOCATION;

	constructor(options: FindFilesOptions = {}) {
		if (options.nameRegex !== undefined) this.setNameRegex(options.nameRegex);
		if (options.pathRegex !== undefined) this.setPathRegex(options.pathRegex);
		if (options.recursive !== undefined) this.setRecursive(options.recursive);
	}

	/**
	 * @param nameRegex Full-match expression for the bare file name; `undefined` clears it
	 * @throws InvalidConfigurationError when blank or not a valid expression
	 */
	setNameRegex(nameRegex: string | undefined): this {
		checkForEmptyString("Name regex", nameRegex);
		if (nameRegex !== undefined) compileFullMatch("Name regex", nameRegex);
		this.nameRegex = nameRegex;
		return this;
	}

	/**
	 * Setting a value also makes the search recursive.
	 *
	 * @param pathRegex Full-match expression for the "/"-separated directory path
	 * @throws InvalidConfigurationError when blank or not a valid expression
	 */
	setPathRegex(pathRegex: string | undefined): this {
		checkForEmptyString("Path regex", pathRegex);
		if (pathRegex !== undefined) {
			compileFullMatch("Path regex", pathRegex);
			this.recursive = true;
		}
		this.pathRegex = pathRegex;
		return this;
	}

	/**
	 * Setting `false` also clears the path regular expression.
	 */
	setRecursive(recursive: boolean): this {
		this.recursive = recursive;
		if (!recursive) {
			this.pathRegex = undefined;
		}
		return this;
	}

	/**
	 * Searches under `relativePath` inside the application root.
	 */
	relative(relativePath: string): this {
		this.location = relativeLocation(relativePath);
		return this;
	}

	/**
	 * Searches under the directory held by a context attribute.
	 */
	absolute(attribute: string, relativePath?: string): this {
		this.location = absoluteLocation(attribute, relativePath);
		return this;
	}

	getNameRegex(): string | undefined {
		return this.nameRegex;
	}

	getPathRegex(): string | undefined {
		return this.pathRegex;
	}

	isRecursive(): boolean {
		return this.recursive;
	}

	getLocation(): UtilityLocation {
		return this.location;
	}

	getDescription(): string {
		const scope = this.recursive
			? " and sub-folders"
			: " only (not including sub-folders)";
		return `${DESCRIPTION} ${describeLocation(this.location)}${scope}`;
	}

	/**
	 * Runs the search once.
	 *
	 * @param appRoot Absolute path of the transformed application
	 * @param context Transformation context used by absolute locations
	 * @returns VALUE with absolute file paths, WARNING with [] when nothing matched, or ERROR
	 */
	execution(
		appRoot: string,
		context: TransformationContext,
	): ExecutionResult<readonly string[]> {
		const { nameRegex, pathRegex, recursive, location } = this;

		const search = Effect.gen(function* (_) {
			const accept = yield* _(
				Effect.sync(() => buildSearchPredicate({ nameRegex, pathRegex })),
			);
			const root = yield* _(resolveLocation(appRoot, context, location));
			return yield* _(
				walkFiles(root, { recursive, accept }).pipe(
					Effect.mapError(
						(cause) =>
							new TransformationUtilityError({
								message: `Error happened when searching files under ${displayFolder(relativePathOf(appRoot, root))}`,
								cause,
								suppressed: [],
							}),
					),
				),
			);
		});

		return Effect.runSync(
			search.pipe(
				Effect.map((files) =>
					files.length === 0
						? warning<readonly string[]>(this, NO_FILES_FOUND, [])
						: value<readonly string[]>(this, files),
				),
				Effect.catchTags({
					LocationResolution: (cause) =>
						Effect.succeed(
							error<readonly string[]>(
								this,
								new TransformationUtilityError({
									message: `Search root could not be resolved: ${cause.message}`,
									cause,
									suppressed: [],
								}),
							),
						),
					TransformationUtility: (failure) =>
						Effect.succeed(error<readonly string[]>(this, failure)),
				}),
				Effect.catchAllDefect((defect) =>
					Effect.succeed(
						error<readonly string[]>(
							this,
							new TransformationUtilityError({
								message: `Unexpected failure when searching files: ${describeThrown(defect)}`,
								cause: defect instanceof Error ? defect : undefined,
								suppressed: [],
							}),
						),
					),
				),
			),
		);
	}
}
