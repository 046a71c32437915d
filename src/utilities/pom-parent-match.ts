// Structured attribute match: does a POM declare the given parent?
// FORMAT THEOREM: execution = VALUE(parentMatches(parse(file).parent, target)) ∨ ERROR(parse/io failure)
// PURITY: SHELL (execution reads the descriptor file)
// EFFECT: execution is synchronous and returns ExecutionResult<boolean>
// INVARIANT: The file handle is closed on every exit path; a close failure never masks a primary failure
// COMPLEXITY: O(n) where n = descriptor size

import { Effect, Either } from "effect";

import {
	formatCoordinates,
	parentMatches,
} from "../core/descriptor/parent-match.js";
import {
	describeThrown,
	type FileAccessError,
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
import { error, type ExecutionResult, value } from "../core/result.js";
import type { CoordinateTriple } from "../core/types/coordinates.js";
import type { TransformationContext } from "../core/types/context.js";
import type { UtilityLocation } from "../core/types/location.js";
import { checkForBlankString, checkForEmptyString } from "../core/validation.js";
import {
	type DescriptorRead,
	readProjectDescriptor,
} from "../shell/descriptor/reader.js";
import { type FileAccess, nodeFileAccess } from "../shell/fs/file-access.js";
import { resolveLocation } from "../shell/path/resolver.js";

export interface PomParentMatchOptions {
	readonly groupId: string;
	readonly artifactId: string;
	readonly version?: string;
}

/**
 * Checks whether a POM file declares a parent matching groupId, artifactId
 * and, when set, version. Without a version only groupId and artifactId are
 * compared.
 *
 * A POM without a parent yields VALUE `false`. A file that cannot be read or
 * parsed yields an ERROR naming the coordinates and the file.
 *
 * @example
 * ```ts
 * new PomParentMatch({ groupId: "com.test", artifactId: "foo-parent" })
 *   .relative("pom.xml")
 *   .execution("/work/app", context);
 * ```
 */
export class PomParentMatch {
	private groupId: string | undefined;
	private artifactId: string | undefined;
	private version: string | undefined;
	private location: UtilityLocation = APP_ROOT_LOCATION;
	private fileAccess: FileAccess = nodeFileAccess;

	constructor(options?: PomParentMatchOptions) {
		if (options !== undefined) {
			this.setGroupId(options.groupId);
			this.setArtifactId(options.artifactId);
			this.setVersion(options.version);
		}
	}

	/** @throws InvalidConfigurationError when blank */
	setGroupId(groupId: string): this {
		checkForBlankString("GroupId", groupId);
		this.groupId = groupId;
		return this;
	}

	/** @throws InvalidConfigurationError when blank */
	setArtifactId(artifactId: string): this {
		checkForBlankString("ArtifactId", artifactId);
		this.artifactId = artifactId;
		return this;
	}

	/**
	 * `undefined` means the parent version is not compared.
	 *
	 * @throws InvalidConfigurationError when empty
	 */
	setVersion(version: string | undefined): this {
		checkForEmptyString("Version", version);
		this.version = version;
		return this;
	}

	relative(relativePath: string): this {
		this.location = relativeLocation(relativePath);
		return this;
	}

	absolute(attribute: string, relativePath?: string): this {
		this.location = absoluteLocation(attribute, relativePath);
		return this;
	}

	/**
	 * Replaces how the descriptor file is opened, read and closed.
	 */
	setFileAccess(fileAccess: FileAccess): this {
		this.fileAccess = fileAccess;
		return this;
	}

	getGroupId(): string | undefined {
		return this.groupId;
	}

	getArtifactId(): string | undefined {
		return this.artifactId;
	}

	getVersion(): string | undefined {
		return this.version;
	}

	getLocation(): UtilityLocation {
		return this.location;
	}

	getDescription(): string {
		return `Check if the pom has a parent matching '${this.coordinatesText()}' exists in a POM file`;
	}

	private coordinatesText(): string {
		return formatCoordinates({
			groupId: this.groupId ?? "",
			artifactId: this.artifactId ?? "",
			version: this.version,
		});
	}

	/**
	 * Target coordinates, or a failure when the utility was never configured.
	 */
	private target(): Effect.Effect<CoordinateTriple, TransformationUtilityError> {
		const { groupId, artifactId, version } = this;
		if (groupId === undefined || artifactId === undefined) {
			return Effect.fail(
				new TransformationUtilityError({
					message: `GroupId and ArtifactId must be set before execution (${describeLocation(this.location)})`,
					suppressed: [],
				}),
			);
		}
		return Effect.succeed({ groupId, artifactId, version });
	}

	/**
	 * Folds a descriptor read into the match outcome, applying the
	 * primary-failure-first rule for close failures.
	 */
	private outcome(
		read: DescriptorRead,
		target: CoordinateTriple,
		checkFailure: (cause: Error) => TransformationUtilityError,
		closeFailure: (cause: FileAccessError) => TransformationUtilityError,
	): Effect.Effect<boolean, TransformationUtilityError> {
		const { descriptor, release } = read;
		if (Either.isLeft(descriptor)) {
			const primary = checkFailure(descriptor.left);
			return Effect.fail(
				Either.isLeft(release) ? primary.withSuppressed(release.left) : primary,
			);
		}
		if (Either.isLeft(release)) {
			return Effect.fail(closeFailure(release.left));
		}
		return Effect.succeed(parentMatches(descriptor.right.parent, target));
	}

	/**
	 * Reads the POM once and compares its parent with the target coordinates.
	 *
	 * @param appRoot Absolute path of the transformed application
	 * @param context Transformation context used by absolute locations
	 * @returns VALUE(true | false) or ERROR
	 */
	execution(
		appRoot: string,
		context: TransformationContext,
	): ExecutionResult<boolean> {
		const { location, fileAccess } = this;
		const coordinates = this.coordinatesText();

		const check = Effect.gen(this, function* (_) {
			const target = yield* _(this.target());
			const file = yield* _(
				resolveLocation(appRoot, context, location).pipe(
					Effect.mapError(
						(cause) =>
							new TransformationUtilityError({
								message: `POM file for parent ${coordinates} could not be located: ${cause.message}`,
								cause,
								suppressed: [],
							}),
					),
				),
			);
			const relativeFile = displayFolder(relativePathOf(appRoot, file));
			const checkFailure = (cause: Error): TransformationUtilityError =>
				new TransformationUtilityError({
					message: `Exception happened when checking if POM parent ${coordinates} exists in ${relativeFile}`,
					cause,
					suppressed: [],
				});
			const closeFailure = (cause: FileAccessError): TransformationUtilityError =>
				new TransformationUtilityError({
					message: `Exception happened when closing pom file ${relativeFile}`,
					cause,
					suppressed: [],
				});

			const read = yield* _(
				readProjectDescriptor(file, fileAccess).pipe(
					Effect.mapError(checkFailure),
				),
			);
			return yield* _(this.outcome(read, target, checkFailure, closeFailure));
		});

		return Effect.runSync(
			check.pipe(
				Effect.map((matches) => value(this, matches)),
				Effect.catchAll((failure) =>
					Effect.succeed(error<boolean>(this, failure)),
				),
				Effect.catchAllDefect((defect) =>
					Effect.succeed(
						error<boolean>(
							this,
							new TransformationUtilityError({
								message: `Unexpected failure when checking if POM parent ${coordinates} exists: ${describeThrown(defect)}`,
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
