// Typed error ADT shared by the utilities, built on Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values discriminated by `_tag`; `message` is always non-empty
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Blank or malformed parameter supplied to a utility setter.
 *
 * Thrown at set time, never produced by `execution`.
 *
 * @pure true (Data class)
 * @invariant message.length > 0
 */
export class InvalidConfigurationError extends Data.TaggedError(
	"InvalidConfiguration",
)<{
	readonly message: string;
}> {}

/**
 * The utility location could not be turned into a filesystem path.
 *
 * @pure true (Data class)
 * @invariant attribute.length > 0
 */
export class LocationResolutionError extends Data.TaggedError(
	"LocationResolution",
)<{
	readonly attribute: string;
	readonly message: string;
}> {}

/**
 * Structured descriptor text rejected by the parser.
 *
 * @pure true (Data class)
 * @invariant line ≥ 1 ∧ column ≥ 1
 */
export class DescriptorParseError extends Data.TaggedError("DescriptorParse")<{
	readonly message: string;
	readonly line: number;
	readonly column: number;
}> {}

/**
 * Filesystem operation kinds that can fail inside the shell.
 */
export type FileOperation = "open" | "read" | "close" | "list" | "stat";

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant path.length > 0
 */
export class FileAccessError extends Data.TaggedError("FileAccess")<{
	readonly operation: FileOperation;
	readonly path: string;
	readonly message: string;
}> {}

/**
 * Failure carried by an ERROR execution result.
 *
 * `suppressed` keeps secondary failures (e.g. a close failure after a parse
 * failure) without replacing the primary `cause`.
 *
 * @pure true (Data class)
 * @invariant suppressed never contains `cause`
 */
export class TransformationUtilityError extends Data.TaggedError(
	"TransformationUtility",
)<{
	readonly message: string;
	readonly cause?: Error;
	readonly suppressed: readonly Error[];
}> {
	/**
	 * Returns a copy of this error with `secondary` appended to `suppressed`.
	 *
	 * @pure true
	 * @postcondition result.cause === this.cause
	 */
	withSuppressed(secondary: Error): TransformationUtilityError {
		return new TransformationUtilityError({
			message: this.message,
			cause: this.cause,
			suppressed: [...this.suppressed, secondary],
		});
	}
}

/**
 * Errors raised while reading a structured descriptor.
 */
export type DescriptorReadError = DescriptorParseError | FileAccessError;

/**
 * Extracts a printable message from a thrown value.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeThrown(thrown: unknown): string {
	if (thrown instanceof Error) {
		return thrown.message.length > 0 ? thrown.message : thrown.name;
	}
	return String(thrown);
}
