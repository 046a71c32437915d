// Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: Exposes the utilities, the result model and the CORE helpers; SHELL internals stay hidden
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	FindFiles,
	type FindFilesOptions,
	NO_FILES_FOUND,
	PomParentMatch,
	type PomParentMatchOptions,
} from "./utilities/index.js";

/**
 * Port used by {@link PomParentMatch.setFileAccess}; `nodeFileAccess` is the default.
 */
export { type FileAccess, nodeFileAccess } from "./shell/fs/file-access.js";

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTION RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type ErrorResult,
	type ExecutionResult,
	error,
	isError,
	isValue,
	isWarning,
	type ResultTag,
	resultPayload,
	type UtilityReference,
	type ValueResult,
	value,
	type WarningResult,
	warning,
} from "./core/result.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	DescriptorParseError,
	FileAccessError,
	InvalidConfigurationError,
	LocationResolutionError,
	TransformationUtilityError,
} from "./core/errors.js";
export { createTransformationContext } from "./core/context.js";
export {
	formatCoordinates,
	parentMatches,
} from "./core/descriptor/parent-match.js";
export { parseProjectDescriptor } from "./core/descriptor/parser.js";
export {
	absoluteLocation,
	APP_ROOT_LOCATION,
	relativeLocation,
} from "./core/location.js";
export { relativePathOf, toPosixPath } from "./core/path/normalize.js";
export {
	checkForBlankString,
	checkForEmptyString,
} from "./core/validation.js";
export type {
	CoordinateTriple,
	DeclaredCoordinates,
	ProjectDescriptor,
	TransformationContext,
	UtilityLocation,
} from "./core/types/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// APPLICATION
// ═══════════════════════════════════════════════════════════════════════════════

export type { ExitCode } from "./core/models.js";
export { runUtility } from "./app/runUtility.js";
