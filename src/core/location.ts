// Validated constructors for utility location specifiers
// PURITY: CORE (throws InvalidConfigurationError on blank input)
// INVARIANT: relativePath is non-blank; absolute locations always name a context attribute
// COMPLEXITY: O(1)

import type {
	AbsoluteLocation,
	RelativeLocation,
	UtilityLocation,
} from "./types/location.js";
import { checkForBlankString, checkForEmptyString } from "./validation.js";

/**
 * Location used when a utility is never pointed anywhere: the app root itself.
 */
export const APP_ROOT_LOCATION: UtilityLocation = Object.freeze({
	kind: "relative",
	relativePath: ".",
});

/**
 * @param relativePath Path under the application root; "." is the root itself
 * @throws InvalidConfigurationError when relativePath is blank
 */
export function relativeLocation(relativePath: string): RelativeLocation {
	checkForBlankString("Relative path", relativePath);
	return { kind: "relative", relativePath };
}

/**
 * @param attribute Context attribute holding an absolute base directory
 * @param relativePath Optional path applied under that base
 * @throws InvalidConfigurationError when attribute is blank or relativePath is empty
 */
export function absoluteLocation(
	attribute: string,
	relativePath?: string,
): AbsoluteLocation {
	checkForBlankString("Context attribute name", attribute);
	checkForEmptyString("Relative path", relativePath);
	return relativePath === undefined
		? { kind: "absolute", attribute }
		: { kind: "absolute", attribute, relativePath };
}
