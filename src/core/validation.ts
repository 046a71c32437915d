// Set-time parameter checks used by every utility setter
// PURITY: CORE (throws InvalidConfigurationError as a precondition violation)
// INVARIANT: Checks run at mutation time, so a configured utility never holds a blank required parameter
// COMPLEXITY: O(n) where n = |value|

import { InvalidConfigurationError } from "./errors.js";

const isBlank = (value: string | undefined): boolean =>
	value === undefined || value.trim().length === 0;

/**
 * Rejects a missing, empty or whitespace-only value.
 *
 * @param name Parameter name used in the error message
 * @param value Value to check
 * @throws InvalidConfigurationError `"<name> cannot be blank"`
 *
 * @example
 * ```ts
 * checkForBlankString("GroupId", " ");
 * // throws InvalidConfigurationError("GroupId cannot be blank")
 * ```
 */
export function checkForBlankString(
	name: string,
	value: string | undefined,
): asserts value is string {
	if (isBlank(value)) {
		throw new InvalidConfigurationError({ message: `${name} cannot be blank` });
	}
}

/**
 * Accepts `undefined` but rejects a present value that is empty or whitespace only.
 *
 * @throws InvalidConfigurationError `"<name> cannot be empty"`
 */
export function checkForEmptyString(
	name: string,
	value: string | undefined,
): void {
	if (value !== undefined && isBlank(value)) {
		throw new InvalidConfigurationError({ message: `${name} cannot be empty` });
	}
}

/**
 * Compiles `regex` so that it only matches a whole input.
 *
 * @returns RegExp anchored as `^(?:regex)$`
 * @throws InvalidConfigurationError when the expression does not compile
 *
 * @invariant fullMatch(r).test(s) ⇔ the whole of s matches r
 */
export function compileFullMatch(name: string, regex: string): RegExp {
	try {
		// Compile unwrapped first: "a)|(b" only becomes valid once wrapped.
		new RegExp(regex);
		return new RegExp(`^(?:${regex})$`);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new InvalidConfigurationError({
			message: `${name} is not a valid regular expression: ${reason}`,
		});
	}
}
