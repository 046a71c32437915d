// Prints execution results to the console
// PURITY: SHELL (console output)
// INVARIANT: VALUE → stdout, WARNING → console.warn, ERROR → console.error
// COMPLEXITY: O(n) where n = printed lines

import { match } from "ts-pattern";

import { formatResult, type UtilityPayload } from "../../core/format/result.js";
import { relativePathOf } from "../../core/path/normalize.js";
import type { ExecutionResult } from "../../core/result.js";

/**
 * Prints a result, showing found files relative to the application root.
 */
export function printResult(
	result: ExecutionResult<UtilityPayload>,
	appRoot: string,
): void {
	const lines = formatResult(result, (file) => relativePathOf(appRoot, file));
	const write = match(result.tag)
		.with("Value", () => console.log)
		.with("Warning", () => console.warn)
		.with("Error", () => console.error)
		.exhaustive();
	for (const line of lines) {
		write(line);
	}
}
