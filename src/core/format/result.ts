// Text rendering of execution results for the CLI printer
// PURITY: CORE
// INVARIANT: First line always names the outcome and the utility description
// COMPLEXITY: O(n) where n = number of payload entries

import { match, P } from "ts-pattern";

import type { ExecutionResult } from "../result.js";

/**
 * Payload kinds produced by the shipped utilities.
 */
export type UtilityPayload = boolean | readonly string[];

function formatPayload(
	payload: UtilityPayload,
	display: (file: string) => string,
): readonly string[] {
	return match(payload)
		.with(P.boolean, (flag) => [`  result: ${String(flag)}`])
		.with(P.array(P.string), (files) => files.map((file) => `  ${display(file)}`))
		.exhaustive();
}

/**
 * Renders a result as printable lines.
 *
 * @param display Maps an absolute file path to the form shown to the user
 *
 * @pure true
 * @example
 * ```ts
 * formatResult(value(utility, true), (f) => f);
 * // ["✅ <description>", "  result: true"]
 * ```
 */
export function formatResult(
	result: ExecutionResult<UtilityPayload>,
	display: (file: string) => string,
): readonly string[] {
	const header = result.utility.getDescription();
	return match(result)
		.with({ tag: "Value" }, (r) => [
			`✅ ${header}`,
			...formatPayload(r.value, display),
		])
		.with({ tag: "Warning" }, (r) => [
			`⚠️  ${header}`,
			`  warning: ${r.warningMessage}`,
			...formatPayload(r.value, display),
		])
		.with({ tag: "Error" }, (r) => [
			`❌ ${header}`,
			`  error: ${r.failure.message}`,
			...(r.failure.cause === undefined
				? []
				: [`  cause: ${r.failure.cause.message}`]),
			...r.failure.suppressed.map((s) => `  suppressed: ${s.message}`),
		])
		.exhaustive();
}
