// Tri-state execution result envelope (VALUE / WARNING / ERROR)
// FORMAT THEOREM: ∀r ∈ ExecutionResult: exactly one of isValue(r), isWarning(r), isError(r) holds
// PURITY: CORE
// INVARIANT: Results are frozen on construction and always reference the producing utility
// COMPLEXITY: O(1)

import type { TransformationUtilityError } from "./errors.js";

/**
 * Anything that can be named in a result: every utility exposes a description.
 */
export interface UtilityReference {
	readonly getDescription: () => string;
}

export interface ValueResult<A> {
	readonly tag: "Value";
	readonly utility: UtilityReference;
	readonly value: A;
}

export interface WarningResult<A> {
	readonly tag: "Warning";
	readonly utility: UtilityReference;
	readonly warningMessage: string;
	readonly value: A;
}

export interface ErrorResult {
	readonly tag: "Error";
	readonly utility: UtilityReference;
	readonly failure: TransformationUtilityError;
}

/**
 * Outcome of a single utility execution.
 *
 * @typeParam A - Payload type decided by the utility
 * @invariant Exactly one variant; consumers branch on `tag`
 */
export type ExecutionResult<A> = ValueResult<A> | WarningResult<A> | ErrorResult;

export type ResultTag = ExecutionResult<never>["tag"];

/**
 * Successful result carrying a payload.
 *
 * @pure true
 * @complexity O(1)
 */
export const value = <A>(
	utility: UtilityReference,
	payload: A,
): ExecutionResult<A> => Object.freeze({ tag: "Value", utility, value: payload });

/**
 * Successful result that also states a warning.
 *
 * @pure true
 * @complexity O(1)
 */
export const warning = <A>(
	utility: UtilityReference,
	message: string,
	payload: A,
): ExecutionResult<A> =>
	Object.freeze({
		tag: "Warning",
		utility,
		warningMessage: message,
		value: payload,
	});

/**
 * Failed result.
 *
 * @pure true
 * @complexity O(1)
 */
export const error = <A>(
	utility: UtilityReference,
	failure: TransformationUtilityError,
): ExecutionResult<A> => Object.freeze({ tag: "Error", utility, failure });

export const isValue = <A>(r: ExecutionResult<A>): r is ValueResult<A> =>
	r.tag === "Value";

export const isWarning = <A>(r: ExecutionResult<A>): r is WarningResult<A> =>
	r.tag === "Warning";

export const isError = <A>(r: ExecutionResult<A>): r is ErrorResult =>
	r.tag === "Error";

/**
 * Payload of a VALUE or WARNING result; `undefined` for ERROR.
 *
 * @pure true
 */
export function resultPayload<A>(r: ExecutionResult<A>): A | undefined {
	return r.tag === "Error" ? undefined : r.value;
}
