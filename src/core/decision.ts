// Pure decision function mapping an execution result to an exit code
// FORMAT THEOREM: ∀r ∈ ExecutionResult: r.tag = "Error" ↔ computeExitCode(r.tag) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping ResultTag → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { match } from "ts-pattern";

import type { ExitCode } from "./models.js";
import type { ResultTag } from "./result.js";

/**
 * Computes the process exit code from the kind of result produced.
 *
 * A warning is still a success: an empty search is not a failure.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode("Warning"); // 0
 * computeExitCode("Error");   // 1
 * ```
 */
export const computeExitCode = (tag: ResultTag): ExitCode =>
	match(tag)
		.returnType<ExitCode>()
		.with("Value", "Warning", () => 0)
		.with("Error", () => 1)
		.exhaustive();
