// In-memory transformation context
// PURITY: CORE
// INVARIANT: Attributes are copied at construction; later changes to the input do not leak in
// COMPLEXITY: O(n) construction, O(1) lookup

import type { TransformationContext } from "./types/context.js";

/**
 * Builds a read-only context from a record or from key/value entries.
 *
 * @pure true
 * @example
 * ```ts
 * const context = createTransformationContext({ sharedRoot: "/work/shared" });
 * context.get("sharedRoot"); // "/work/shared"
 * ```
 */
export function createTransformationContext(
	attributes:
		| Readonly<Record<string, string>>
		| Iterable<readonly [string, string]> = {},
): TransformationContext {
	const entries = isIterable(attributes)
		? [...attributes]
		: Object.entries(attributes);
	const values = new Map<string, string>(entries);
	return { get: (attribute) => values.get(attribute) };
}

function isIterable(
	value: Readonly<Record<string, string>> | Iterable<readonly [string, string]>,
): value is Iterable<readonly [string, string]> {
	return Symbol.iterator in value;
}
