// Transformation context port
// PURITY: CORE
// INVARIANT: Attributes are read-only during a utility execution
// COMPLEXITY: O(1) - type declarations only

/**
 * Attributes shared between utilities during one transformation.
 *
 * Utilities only read absolute base paths from it.
 */
export interface TransformationContext {
	readonly get: (attribute: string) => string | undefined;
}
