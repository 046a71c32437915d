// Location specifier configured on a utility
// PURITY: CORE
// INVARIANT: kind discriminates relative (app root based) and absolute (context attribute based) specifiers
// COMPLEXITY: O(1) - type declarations only

/**
 * Path under the transformed application root.
 *
 * Separators may be `/` or `\`; leading separators are ignored.
 */
export interface RelativeLocation {
	readonly kind: "relative";
	readonly relativePath: string;
}

/**
 * Path under a base directory stored in the transformation context.
 */
export interface AbsoluteLocation {
	readonly kind: "absolute";
	readonly attribute: string;
	readonly relativePath?: string;
}

export type UtilityLocation = RelativeLocation | AbsoluteLocation;
