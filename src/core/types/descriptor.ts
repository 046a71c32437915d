// Project descriptor model produced by the structured-document parser
// PURITY: CORE
// INVARIANT: Every field mirrors a top-level element of the descriptor; absent elements stay undefined
// COMPLEXITY: O(1) - type declarations only

/**
 * Coordinates as declared inside a descriptor.
 *
 * Unlike {@link CoordinateTriple}, every field may be missing because the
 * document is not validated against a schema.
 */
export interface DeclaredCoordinates {
	readonly groupId?: string;
	readonly artifactId?: string;
	readonly version?: string;
}

/**
 * Parsed project descriptor (POM).
 *
 * @property parent Declared parent attribute group, if any
 */
export interface ProjectDescriptor extends DeclaredCoordinates {
	readonly parent?: DeclaredCoordinates;
}
