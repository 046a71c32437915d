// Artifact coordinate domain types
// PURITY: CORE
// INVARIANT: groupId and artifactId are non-blank once validated by a setter
// COMPLEXITY: O(1) - type declarations only

/**
 * Logical identity of an artifact.
 *
 * @property groupId Group the artifact belongs to
 * @property artifactId Artifact name within the group
 * @property version Absent when the version must not be compared
 */
export interface CoordinateTriple {
	readonly groupId: string;
	readonly artifactId: string;
	readonly version?: string;
}
