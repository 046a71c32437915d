// Coordinate formatting and parent comparison
// FORMAT THEOREM: parentMatches(p, t) ⇔ p ≠ ∅ ∧ p.groupId = t.groupId ∧ p.artifactId = t.artifactId ∧ (t.version = ∅ ∨ t.version = p.version)
// PURITY: CORE
// INVARIANT: Comparison is exact string equality per present field
// COMPLEXITY: O(1)

import type { CoordinateTriple } from "../types/coordinates.js";
import type { DeclaredCoordinates } from "../types/descriptor.js";

/**
 * `groupId:artifactId` or `groupId:artifactId:version`.
 *
 * @pure true
 */
export function formatCoordinates(coordinates: CoordinateTriple): string {
	const version =
		coordinates.version === undefined ? "" : `:${coordinates.version}`;
	return `${coordinates.groupId}:${coordinates.artifactId}${version}`;
}

/**
 * Whether a declared parent matches the target coordinates.
 *
 * An absent target version means the parent version is not compared.
 *
 * @pure true
 */
export function parentMatches(
	parent: DeclaredCoordinates | undefined,
	target: CoordinateTriple,
): boolean {
	if (parent === undefined) return false;
	return (
		parent.groupId === target.groupId &&
		parent.artifactId === target.artifactId &&
		(target.version === undefined || target.version === parent.version)
	);
}
