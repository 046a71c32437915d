// File search predicate built from name/path regular expressions
// FORMAT THEOREM: accept(c) ⇔ (nameRegex = ∅ ∨ full(nameRegex, c.name)) ∧ (pathRegex = ∅ ∨ full(pathRegex, c.directory))
// PURITY: CORE
// INVARIANT: Directories are never candidates; the walker only hands over files
// COMPLEXITY: O(|name| + |directory|) per candidate

import { compileFullMatch } from "../validation.js";

/**
 * File seen by the directory walk.
 *
 * @property name Bare file name
 * @property directory "/"-separated directory of the file relative to the search root, "" at the root
 */
export interface SearchCandidate {
	readonly name: string;
	readonly directory: string;
}

export interface SearchFilter {
	readonly nameRegex?: string;
	readonly pathRegex?: string;
}

export type SearchPredicate = (candidate: SearchCandidate) => boolean;

/**
 * Builds the predicate applied to every file found during a search.
 *
 * @pure true
 * @example
 * ```ts
 * const accept = buildSearchPredicate({ nameRegex: ".*\\.txt" });
 * accept({ name: "a.txt", directory: "" }); // true
 * accept({ name: "a.txt.bak", directory: "" }); // false
 * ```
 */
export function buildSearchPredicate(filter: SearchFilter): SearchPredicate {
	const name =
		filter.nameRegex === undefined
			? undefined
			: compileFullMatch("Name regex", filter.nameRegex);
	const directory =
		filter.pathRegex === undefined
			? undefined
			: compileFullMatch("Path regex", filter.pathRegex);

	return (candidate) =>
		(name === undefined || name.test(candidate.name)) &&
		(directory === undefined || directory.test(candidate.directory));
}
