// Synchronous directory walk feeding the file search predicate
// FORMAT THEOREM: walk(root) = [f | f file under root (depth ≤ 1 unless recursive), accept(f)] in lexicographic pre-order
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, FileAccessError>
// INVARIANT: Any unreadable directory fails the whole walk; no partial listings
// COMPLEXITY: O(n log n) where n = entries visited

import type { Dirent } from "node:fs";

import { Effect } from "effect";

import { describeThrown, FileAccessError } from "../../core/errors.js";
import type { SearchPredicate } from "../../core/search/filter.js";
import { fs, path } from "../utils/node-mods.js";

/**
 * Lists one directory; throws like `fs.readdirSync` on failure.
 */
export type DirectoryLister = (absoluteDir: string) => readonly Dirent[];

export const nodeDirectoryLister: DirectoryLister = (absoluteDir) =>
	fs.readdirSync(absoluteDir, { withFileTypes: true });

/**
 * @property list Directory listing, `nodeDirectoryLister` when omitted
 */
export interface WalkOptions {
	readonly recursive: boolean;
	readonly accept: SearchPredicate;
	readonly list?: DirectoryLister;
}

// Link targets that cannot be resolved make the entry "not a file".
const UNRESOLVABLE_LINK_CODES: ReadonlySet<string> = new Set([
	"ENOENT",
	"ENOTDIR",
	"ELOOP",
	"EACCES",
]);

const isUnresolvableLink = (error: unknown): boolean =>
	error instanceof Error &&
	"code" in error &&
	typeof error.code === "string" &&
	UNRESOLVABLE_LINK_CODES.has(error.code);

function joinRelative(base: string, name: string): string {
	if (base.length === 0) return name;
	return `${base}/${name}`;
}

function listDirectory(
	absoluteDir: string,
	list: DirectoryLister,
): Effect.Effect<readonly Dirent[], FileAccessError> {
	return Effect.try({
		try: () => list(absoluteDir),
		catch: (error) =>
			new FileAccessError({
				operation: "list",
				path: absoluteDir,
				message: describeThrown(error),
			}),
	});
}

/**
 * Whether an entry is a regular file, following a symbolic link.
 *
 * Dangling, looping and unreadable links are not files.
 */
function isFileEntry(
	dirent: Dirent,
	absolutePath: string,
): Effect.Effect<boolean, FileAccessError> {
	if (!dirent.isSymbolicLink()) {
		return Effect.succeed(dirent.isFile());
	}
	return Effect.try({
		try: () => fs.statSync(absolutePath).isFile(),
		catch: (error): unknown => error,
	}).pipe(
		Effect.catchIf(isUnresolvableLink, () => Effect.succeed(false)),
		Effect.mapError(
			(error) =>
				new FileAccessError({
					operation: "stat",
					path: absolutePath,
					message: describeThrown(error),
				}),
		),
	);
}

/**
 * Visits one directory: files in order, sub-directories descended in place.
 *
 * Symbolic links to directories are never descended, so the walk cannot cycle.
 */
function walkDirectory(
	absoluteDir: string,
	relativeDir: string,
	options: WalkOptions,
): Effect.Effect<readonly string[], FileAccessError> {
	return Effect.gen(function* (_) {
		yield* _(Effect.logDebug(`Searching ${absoluteDir}`));
		const dirents = yield* _(
			listDirectory(absoluteDir, options.list ?? nodeDirectoryLister),
		);
		const sorted = [...dirents].sort((a, b) => a.name.localeCompare(b.name));

		const found: string[] = [];
		for (const dirent of sorted) {
			const absolutePath = path.join(absoluteDir, dirent.name);

			if (dirent.isDirectory()) {
				if (options.recursive) {
					const nested = yield* _(
						walkDirectory(
							absolutePath,
							joinRelative(relativeDir, dirent.name),
							options,
						),
					);
					found.push(...nested);
				}
				continue;
			}

			if (!options.accept({ name: dirent.name, directory: relativeDir })) {
				continue;
			}
			const isFile = yield* _(isFileEntry(dirent, absolutePath));
			if (isFile) {
				found.push(absolutePath);
			}
		}
		return found;
	});
}

/**
 * Lists the files under `root` accepted by `options.accept`.
 *
 * @param root Absolute path of the search root
 * @returns Absolute paths of the accepted files
 *
 * @pure false (filesystem reads)
 * @effect Effect<ReadonlyArray<string>, FileAccessError>
 * @invariant root must be a directory, otherwise the walk fails with operation "stat"
 */
export function walkFiles(
	root: string,
	options: WalkOptions,
): Effect.Effect<readonly string[], FileAccessError> {
	return Effect.gen(function* (_) {
		const stats = yield* _(
			Effect.try({
				try: () => fs.statSync(root),
				catch: (error) =>
					new FileAccessError({
						operation: "stat",
						path: root,
						message: describeThrown(error),
					}),
			}),
		);
		if (!stats.isDirectory()) {
			return yield* _(
				Effect.fail(
					new FileAccessError({
						operation: "stat",
						path: root,
						message: "Search root is not a directory",
					}),
				),
			);
		}
		return yield* _(walkDirectory(root, "", options));
	}).pipe(
		Effect.tapError((error) =>
			Effect.logDebug(`Unable to search ${error.path}: ${error.message}`),
		),
	);
}
