// CLI argument parsing for the transform-utilities binary
// PURITY: SHELL (pure over argv, no process access)
// INVARIANT: Parsing never throws; usage problems are Left values
// COMPLEXITY: O(n) where n = |argv|

import { Data, Either } from "effect";

/**
 * Invalid command line.
 */
export class UsageError extends Data.TaggedError("Usage")<{
	readonly message: string;
}> {}

export interface FindFilesCommand {
	readonly command: "find-files";
	readonly nameRegex?: string;
	readonly pathRegex?: string;
	readonly recursive: boolean;
	readonly root?: string;
	readonly appRoot?: string;
}

export interface PomParentMatchCommand {
	readonly command: "pom-parent-match";
	readonly groupId: string;
	readonly artifactId: string;
	readonly version?: string;
	readonly file: string;
	readonly appRoot?: string;
}

export type CLICommand = FindFilesCommand | PomParentMatchCommand;

export const USAGE = [
	"Usage:",
	"  transform-utilities find-files [--name <regex>] [--path <regex>] [--recursive] [--root <dir>] [--app-root <dir>]",
	"  transform-utilities pom-parent-match --group <groupId> --artifact <artifactId> [--version <version>] [--file <pom>] [--app-root <dir>]",
].join("\n");

type ValueFlag =
	| "name"
	| "path"
	| "root"
	| "appRoot"
	| "group"
	| "artifact"
	| "version"
	| "file";

interface ParsedFlags {
	readonly values: Readonly<Partial<Record<ValueFlag, string>>>;
	readonly recursive: boolean;
}

const valueFlags: Readonly<Record<string, ValueFlag | undefined>> = {
	"--name": "name",
	"--path": "path",
	"--root": "root",
	"--app-root": "appRoot",
	"--group": "group",
	"--artifact": "artifact",
	"--version": "version",
	"--file": "file",
};

/**
 * Collects flags into a map; value flags consume the next argument.
 */
function parseFlags(args: readonly string[]): Either.Either<ParsedFlags, UsageError> {
	const values: Partial<Record<ValueFlag, string>> = {};
	let recursive = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg === "--recursive") {
			recursive = true;
			continue;
		}
		const key = valueFlags[arg];
		if (key === undefined) {
			return Either.left(new UsageError({ message: `Unknown argument: ${arg}` }));
		}
		const next = args[i + 1];
		if (next === undefined || next.startsWith("--")) {
			return Either.left(new UsageError({ message: `Missing value for ${arg}` }));
		}
		values[key] = next;
		i++;
	}
	return Either.right({ values, recursive });
}

function toFindFiles(flags: ParsedFlags): FindFilesCommand {
	const { name, path, root, appRoot } = flags.values;
	return {
		command: "find-files",
		nameRegex: name,
		pathRegex: path,
		recursive: flags.recursive,
		root,
		appRoot,
	};
}

function toPomParentMatch(
	flags: ParsedFlags,
): Either.Either<PomParentMatchCommand, UsageError> {
	const { group, artifact, version, file, appRoot } = flags.values;
	if (group === undefined || artifact === undefined) {
		return Either.left(
			new UsageError({
				message: "pom-parent-match requires --group and --artifact",
			}),
		);
	}
	if (flags.recursive) {
		return Either.left(
			new UsageError({ message: "--recursive only applies to find-files" }),
		);
	}
	const parsed: PomParentMatchCommand = {
		command: "pom-parent-match",
		groupId: group,
		artifactId: artifact,
		version,
		file: file ?? "pom.xml",
		appRoot,
	};
	return Either.right(parsed);
}

/**
 * Parses command line arguments (without the node and script entries).
 *
 * @example
 * ```ts
 * parseCLIArgs(["find-files", "--name", ".*\\.xml", "--recursive"]);
 * // Right({ command: "find-files", nameRegex: ".*\\.xml", recursive: true, ... })
 * ```
 */
export function parseCLIArgs(
	argv: readonly string[],
): Either.Either<CLICommand, UsageError> {
	const [command, ...rest] = argv;
	if (command === undefined) {
		return Either.left(new UsageError({ message: "Missing command" }));
	}
	const flags = parseFlags(rest);
	if (Either.isLeft(flags)) {
		return Either.left(flags.left);
	}
	switch (command) {
		case "find-files":
			return Either.right(toFindFiles(flags.right));
		case "pom-parent-match":
			return toPomParentMatch(flags.right);
		default:
			return Either.left(new UsageError({ message: `Unknown command: ${command}` }));
	}
}
