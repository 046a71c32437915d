// Application layer: one CLI invocation runs one utility once
// PURITY: APP (no process.exit; console output delegated to the printer)
// INVARIANT: Returns ExitCode as value; configuration errors and usage errors map to 1
// COMPLEXITY: O(utility execution)

import * as path from "node:path";

import { Either } from "effect";
import { match } from "ts-pattern";

import { createTransformationContext } from "../core/context.js";
import { computeExitCode } from "../core/decision.js";
import { InvalidConfigurationError } from "../core/errors.js";
import type { UtilityPayload } from "../core/format/result.js";
import type { ExitCode } from "../core/models.js";
import type { ExecutionResult } from "../core/result.js";
import type { TransformationContext } from "../core/types/context.js";
import {
	type CLICommand,
	type FindFilesCommand,
	loadUtilitiesConfig,
	parseCLIArgs,
	type PomParentMatchCommand,
	USAGE,
} from "../shell/config/index.js";
import { printResult } from "../shell/output/printer.js";
import { FindFiles } from "../utilities/find-files.js";
import { PomParentMatch } from "../utilities/pom-parent-match.js";

type Execute = (
	appRoot: string,
	context: TransformationContext,
) => ExecutionResult<UtilityPayload>;

function findFiles(command: FindFilesCommand): Execute {
	const utility = new FindFiles({
		nameRegex: command.nameRegex,
		pathRegex: command.pathRegex,
	});
	if (command.pathRegex === undefined) {
		utility.setRecursive(command.recursive);
	}
	if (command.root !== undefined) {
		utility.relative(command.root);
	}
	return (appRoot, context) => utility.execution(appRoot, context);
}

function pomParentMatch(command: PomParentMatchCommand): Execute {
	const utility = new PomParentMatch({
		groupId: command.groupId,
		artifactId: command.artifactId,
		version: command.version,
	}).relative(command.file);
	return (appRoot, context) => utility.execution(appRoot, context);
}

/**
 * Builds the utility named by the command; setters validate eagerly.
 *
 * @throws InvalidConfigurationError for blank or malformed parameters
 */
function configure(command: CLICommand): Execute {
	return match(command)
		.with({ command: "find-files" }, findFiles)
		.with({ command: "pom-parent-match" }, pomParentMatch)
		.exhaustive();
}

/**
 * Runs the utility described by `argv` once and prints its result.
 *
 * @param argv Arguments after the script name
 * @param cwd Directory holding the optional config file; default app root
 * @returns 0 for VALUE and WARNING results, 1 for ERROR results and bad input
 *
 * @example
 * ```ts
 * const code = runUtility(["pom-parent-match", "--group", "com.test", "--artifact", "foo-parent"]);
 * ```
 */
export function runUtility(
	argv: readonly string[],
	cwd: string = process.cwd(),
): ExitCode {
	const parsed = parseCLIArgs(argv);
	if (Either.isLeft(parsed)) {
		console.error(`❌ ${parsed.left.message}`);
		console.error(USAGE);
		return 1;
	}

	const command = parsed.right;
	const config = loadUtilitiesConfig(cwd);
	const appRoot = path.resolve(cwd, command.appRoot ?? config.appRoot ?? ".");
	const context = createTransformationContext(config.contextAttributes);

	let execute: Execute;
	try {
		execute = configure(command);
	} catch (error) {
		if (error instanceof InvalidConfigurationError) {
			console.error(`❌ ${error.message}`);
			return 1;
		}
		throw error;
	}

	const result = execute(appRoot, context);
	printResult(result, appRoot);
	return computeExitCode(result.tag);
}
