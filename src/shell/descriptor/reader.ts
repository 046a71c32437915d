// Reads and parses a project descriptor, keeping the close outcome apart
// FORMAT THEOREM: open succeeds ⇒ close is attempted exactly once, whatever read/parse did
// PURITY: SHELL
// EFFECT: Effect<DescriptorRead, FileAccessError>
// INVARIANT: The failure channel only carries open failures; nothing is held open on it
// COMPLEXITY: O(n) where n = descriptor size

import { Effect, Either } from "effect";

import { parseProjectDescriptor } from "../../core/descriptor/parser.js";
import {
	type DescriptorReadError,
	describeThrown,
	FileAccessError,
	type FileOperation,
} from "../../core/errors.js";
import type { ProjectDescriptor } from "../../core/types/descriptor.js";
import type { FileAccess } from "../fs/file-access.js";

/**
 * Outcome of reading an opened descriptor.
 *
 * @property descriptor Parsed model, or the read/parse failure
 * @property release Close outcome, kept separate so a close failure never hides a primary one
 */
export interface DescriptorRead {
	readonly descriptor: Either.Either<ProjectDescriptor, DescriptorReadError>;
	readonly release: Either.Either<void, FileAccessError>;
}

function attempt<A>(
	operation: FileOperation,
	filePath: string,
	run: () => A,
): Effect.Effect<A, FileAccessError> {
	return Effect.try({
		try: run,
		catch: (error) =>
			new FileAccessError({
				operation,
				path: filePath,
				message: describeThrown(error),
			}),
	});
}

/**
 * Opens, reads, parses and closes the descriptor at `filePath`.
 *
 * @pure false (filesystem reads)
 * @effect Effect<DescriptorRead, FileAccessError>
 * @postcondition success ⇒ close was attempted and its outcome is in `release`
 */
export function readProjectDescriptor(
	filePath: string,
	access: FileAccess,
): Effect.Effect<DescriptorRead, FileAccessError> {
	return Effect.gen(function* (_) {
		const handle = yield* _(attempt("open", filePath, () => access.open(filePath)));
		yield* _(Effect.logDebug(`Reading descriptor ${filePath}`));

		const descriptor = yield* _(
			Effect.either(
				attempt("read", filePath, () => access.read(handle)).pipe(
					Effect.flatMap((source) => parseProjectDescriptor(source)),
				),
			),
		);
		const release = yield* _(
			Effect.either(attempt("close", filePath, () => access.close(handle))),
		);
		return { descriptor, release };
	});
}
