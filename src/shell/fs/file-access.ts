// Handle-based file access port used by the descriptor reader
// PURITY: SHELL
// INVARIANT: Every handle returned by open is passed to close exactly once by its consumer
// COMPLEXITY: O(n) per read where n = file size

import { fs } from "../utils/node-mods.js";

/**
 * Minimal handle-oriented file API.
 *
 * Implementations throw on failure, like `node:fs` synchronous calls; the
 * reader turns those throws into typed failures.
 */
export interface FileAccess {
	readonly open: (filePath: string) => number;
	readonly read: (handle: number) => string;
	readonly close: (handle: number) => void;
}

/**
 * Default implementation over synchronous `node:fs` file descriptors.
 */
export const nodeFileAccess: FileAccess = {
	open: (filePath) => fs.openSync(filePath, "r"),
	read: (handle) => fs.readFileSync(handle, "utf8"),
	close: (handle) => {
		fs.closeSync(handle);
	},
};
