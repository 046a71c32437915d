#!/usr/bin/env node

// Thin CLI shell wrapper - single point of process.exit
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { runUtility } from "../app/runUtility.js";

try {
	process.exit(runUtility(process.argv.slice(2)));
} catch (error) {
	// Shell boundary: report fatal and exit with failure
	console.error("Fatal error:", error);
	process.exit(1);
}
