/**
 * Centralized re-exports of Node built-ins used by the shell.
 *
 * Invariant: exported as constants, since `node:path` and `node:fs` use `export =`
 * which is incompatible with `export *`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export const fs = fsNS;
export const path = pathNS;
