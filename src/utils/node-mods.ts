/**
 * CHANGE: Centralized re-exports of Node built-ins shared by SHELL modules
 * WHY: Every stage needs the same fs/path/execFile import block; one module keeps them identical
 *
 * Invariant: re-export through constants, never `export *` of modules that use `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { execFile } from "node:child_process";
export { fileURLToPath } from "node:url";

// node:path (and often node:fs) are `export =` modules, incompatible with `export *`
export const fs = fsNS;
export const path = pathNS;
