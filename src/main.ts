// CHANGE: Make main.ts a thin APP delegator
// WHY: main derives everything from the tool location and delegates orchestration to app/buildPackage
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runPackager } from "./app/buildPackage.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 */
export function main(): Promise<ExitCode> {
	return Effect.runPromise(runPackager());
}
