// CHANGE: One-line rendering of pipeline failures
// WHY: BIN prints a single message per failed run; exhaustiveness is checked by ts-pattern
// PURITY: CORE
// INVARIANT: ∀ e ∈ PackagerError: describeFailure(e).length > 0
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { PackagerError } from "../errors.js";

/**
 * Formats a pipeline error for the console.
 *
 * @pure true
 */
export const describeFailure = (error: PackagerError): string =>
	match(error)
		.with(
			{ _tag: "MetadataError" },
			(e) => `Invalid project metadata (${e.source}): ${e.detail}`,
		)
		.with(
			{ _tag: "ProbeError" },
			(e) => `Architecture probe failed: ${e.detail}`,
		)
		.with(
			{ _tag: "DependencyResolutionError" },
			(e) => `Dependency resolution failed: ${e.detail}`,
		)
		.with(
			{ _tag: "IOError" },
			(e) => `Cannot ${e.operation} ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "BuildError" }, (e) => `Package build failed: ${e.detail}`)
		.with(
			{ _tag: "InvariantViolation" },
			(e) => `Refusing to build, ${e.where}: ${e.detail}`,
		)
		.exhaustive();
