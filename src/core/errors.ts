// CHANGE: Typed domain error ADT for the packaging pipeline using Effect.Data
// WHY: Every stage failure travels in the Effect error channel, discriminated by `_tag`
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Project descriptor is missing a section/key or carries a malformed value.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class MetadataError extends Data.TaggedError("MetadataError")<{
	readonly source: string;
	readonly detail: string;
}> {}

/**
 * Architecture probe could not be run or returned nothing usable.
 *
 * @pure true (Data class)
 */
export class ProbeError extends Data.TaggedError("ProbeError")<{
	readonly detail: string;
}> {}

/**
 * Shared-library scanner failed or printed an unexpected format.
 *
 * @pure true (Data class)
 */
export class DependencyResolutionError extends Data.TaggedError(
	"DependencyResolutionError",
)<{
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant operation.length > 0 ∧ path.length > 0
 */
export class IOError extends Data.TaggedError("IOError")<{
	readonly operation: string;
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Archive builder failed to produce the artifact.
 *
 * @pure true (Data class)
 */
export class BuildError extends Data.TaggedError("BuildError")<{
	readonly detail: string;
}> {}

/**
 * External command could not be started (or was killed by a signal).
 * Stages map it to their own error kind.
 *
 * @pure true (Data class)
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * Invariant violation - guarantee broken before an external tool sees the data
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Union of all errors a packaging run can end with.
 */
export type PackagerError =
	| MetadataError
	| ProbeError
	| DependencyResolutionError
	| IOError
	| BuildError
	| InvariantViolation;
