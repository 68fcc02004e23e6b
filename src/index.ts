// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, CORE utilities and the runner service; keep stage internals reachable only through them
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, Effects or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Packaging pipeline.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { buildPackage, ProcessRunnerLive } from "deb-packager";
 *
 * const result = await Effect.runPromise(
 *   buildPackage({ layout, config }).pipe(Effect.provide(ProcessRunnerLive)),
 * );
 * console.log(result.artifactPath);
 * ```
 */
export {
	buildPackage,
	type PipelineInput,
	runPackager,
	runPipeline,
} from "./app/buildPackage.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	BuildResult,
	ControlFields,
	ExitCode,
	PackageIdentity,
	PackagerConfig,
	PackageTree,
	ProjectLayout,
	ProjectMetadata,
} from "./core/models.js";
export type { DesktopEntry } from "./core/desktop/entry.js";
export {
	BuildError,
	DependencyResolutionError,
	ExecError,
	InvariantViolation,
	IOError,
	MetadataError,
	type PackagerError,
	ProbeError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	normalizePackageName,
	normalizePackageVersion,
	parseProjectMetadata,
} from "./core/metadata/normalize.js";
export { renderDesktopEntry } from "./core/desktop/entry.js";
export {
	installedSizeKiB,
	parseDependencyExpression,
	renderControlFile,
} from "./core/control/control.js";
export { describeFailure } from "./core/format/failure.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type ProcessInvocation,
	type ProcessResult,
	ProcessRunner,
	ProcessRunnerLive,
} from "./shell/process/runner.js";
export {
	DEFAULT_PACKAGER_CONFIG,
	loadPackagerConfig,
} from "./shell/config/loader.js";
export { projectLayout, sourceFiles } from "./shell/config/paths.js";
