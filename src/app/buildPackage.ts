// CHANGE: Application layer: the packaging pipeline as one Effect
// WHY: Each stage takes the previous stage's record and returns the next, threading one build context
// PURITY: APP (composition; no process.exit)
// EFFECT: Effect<BuildResult, PackagerError, ProcessRunner>
// INVARIANT: stages run strictly in order; the first failure stops the run
// COMPLEXITY: O(n) where n = bytes copied into the tree

import { Effect } from "effect";

import type { PackagerError } from "../core/errors.js";
import { describeFailure } from "../core/format/failure.js";
import type {
	BuildResult,
	ExitCode,
	PackageIdentity,
	PackagerConfig,
	PackageTree,
	ProjectLayout,
	ProjectMetadata,
	SourceFiles,
} from "../core/models.js";
import { assemblePackage } from "../shell/assemble/assembler.js";
import { CONFIG_FILE_NAME, loadPackagerConfig } from "../shell/config/loader.js";
import { projectLayout, sourceFiles, toolRoot } from "../shell/config/paths.js";
import { writeControlFiles } from "../shell/control/writer.js";
import { resolveDependencies } from "../shell/deps/resolver.js";
import { writeDesktopEntry } from "../shell/desktop/writer.js";
import { extractMetadata } from "../shell/metadata/extractor.js";
import { probeArchitecture } from "../shell/platform/prober.js";
import {
	type ProcessRunner,
	ProcessRunnerLive,
} from "../shell/process/runner.js";
import { buildPackageTree } from "../shell/tree/builder.js";
import { path } from "../utils/node-mods.js";

export interface PipelineInput {
	readonly layout: ProjectLayout;
	readonly config: PackagerConfig;
}

export interface InspectedContext extends PipelineInput {
	readonly metadata: ProjectMetadata;
	readonly identity: PackageIdentity;
	readonly sources: SourceFiles;
}

export interface TreeContext extends InspectedContext {
	readonly tree: PackageTree;
}

export interface ResolvedContext extends TreeContext {
	readonly desktopEntryPath: string;
	readonly dependencies: string;
}

export interface ControlledContext extends ResolvedContext {
	readonly installedSizeKiB: number;
}

/**
 * Metadata Extractor + Platform Prober (independent of each other).
 */
export function inspectProject(
	input: PipelineInput,
): Effect.Effect<InspectedContext, PackagerError, ProcessRunner> {
	return Effect.all([
		extractMetadata(input.layout.descriptorPath),
		probeArchitecture(),
	]).pipe(
		Effect.map(([metadata, architecture]) => ({
			...input,
			metadata,
			identity: {
				packageName: metadata.packageName,
				packageVersion: metadata.packageVersion,
				architecture,
			},
			sources: sourceFiles(input.layout.root, input.config, metadata),
		})),
	);
}

export function layOutTree(
	ctx: InspectedContext,
): Effect.Effect<TreeContext, PackagerError> {
	return buildPackageTree({
		identity: ctx.identity,
		binarySource: ctx.sources.binary,
		iconSource: ctx.sources.icon,
		outputDir: ctx.layout.outputDir,
	}).pipe(Effect.map((tree) => ({ ...ctx, tree })));
}

/**
 * Desktop Entry Generator + Dependency Resolver (order-independent).
 */
export function integrate(
	ctx: TreeContext,
): Effect.Effect<ResolvedContext, PackagerError, ProcessRunner> {
	return Effect.all([
		writeDesktopEntry(ctx.tree, ctx.metadata, ctx.config),
		resolveDependencies(ctx.tree, ctx.identity),
	]).pipe(
		Effect.map(([desktopEntryPath, dependencies]) => ({
			...ctx,
			desktopEntryPath,
			dependencies,
		})),
	);
}

export function writeControl(
	ctx: ResolvedContext,
): Effect.Effect<ControlledContext, PackagerError> {
	return writeControlFiles({
		tree: ctx.tree,
		identity: ctx.identity,
		maintainer: ctx.config.maintainer,
		dependencies: ctx.dependencies,
		description: ctx.metadata.description,
	}).pipe(
		Effect.map((files) => ({
			...ctx,
			installedSizeKiB: files.installedSizeKiB,
		})),
	);
}

export function assemble(
	ctx: ControlledContext,
): Effect.Effect<BuildResult, PackagerError, ProcessRunner> {
	return assemblePackage(ctx.tree, ctx.identity, ctx.layout.outputDir).pipe(
		Effect.map((artifactPath) => ({
			artifactPath,
			identity: ctx.identity,
			dependencies: ctx.dependencies,
			installedSizeKiB: ctx.installedSizeKiB,
		})),
	);
}

/**
 * Full pipeline.
 *
 * A run that fails before `assemble` leaves its tree for inspection; the
 * next run removes it before building a new one.
 *
 * @effect Effect<BuildResult, PackagerError, ProcessRunner>
 */
export function buildPackage(
	input: PipelineInput,
): Effect.Effect<BuildResult, PackagerError, ProcessRunner> {
	return inspectProject(input).pipe(
		Effect.flatMap(layOutTree),
		Effect.flatMap((ctx) =>
			integrate(ctx).pipe(
				Effect.flatMap(writeControl),
				Effect.tapError(() =>
					Effect.sync(() => {
						console.error(`   Package tree kept for inspection: ${ctx.tree.root}`);
					}),
				),
			),
		),
		Effect.flatMap(assemble),
	);
}

/**
 * Runs the pipeline and maps the outcome to an exit code, reporting on the console.
 *
 * @effect Effect<ExitCode, never, ProcessRunner>
 * @invariant ExitCode ∈ {0,1}
 */
export function runPipeline(
	input: PipelineInput,
): Effect.Effect<ExitCode, never, ProcessRunner> {
	return buildPackage(input).pipe(
		Effect.match({
			onFailure: (error): ExitCode => {
				console.error(`❌ ${describeFailure(error)}`);
				return 1;
			},
			onSuccess: (result): ExitCode => {
				console.log(`✅ Package created: ${result.artifactPath}`);
				return 0;
			},
		}),
	);
}

/**
 * Orchestrates a parameter-free run: config and paths come from the tool's location.
 *
 * @returns Effect<ExitCode, never> with the live process runner provided
 * @pure false
 */
export function runPackager(
	root: string = toolRoot(),
): Effect.Effect<ExitCode> {
	return Effect.suspend(() => {
		const config = loadPackagerConfig(path.join(root, CONFIG_FILE_NAME));
		const layout = projectLayout(root, config);
		return runPipeline({ layout, config });
	}).pipe(Effect.provide(ProcessRunnerLive));
}
