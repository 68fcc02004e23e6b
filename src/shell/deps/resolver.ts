// CHANGE: Dependency resolver (shared-library requirements of the packaged binary)
// WHY: Depends must follow the binary's real linkage, dpkg-shlibdeps computes it
// PURITY: SHELL (scratch files, external tool)
// EFFECT: Effect<string, DependencyResolutionError | IOError, ProcessRunner>
// INVARIANT: scratch `debian/` is gone after the call (success or failure); `opt/` is untouched
// COMPLEXITY: O(1) + scanner time

import { Effect } from "effect";

import {
	parseDependencyExpression,
	renderSourceControl,
} from "../../core/control/control.js";
import { DependencyResolutionError, type IOError } from "../../core/errors.js";
import type { PackageIdentity, PackageTree } from "../../core/models.js";
import { path } from "../../utils/node-mods.js";
import { type ProcessRunner, runLogged } from "../process/runner.js";
import { ensureDir, removeTreeBestEffort, writeTextFile } from "../tree/fs.js";

/** Source-package layout dpkg-shlibdeps looks for; not part of the artifact */
export const SCRATCH_SOURCE_DIR = "debian";

export const DEPENDENCY_SCANNER = "dpkg-shlibdeps";

function createScratchSource(
	tree: PackageTree,
	identity: PackageIdentity,
): Effect.Effect<string, IOError> {
	const dir = path.join(tree.root, SCRATCH_SOURCE_DIR);
	// release only runs after a successful acquire
	return ensureDir(dir).pipe(
		Effect.zipRight(
			writeTextFile(path.join(dir, "control"), renderSourceControl(identity)).pipe(
				Effect.tapError(() => removeTreeBestEffort(dir)),
			),
		),
		Effect.as(dir),
	);
}

function scan(
	tree: PackageTree,
): Effect.Effect<string, DependencyResolutionError, ProcessRunner> {
	return Effect.gen(function* () {
		const result = yield* runLogged({
			command: DEPENDENCY_SCANNER,
			args: ["-O", tree.binaryPath],
			cwd: tree.root,
		}).pipe(
			Effect.mapError(
				(error) =>
					new DependencyResolutionError({
						detail: `${error.command}: ${error.detail}`,
					}),
			),
		);

		if (result.exitCode !== 0) {
			return yield* Effect.fail(
				new DependencyResolutionError({
					detail: `${DEPENDENCY_SCANNER} exited with ${result.exitCode}: ${result.stderr.trim()}`,
				}),
			);
		}
		return yield* parseDependencyExpression(result.stdout);
	});
}

/**
 * Runs `dpkg-shlibdeps -O <opt/pkg/bin>` inside the tree and returns the
 * dependency expression.
 *
 * @param tree Package tree holding the copied binary
 * @param identity Written into the scratch `debian/control`
 *
 * @pure false
 * @effect Effect<string, DependencyResolutionError | IOError, ProcessRunner>
 */
export function resolveDependencies(
	tree: PackageTree,
	identity: PackageIdentity,
): Effect.Effect<string, DependencyResolutionError | IOError, ProcessRunner> {
	return Effect.gen(function* () {
		console.log(`🔗 Resolving shared library dependencies of ${tree.binaryPath}`);
		const depends = yield* Effect.acquireUseRelease(
			createScratchSource(tree, identity),
			() => scan(tree),
			(dir) => removeTreeBestEffort(dir),
		);
		console.log(`   Depends: ${depends}`);
		return depends;
	});
}
