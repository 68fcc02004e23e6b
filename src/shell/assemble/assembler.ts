// CHANGE: Package assembler (dpkg-deb) with unconditional tree removal
// WHY: The artifact is the only output that may outlive the run
// PURITY: SHELL (external tool, filesystem)
// EFFECT: Effect<string, BuildError, ProcessRunner>
// INVARIANT: after the call (success or failure) tree.root no longer exists, unless removal itself failed (logged)
// COMPLEXITY: O(1) + builder time

import { Effect } from "effect";

import { BuildError } from "../../core/errors.js";
import type { PackageIdentity, PackageTree } from "../../core/models.js";
import { artifactFileName } from "../../core/package/naming.js";
import { path } from "../../utils/node-mods.js";
import { type ProcessRunner, runLogged } from "../process/runner.js";
import { pathExists, removeTreeBestEffort } from "../tree/fs.js";

export const ARCHIVE_BUILDER = "dpkg-deb";

function build(
	tree: PackageTree,
	outputDir: string,
	artifactPath: string,
): Effect.Effect<string, BuildError, ProcessRunner> {
	return Effect.gen(function* () {
		const result = yield* runLogged({
			command: ARCHIVE_BUILDER,
			args: ["--root-owner-group", "--build", tree.root],
			cwd: outputDir,
		}).pipe(
			Effect.mapError(
				(error) =>
					new BuildError({ detail: `${error.command}: ${error.detail}` }),
			),
		);

		if (result.exitCode !== 0) {
			return yield* Effect.fail(
				new BuildError({
					detail: `${ARCHIVE_BUILDER} exited with ${result.exitCode}: ${result.stderr.trim()}`,
				}),
			);
		}
		if (!pathExists(artifactPath)) {
			return yield* Effect.fail(
				new BuildError({
					detail: `${ARCHIVE_BUILDER} succeeded but ${artifactPath} is missing`,
				}),
			);
		}
		return artifactPath;
	});
}

/**
 * Builds `<output>/<package>_<version>_<arch>.deb` from the tree with root
 * ownership, then removes the tree.
 *
 * @returns Absolute artifact path
 *
 * @pure false
 * @effect Effect<string, BuildError, ProcessRunner>
 */
export function assemblePackage(
	tree: PackageTree,
	identity: PackageIdentity,
	outputDir: string,
): Effect.Effect<string, BuildError, ProcessRunner> {
	const artifactPath = path.join(outputDir, artifactFileName(identity));
	return Effect.sync(() => {
		console.log(`📦 Building ${artifactPath}`);
	}).pipe(
		Effect.zipRight(build(tree, outputDir, artifactPath)),
		Effect.ensuring(removeTreeBestEffort(tree.root)),
	);
}
