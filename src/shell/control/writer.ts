// CHANGE: Control file writer (DEBIAN/control + DEBIAN/dirs)
// WHY: The package manager reads these before installing anything
// PURITY: SHELL (measures and writes files)
// EFFECT: Effect<ControlFiles, IOError | InvariantViolation>
// INVARIANT: Installed-Size = ⌊Σ sizes(installDir) / 1024⌋
// COMPLEXITY: O(n) where n = files under installDir

import { Effect } from "effect";

import {
	installedSizeKiB,
	renderControlFile,
	renderDirsFile,
} from "../../core/control/control.js";
import type { InvariantViolation, IOError } from "../../core/errors.js";
import type { PackageIdentity, PackageTree } from "../../core/models.js";
import { path } from "../../utils/node-mods.js";
import { totalFileBytes, writeTextFile } from "../tree/fs.js";

export interface ControlInput {
	readonly tree: PackageTree;
	readonly identity: PackageIdentity;
	readonly maintainer: string;
	readonly dependencies: string;
	readonly description: string;
}

export interface ControlFiles {
	readonly controlPath: string;
	readonly dirsPath: string;
	readonly installedSizeKiB: number;
}

/**
 * Sum of byte sizes below the install prefix, in whole KiB (truncated).
 *
 * @effect Effect<number, IOError>
 */
export const computeInstalledSize = (
	tree: Pick<PackageTree, "installDir">,
): Effect.Effect<number, IOError> =>
	totalFileBytes(tree.installDir).pipe(Effect.map(installedSizeKiB));

/**
 * Writes the control metadata and the directory manifest.
 *
 * @effect Effect<ControlFiles, IOError | InvariantViolation>
 * @postcondition nothing is written when a control field is empty
 */
export function writeControlFiles(
	input: ControlInput,
): Effect.Effect<ControlFiles, IOError | InvariantViolation> {
	return Effect.gen(function* () {
		const size = yield* computeInstalledSize(input.tree);
		const control = yield* renderControlFile({
			package: input.identity.packageName,
			version: input.identity.packageVersion,
			architecture: input.identity.architecture,
			maintainer: input.maintainer,
			depends: input.dependencies,
			installedSize: size,
			description: input.description,
		});

		const controlPath = path.join(input.tree.controlDir, "control");
		const dirsPath = path.join(input.tree.controlDir, "dirs");
		console.log(`📝 Writing control metadata (Installed-Size: ${size} KiB)`);
		yield* writeTextFile(controlPath, control);
		yield* writeTextFile(dirsPath, renderDirsFile(input.tree.installPrefix));

		return { controlPath, dirsPath, installedSizeKiB: size };
	});
}
