// CHANGE: Package tree builder (scratch layout mirroring the installed system)
// WHY: dpkg-deb packs a directory; the directory name keys the artifact name
// PURITY: SHELL (creates directories, copies files)
// EFFECT: Effect<PackageTree, IOError>
// INVARIANT: basename(tree.root) = packageFileName(identity)
// COMPLEXITY: O(|binary| + |icon|)

import { Effect } from "effect";

import type { IOError } from "../../core/errors.js";
import type { PackageIdentity, PackageTree } from "../../core/models.js";
import {
	CONTROL_DIR,
	installPrefixFor,
	packageFileName,
} from "../../core/package/naming.js";
import { path } from "../../utils/node-mods.js";
import { copyIntoDir, ensureDir, pathExists, removeTree } from "./fs.js";

export interface TreeInput {
	readonly identity: PackageIdentity;
	readonly binarySource: string;
	readonly iconSource: string;
	readonly outputDir: string;
}

/**
 * Creates `<output>/<package>_<version>_<arch>/` with `DEBIAN/` and
 * `opt/<package>/`, then copies the binary and the icon into the latter.
 *
 * A tree left by an earlier failed run is removed first.
 *
 * @pure false - writes below outputDir
 * @effect Effect<PackageTree, IOError>
 * @postcondition files under installDir are byte-identical to the sources
 */
export function buildPackageTree(
	input: TreeInput,
): Effect.Effect<PackageTree, IOError> {
	return Effect.gen(function* () {
		const root = path.join(input.outputDir, packageFileName(input.identity));
		const installPrefix = installPrefixFor(input.identity.packageName);
		const controlDir = path.join(root, CONTROL_DIR);
		const installDir = path.join(root, installPrefix);

		yield* ensureDir(input.outputDir);
		if (pathExists(root)) {
			console.log(`🧹 Removing stale package tree: ${root}`);
			yield* removeTree(root);
		}

		console.log(`📁 Creating package tree: ${root}`);
		yield* ensureDir(controlDir);
		yield* ensureDir(installDir);
		yield* copyIntoDir(input.binarySource, installDir);
		yield* copyIntoDir(input.iconSource, installDir);

		const binaryFile = path.basename(input.binarySource);
		const iconFile = path.basename(input.iconSource);
		return {
			root,
			controlDir,
			installPrefix,
			installDir,
			binaryFile,
			iconFile,
			binaryPath: `${installPrefix}/${binaryFile}`,
			iconPath: `${installPrefix}/${iconFile}`,
		};
	});
}
