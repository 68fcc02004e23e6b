// CHANGE: Naming rules shared by the tree builder and the assembler
// WHY: Tree directory and artifact name must agree exactly
// PURITY: CORE
// INVARIANT: artifactFileName(id) = packageFileName(id) + ".deb"
// COMPLEXITY: O(1)

import type { PackageIdentity } from "../models.js";

export const CONTROL_DIR = "DEBIAN";
export const ARTIFACT_EXTENSION = ".deb";

/**
 * `<packageName>_<packageVersion>_<architecture>`
 *
 * @pure true
 */
export const packageFileName = (identity: PackageIdentity): string =>
	`${identity.packageName}_${identity.packageVersion}_${identity.architecture}`;

export const artifactFileName = (identity: PackageIdentity): string =>
	`${packageFileName(identity)}${ARTIFACT_EXTENSION}`;

/**
 * Tree-relative install prefix, e.g. `opt/astralite`.
 *
 * @pure true
 */
export const installPrefixFor = (packageName: string): string =>
	`opt/${packageName}`;

/**
 * Absolute path the file will have once the package is installed.
 *
 * @pure true
 * @example installedPath("opt/demo/demo") // "/opt/demo/demo"
 */
export const installedPath = (treeRelativePath: string): string =>
	`/${treeRelativePath.replace(/^\/+/u, "")}`;
