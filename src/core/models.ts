// CHANGE: Functional Core domain models for the packaging pipeline (pure, immutable)
// WHY: Stages exchange immutable records instead of mutating shared path variables
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the packager process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Values read from the `[package]` section of the project descriptor,
 * plus the names derived from them.
 *
 * @remarks
 * - @invariant packageVersion = `${major}.${minor}-${patch}` of version
 * - @invariant packageName matches /^[a-z0-9][a-z0-9.+-]+$/
 */
export interface ProjectMetadata {
	/** Descriptor `name` without surrounding quotes */
	readonly name: string;
	/** Descriptor `version` without surrounding quotes, `MAJOR.MINOR.PATCH` */
	readonly version: string;
	readonly description: string;
	readonly packageName: string;
	readonly packageVersion: string;
}

/**
 * Name/version/architecture triple that keys the tree and the artifact.
 */
export interface PackageIdentity {
	readonly packageName: string;
	readonly packageVersion: string;
	readonly architecture: string;
}

/**
 * Scratch directory mirroring the installed layout.
 *
 * @remarks
 * - root = <output>/<packageName>_<packageVersion>_<architecture>
 * - installPrefix, binaryPath and iconPath are relative to root
 */
export interface PackageTree {
	readonly root: string;
	readonly controlDir: string;
	readonly installPrefix: string;
	readonly installDir: string;
	readonly binaryFile: string;
	readonly iconFile: string;
	readonly binaryPath: string;
	readonly iconPath: string;
}

/**
 * Fields of the `DEBIAN/control` file, in the order they are written.
 */
export interface ControlFields {
	readonly package: string;
	readonly version: string;
	readonly architecture: string;
	readonly maintainer: string;
	readonly depends: string;
	readonly installedSize: number;
	readonly description: string;
}

/**
 * Settings that are not derived from the descriptor.
 *
 * @remarks
 * `descriptor`, `binary`, `icon` and `outputDir` are relative to the tool root;
 * `{name}` inside `binary` and `icon` is replaced by the metadata name.
 */
export interface PackagerConfig {
	readonly maintainer: string;
	readonly displayName: string | null;
	readonly categories: string;
	readonly descriptor: string;
	readonly binary: string;
	readonly icon: string;
	readonly outputDir: string;
}

/**
 * Absolute input/output locations of one run.
 */
export interface ProjectLayout {
	readonly root: string;
	readonly descriptorPath: string;
	readonly outputDir: string;
}

/**
 * Absolute paths of the files copied into the tree.
 */
export interface SourceFiles {
	readonly binary: string;
	readonly icon: string;
}

/**
 * Outcome of a successful run.
 */
export interface BuildResult {
	readonly artifactPath: string;
	readonly identity: PackageIdentity;
	readonly dependencies: string;
	readonly installedSizeKiB: number;
}
