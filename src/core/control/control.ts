// CHANGE: Control metadata rendering and dependency-expression parsing
// WHY: The builder accepts a control file with empty fields; CORE refuses to produce one
// PURITY: CORE
// FORMAT THEOREM: ∀ bytes ≥ 0: installedSizeKiB(bytes) = ⌊bytes / 1024⌋
// INVARIANT: ∀ field ∈ ControlFields: rendered(field).value.length > 0
// COMPLEXITY: O(k) where k = |CONTROL_KEYS|

import { Effect } from "effect";

import { DependencyResolutionError, InvariantViolation } from "../errors.js";
import type { ControlFields, PackageIdentity } from "../models.js";
import { installedPath } from "../package/naming.js";

export const SHLIBS_DEPENDS_PREFIX = "shlibs:Depends=";

/**
 * Output order of the control file.
 */
export const CONTROL_KEYS: ReadonlyArray<
	readonly [string, keyof ControlFields]
> = [
	["Package", "package"],
	["Version", "version"],
	["Architecture", "architecture"],
	["Maintainer", "maintainer"],
	["Depends", "depends"],
	["Installed-Size", "installedSize"],
	["Description", "description"],
];

/**
 * @pure true
 * @invariant result = ⌊totalBytes / 1024⌋
 */
export const installedSizeKiB = (totalBytes: number): number =>
	Math.floor(totalBytes / 1024);

const foldLines = (value: string): string =>
	value.replace(/\s*\r?\n\s*/gu, " ").trim();

/**
 * Renders `DEBIAN/control`.
 *
 * @returns Effect with the file text or InvariantViolation naming the empty field
 *
 * @pure true
 * @effect Effect<string, InvariantViolation>
 * @postcondition one "Key: value" line per CONTROL_KEYS entry, in order
 */
export function renderControlFile(
	fields: ControlFields,
): Effect.Effect<string, InvariantViolation> {
	const lines: string[] = [];
	for (const [key, field] of CONTROL_KEYS) {
		const value = foldLines(String(fields[field]));
		if (value.length === 0) {
			return Effect.fail(
				new InvariantViolation({
					where: "DEBIAN/control",
					detail: `field ${key} is empty`,
				}),
			);
		}
		lines.push(`${key}: ${value}`);
	}
	return Effect.succeed(`${lines.join("\n")}\n`);
}

/**
 * Renders `DEBIAN/dirs`: the absolute install prefix owned by the package.
 *
 * @pure true
 * @example renderDirsFile("opt/demo") // "/opt/demo\n"
 */
export const renderDirsFile = (installPrefix: string): string =>
	`${installedPath(installPrefix)}\n`;

/**
 * Renders the scratch `debian/control` the scanner expects in a source tree.
 *
 * @pure true
 */
export const renderSourceControl = (identity: PackageIdentity): string =>
	[
		`Source: ${identity.packageName}`,
		`Version: ${identity.packageVersion}`,
		`Architecture: ${identity.architecture}`,
		"",
	].join("\n");

/**
 * Extracts the dependency expression from `dpkg-shlibdeps -O` output.
 *
 * @param stdout Scanner output
 * @returns Text after `shlibs:Depends=` with trailing whitespace removed
 *
 * @pure true
 * @effect Effect<string, DependencyResolutionError>
 * @invariant prefix absent → DependencyResolutionError
 */
export function parseDependencyExpression(
	stdout: string,
): Effect.Effect<string, DependencyResolutionError> {
	const line = stdout
		.split(/\r?\n/u)
		.find((l) => l.startsWith(SHLIBS_DEPENDS_PREFIX));
	if (line === undefined) {
		return Effect.fail(
			new DependencyResolutionError({
				detail: `scanner output has no ${SHLIBS_DEPENDS_PREFIX} line: ${JSON.stringify(stdout.trim())}`,
			}),
		);
	}
	return Effect.succeed(line.slice(SHLIBS_DEPENDS_PREFIX.length).trimEnd());
}
