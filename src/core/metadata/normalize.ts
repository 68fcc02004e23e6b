// CHANGE: Metadata normalization rules (package name, package version)
// WHY: Artifact names must be reproducible from the descriptor alone
// PURITY: CORE
// FORMAT THEOREM: ∀ M,N,P ∈ ℕ: normalizePackageVersion("M.N.P") = "M.N-P"
// INVARIANT: version ∉ /^\d+\.\d+\.\d+$/ → MetadataError
// COMPLEXITY: O(n) where n = |descriptor|

import { Effect } from "effect";

import { MetadataError } from "../errors.js";
import type { ProjectMetadata } from "../models.js";
import { type DescriptorSections, parseDescriptor } from "./descriptor.js";

const PACKAGE_SECTION = "package";
const SEMVER_TRIPLET = /^(\d+)\.(\d+)\.(\d+)$/u;
const DEBIAN_PACKAGE_NAME = /^[a-z0-9][a-z0-9.+-]+$/u;

/**
 * Removes one pair of matching surrounding quotes.
 *
 * @pure true
 */
export function unquote(value: string): string {
	const quoted = /^(["'])(.*)\1$/su.exec(value);
	return quoted === null ? value : (quoted[2] ?? "");
}

/**
 * Derives the package identifier from the descriptor name.
 *
 * @param rawName Descriptor `name`, quotes allowed
 * @returns Lower-cased name without quotes, underscores and whitespace
 *
 * @pure true
 * @example normalizePackageName('"astra_lite"') // "astralite"
 */
export function normalizePackageName(rawName: string): string {
	return unquote(rawName.trim()).replace(/[_\s]/gu, "").toLowerCase();
}

/**
 * Demotes the patch component into a packaging revision: "1.2.3" → "1.2-3".
 *
 * @returns Package version, or null when the value is not a strict triplet
 *
 * @pure true
 */
export function normalizePackageVersion(rawVersion: string): string | null {
	const m = SEMVER_TRIPLET.exec(unquote(rawVersion.trim()));
	if (m === null) return null;
	const [, major, minor, patch] = m;
	if (major === undefined || minor === undefined || patch === undefined) {
		return null;
	}
	return `${major}.${minor}-${patch}`;
}

function requireKey(
	sections: DescriptorSections,
	key: string,
	source: string,
): Effect.Effect<string, MetadataError> {
	const section = sections.get(PACKAGE_SECTION);
	if (section === undefined) {
		return Effect.fail(
			new MetadataError({
				source,
				detail: `missing [${PACKAGE_SECTION}] section`,
			}),
		);
	}
	const value = section.get(key);
	return value === undefined
		? Effect.fail(
				new MetadataError({
					source,
					detail: `missing "${key}" in [${PACKAGE_SECTION}]`,
				}),
			)
		: Effect.succeed(value);
}

/**
 * Parses descriptor text into Project Metadata.
 *
 * @param text Descriptor contents
 * @param source Label used in error messages (usually the file path)
 * @returns Effect with metadata or MetadataError
 *
 * @pure true (no side effects, Effect used only for the typed error channel)
 * @effect Effect<ProjectMetadata, MetadataError>
 * @invariant result.packageVersion = normalizePackageVersion(version)
 */
export function parseProjectMetadata(
	text: string,
	source = "descriptor",
): Effect.Effect<ProjectMetadata, MetadataError> {
	return Effect.gen(function* () {
		const sections = parseDescriptor(text);
		const rawName = yield* requireKey(sections, "name", source);
		const rawVersion = yield* requireKey(sections, "version", source);
		const rawDescription = yield* requireKey(sections, "description", source);

		const packageVersion = normalizePackageVersion(rawVersion);
		if (packageVersion === null) {
			return yield* Effect.fail(
				new MetadataError({
					source,
					detail: `version ${rawVersion} is not MAJOR.MINOR.PATCH`,
				}),
			);
		}

		const packageName = normalizePackageName(rawName);
		if (!DEBIAN_PACKAGE_NAME.test(packageName)) {
			return yield* Effect.fail(
				new MetadataError({
					source,
					detail: `name ${rawName} does not give a valid package name ("${packageName}")`,
				}),
			);
		}

		return {
			name: unquote(rawName),
			version: unquote(rawVersion),
			description: unquote(rawDescription),
			packageName,
			packageVersion,
		};
	});
}
