// CHANGE: Desktop entry as a typed record rendered by one function
// WHY: Sequential substring replacement could drop a field; an ordered key table cannot
// PURITY: CORE
// INVARIANT: ∀ entry: renderDesktopEntry(entry) contains exactly one line per DESKTOP_ENTRY_KEYS element
// COMPLEXITY: O(k) where k = |DESKTOP_ENTRY_KEYS|

import type { PackageTree, ProjectMetadata } from "../models.js";
import { installedPath } from "../package/naming.js";

/**
 * Application registration record (freedesktop.org Desktop Entry).
 */
export interface DesktopEntry {
	readonly version: string;
	readonly type: "Application";
	readonly name: string;
	readonly comment: string;
	readonly categories: string;
	readonly tryExec: string;
	readonly exec: string;
	readonly icon: string;
}

export const DESKTOP_ENTRY_GROUP = "[Desktop Entry]";

/**
 * Output order of the entry keys.
 */
export const DESKTOP_ENTRY_KEYS: ReadonlyArray<
	readonly [string, keyof DesktopEntry]
> = [
	["Version", "version"],
	["Type", "type"],
	["Name", "name"],
	["Comment", "comment"],
	["Categories", "categories"],
	["TryExec", "tryExec"],
	["Exec", "exec"],
	["Icon", "icon"],
];

// Desktop Entry values are single-line; "\\" and "\n" are the escapes the format defines.
const escapeValue = (value: string): string =>
	value.replace(/\\/gu, "\\\\").replace(/\r?\n/gu, "\\n");

const EXEC_RESERVED = /[\s"'\\><~|&;$*?#()`]/u;

/**
 * Quotes one Exec argument: reserved characters force double quotes, inside
 * which `"`, `` ` ``, `$` and `\` take a backslash; `%` is always doubled.
 *
 * @pure true
 * @example
 * ```ts
 * quoteExecArgument("/opt/astra lite/astra") // "\"/opt/astra lite/astra\""
 * ```
 */
export function quoteExecArgument(argument: string): string {
	const literal = argument.replace(/%/gu, "%%");
	return EXEC_RESERVED.test(literal)
		? `"${literal.replace(/["`$\\]/gu, "\\$&")}"`
		: literal;
}

/**
 * Renders the entry, empty values included (`Comment=` stays when the description is empty).
 *
 * @pure true
 * @postcondition result ends with "\n"
 */
export function renderDesktopEntry(entry: DesktopEntry): string {
	const lines = DESKTOP_ENTRY_KEYS.map(
		([key, field]) => `${key}=${escapeValue(entry[field])}`,
	);
	return `${[DESKTOP_ENTRY_GROUP, ...lines].join("\n")}\n`;
}

/**
 * Builds the entry for the packaged application.
 *
 * @param metadata Project metadata
 * @param tree Package tree holding the binary and the icon
 * @param settings Display name override and static categories
 *
 * @pure true
 */
export function desktopEntryFor(
	metadata: ProjectMetadata,
	tree: Pick<PackageTree, "binaryPath" | "iconPath">,
	settings: { readonly displayName: string | null; readonly categories: string },
): DesktopEntry {
	const binary = installedPath(tree.binaryPath);
	return {
		version: metadata.packageVersion,
		type: "Application",
		name: settings.displayName ?? metadata.name,
		comment: metadata.description,
		categories: settings.categories,
		tryExec: binary,
		exec: quoteExecArgument(binary),
		icon: installedPath(tree.iconPath),
	};
}
