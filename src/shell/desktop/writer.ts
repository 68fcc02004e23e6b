// CHANGE: Desktop entry writer
// WHY: Registers the application in menus of the target system
// PURITY: SHELL (file write)
// EFFECT: Effect<string, IOError>
// COMPLEXITY: O(1)

import { Effect } from "effect";

import {
	desktopEntryFor,
	renderDesktopEntry,
} from "../../core/desktop/entry.js";
import type { IOError } from "../../core/errors.js";
import type {
	PackagerConfig,
	PackageTree,
	ProjectMetadata,
} from "../../core/models.js";
import { path } from "../../utils/node-mods.js";
import { ensureDir, writeTextFile } from "../tree/fs.js";

export const APPLICATIONS_DIR = "usr/share/applications";

/**
 * Writes `<root>/usr/share/applications/<binary>.desktop`.
 *
 * @returns Absolute path of the written entry
 */
export function writeDesktopEntry(
	tree: PackageTree,
	metadata: ProjectMetadata,
	config: Pick<PackagerConfig, "displayName" | "categories">,
): Effect.Effect<string, IOError> {
	return Effect.gen(function* () {
		const dir = path.join(tree.root, APPLICATIONS_DIR);
		const file = path.join(dir, `${tree.binaryFile}.desktop`);
		const text = renderDesktopEntry(desktopEntryFor(metadata, tree, config));

		console.log(`🖥️  Writing desktop entry: ${file}`);
		yield* ensureDir(dir);
		yield* writeTextFile(file, text);
		return file;
	});
}
