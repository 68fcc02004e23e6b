// CHANGE: Path derivation from the tool's own location
// WHY: The packager runs without flags or environment variables; every input sits at a fixed place beside it
// PURITY: SHELL (reads import.meta.url)
// INVARIANT: toolRoot() is the same for src/shell/config/paths.ts and dist/shell/config/paths.js
// COMPLEXITY: O(1)

import type {
	PackagerConfig,
	ProjectLayout,
	ProjectMetadata,
	SourceFiles,
} from "../../core/models.js";
import { fileURLToPath, path } from "../../utils/node-mods.js";

const NAME_PLACEHOLDER = /\{name\}/gu;

/**
 * Root of the project the packager lives in (three levels above this module).
 */
export function toolRoot(): string {
	return path.resolve(fileURLToPath(new URL("../../../", import.meta.url)));
}

/**
 * @pure true
 */
export function projectLayout(
	root: string,
	config: Pick<PackagerConfig, "descriptor" | "outputDir">,
): ProjectLayout {
	return {
		root,
		descriptorPath: path.resolve(root, config.descriptor),
		outputDir: path.resolve(root, config.outputDir),
	};
}

/**
 * Resolves binary and icon locations, substituting `{name}` with the
 * descriptor name.
 *
 * @pure true
 * @example
 * ```ts
 * sourceFiles("/p", { binary: "target/release/{name}", icon: "ui/{name}.png" }, meta)
 * // { binary: "/p/target/release/astra_lite", icon: "/p/ui/astra_lite.png" }
 * ```
 */
export function sourceFiles(
	root: string,
	config: Pick<PackagerConfig, "binary" | "icon">,
	metadata: Pick<ProjectMetadata, "name">,
): SourceFiles {
	const expand = (template: string): string =>
		path.resolve(root, template.replace(NAME_PLACEHOLDER, metadata.name));
	return { binary: expand(config.binary), icon: expand(config.icon) };
}
