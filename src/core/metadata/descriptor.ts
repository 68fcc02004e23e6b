// CHANGE: Section/key-value parser for the project descriptor
// WHY: Metadata extraction needs only `[package]` name/version/description; a line parser keeps CORE pure
// PURITY: CORE
// INVARIANT: ∀ text: parseDescriptor(text) is total (never fails), unknown syntax is skipped
// COMPLEXITY: O(n) where n = |lines|

/**
 * Parsed descriptor: section name → (key → raw value).
 */
export type DescriptorSections = ReadonlyMap<string, ReadonlyMap<string, string>>;

const SECTION_HEADER = /^\[+\s*([^[\]]+?)\s*\]+$/u;

/**
 * Checks whether a trimmed line carries no data.
 *
 * @pure true
 */
function isSkippable(line: string): boolean {
	return line.length === 0 || line.startsWith("#") || line.startsWith(";");
}

/**
 * Splits descriptor text into sections of raw `key = value` pairs.
 *
 * Values keep their quotes; callers decide how to unquote.
 *
 * @param text Descriptor file contents
 * @returns Sections in file order; a repeated key keeps its last value
 *
 * @pure true
 * @invariant lines before the first header and lines without "=" are ignored
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseDescriptor('[package]\nname = "demo"').get("package")?.get("name");
 * // '"demo"'
 * ```
 */
export function parseDescriptor(text: string): DescriptorSections {
	const sections = new Map<string, Map<string, string>>();
	let current: Map<string, string> | null = null;

	for (const rawLine of text.split(/\r?\n/u)) {
		const line = rawLine.trim();
		if (isSkippable(line)) continue;

		const header = SECTION_HEADER.exec(line);
		if (header !== null) {
			const name = header[1] ?? "";
			current = sections.get(name) ?? new Map<string, string>();
			sections.set(name, current);
			continue;
		}

		const eq = line.indexOf("=");
		if (current === null || eq <= 0) continue;
		current.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
	}

	return sections;
}
