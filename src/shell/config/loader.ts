// CHANGE: Packager configuration loading (packager.config.json beside the tool)
// WHY: Maintainer identity and input locations are fixed settings, not descriptor data
// PURITY: SHELL (reads a file)
// INVARIANT: ∀ file: loadPackagerConfig(file) is a complete PackagerConfig (defaults fill the gaps)
// COMPLEXITY: O(n) where n = config size

import type { PackagerConfig } from "../../core/models.js";
import { fs } from "../../utils/node-mods.js";

export const CONFIG_FILE_NAME = "packager.config.json";

export const DEFAULT_PACKAGER_CONFIG: PackagerConfig = {
	maintainer: "Package Maintainer <maintainer@example.org>",
	displayName: null,
	categories: "Graphics;Astronomy",
	descriptor: "Cargo.toml",
	binary: "target/release/{name}",
	icon: "ui/{name}48x48.png",
	outputDir: "dist",
};

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

/**
 * Type guard to check if value is a JSON object.
 *
 * @param value Value to check
 * @returns True if value is a non-null, non-array object
 */
function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Reads a non-empty string field, falling back when absent or mistyped.
 */
function stringField(obj: JSONObject, key: string, fallback: string): string {
	const value = obj[key];
	return typeof value === "string" && value.trim().length > 0
		? value
		: fallback;
}

/**
 * Merges a parsed config object over the defaults.
 *
 * @pure true
 * @invariant fields with the wrong type are ignored one by one
 */
export function normalizePackagerConfig(value: JSONValue): PackagerConfig {
	if (!isJSONObject(value)) return DEFAULT_PACKAGER_CONFIG;
	const d = DEFAULT_PACKAGER_CONFIG;
	const displayName = value["displayName"];
	return {
		maintainer: stringField(value, "maintainer", d.maintainer),
		displayName:
			typeof displayName === "string" && displayName.trim().length > 0
				? displayName
				: d.displayName,
		categories: stringField(value, "categories", d.categories),
		descriptor: stringField(value, "descriptor", d.descriptor),
		binary: stringField(value, "binary", d.binary),
		icon: stringField(value, "icon", d.icon),
		outputDir: stringField(value, "outputDir", d.outputDir),
	};
}

/**
 * Загружает конфигурацию упаковщика.
 *
 * @param configPath Путь к packager.config.json
 * @returns Конфигурация; при отсутствии файла - значения по умолчанию
 *
 * @invariant unreadable or malformed file → defaults plus a warning
 */
export function loadPackagerConfig(configPath: string): PackagerConfig {
	if (!fs.existsSync(configPath)) return DEFAULT_PACKAGER_CONFIG;
	try {
		const raw = fs.readFileSync(configPath, "utf8");
		const parsed = JSON.parse(raw) as JSONValue;
		return normalizePackagerConfig(parsed);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		console.warn(`⚠️  Ignoring ${configPath}: ${reason}`);
		return DEFAULT_PACKAGER_CONFIG;
	}
}
