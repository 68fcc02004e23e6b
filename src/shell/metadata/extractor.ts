// CHANGE: Metadata extractor (reads the descriptor, delegates parsing to CORE)
// WHY: Keep the only side effect (the read) in SHELL; normalization stays pure
// PURITY: SHELL
// EFFECT: Effect<ProjectMetadata, MetadataError | IOError>
// COMPLEXITY: O(n) where n = descriptor size

import { Effect } from "effect";

import type { IOError, MetadataError } from "../../core/errors.js";
import { parseProjectMetadata } from "../../core/metadata/normalize.js";
import type { ProjectMetadata } from "../../core/models.js";
import { readTextFile } from "../tree/fs.js";

/**
 * Читает дескриптор проекта и извлекает метаданные пакета.
 *
 * @param descriptorPath Путь к файлу дескриптора (Cargo.toml)
 * @returns Effect с метаданными или типизированной ошибкой
 */
export function extractMetadata(
	descriptorPath: string,
): Effect.Effect<ProjectMetadata, MetadataError | IOError> {
	return readTextFile(descriptorPath).pipe(
		Effect.flatMap((text) => parseProjectMetadata(text, descriptorPath)),
		Effect.tap((metadata) =>
			Effect.sync(() => {
				console.log(
					`📋 Package ${metadata.packageName} ${metadata.packageVersion} (from ${metadata.name} ${metadata.version})`,
				);
			}),
		),
	);
}
