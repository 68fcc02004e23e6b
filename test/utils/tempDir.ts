// CHANGE: Test helper to create isolated temporary directories for filesystem stages
// WHY: Tree builder, resolver, writer and assembler must be checked against real files, not mocks
// INVARIANT: cleanup() removes the directory recursively and is idempotent

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary directory.
 *
 * Postconditions:
 * - dir points to an existing, empty directory
 * - cleanup() removes it recursively
 */
export interface TempDir {
	readonly dir: string;
	readonly cleanup: () => void;
}

export function createTempDir(prefix = "deb-packager-"): TempDir {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
	return {
		dir,
		cleanup: (): void => {
			fs.rmSync(dir, { recursive: true, force: true });
		},
	};
}

/**
 * Writes a file below `root`, creating parent directories.
 *
 * @returns Absolute path of the file
 */
export function writeFixture(
	root: string,
	relativePath: string,
	content: string | Buffer,
	mode = 0o644,
): string {
	const file = path.join(root, relativePath);
	fs.mkdirSync(path.dirname(file), { recursive: true });
	fs.writeFileSync(file, content);
	fs.chmodSync(file, mode);
	return file;
}

/**
 * Buffer of `size` bytes with a repeating, recognisable pattern.
 */
export const bytesOfSize = (size: number): Buffer =>
	Buffer.from(Array.from({ length: size }, (_, i) => i % 251));
