// CHANGE: Effect wrappers over the filesystem calls used by the packaging stages
// WHY: Every fs failure must surface as a typed IOError naming the operation and the path
// PURITY: SHELL (filesystem I/O)
// EFFECT: Effect<A, IOError>
// INVARIANT: ∀ op: failure(op) → IOError{operation, path}
// COMPLEXITY: O(1) per call, O(n) for directory walks where n = |entries|

import { Effect } from "effect";

import { IOError } from "../../core/errors.js";
import { fs, path } from "../../utils/node-mods.js";

/**
 * Runs a synchronous fs call, mapping any exception to IOError.
 *
 * @effect Effect<A, IOError>
 */
export function ioTry<A>(
	operation: string,
	target: string,
	thunk: () => A,
): Effect.Effect<A, IOError> {
	return Effect.try({
		try: thunk,
		catch: (error) =>
			new IOError({
				operation,
				path: target,
				detail: error instanceof Error ? error.message : String(error),
			}),
	});
}

export const ensureDir = (dir: string): Effect.Effect<void, IOError> =>
	ioTry("create directory", dir, () => {
		fs.mkdirSync(dir, { recursive: true });
	});

export const writeTextFile = (
	file: string,
	content: string,
): Effect.Effect<void, IOError> =>
	ioTry("write", file, () => {
		fs.writeFileSync(file, content, { encoding: "utf8" });
	});

export const readTextFile = (file: string): Effect.Effect<string, IOError> =>
	ioTry("read", file, () => fs.readFileSync(file, "utf8"));

export const pathExists = (target: string): boolean => fs.existsSync(target);

/**
 * Copies a file into a directory under its own base name and gives the copy
 * the source's permission bits (the binary must stay executable).
 *
 * @returns Absolute path of the copy
 */
export function copyIntoDir(
	source: string,
	dir: string,
): Effect.Effect<string, IOError> {
	const target = path.join(dir, path.basename(source));
	return ioTry("copy", source, () => {
		const mode = fs.statSync(source).mode & 0o7777;
		fs.copyFileSync(source, target);
		fs.chmodSync(target, mode);
		return target;
	});
}

/**
 * Removes a directory tree.
 *
 * @effect Effect<void, IOError>
 */
export const removeTree = (dir: string): Effect.Effect<void, IOError> =>
	ioTry("remove", dir, () => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

/**
 * Removes a directory tree, logging instead of failing.
 *
 * @effect Effect<void, never>
 */
export const removeTreeBestEffort = (dir: string): Effect.Effect<void> =>
	removeTree(dir).pipe(
		Effect.catchAll((error) =>
			Effect.sync(() => {
				console.warn(`⚠️  Could not remove ${dir}: ${error.detail}`);
			}),
		),
	);

function sumFileSizes(dir: string): number {
	let total = 0;
	for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
		const full = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			total += sumFileSizes(full);
		} else if (entry.isFile()) {
			total += fs.statSync(full).size;
		}
	}
	return total;
}

/**
 * Total byte size of all regular files below `dir`, recursively.
 *
 * @effect Effect<number, IOError>
 * @complexity O(n) where n = |files|
 */
export const totalFileBytes = (dir: string): Effect.Effect<number, IOError> =>
	ioTry("measure", dir, () => sumFileSizes(dir));
