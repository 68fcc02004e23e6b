// CHANGE: Shared identity and tree fixtures for stage tests
// WHY: Tree-dependent stages (resolver, control writer, assembler) start from the same real tree

import * as path from "node:path";
import { Effect } from "effect";

import type { PackageIdentity, PackageTree } from "../../src/core/models.js";
import { buildPackageTree } from "../../src/shell/tree/builder.js";
import { bytesOfSize, writeFixture } from "./tempDir.js";

export const identity: PackageIdentity = {
	packageName: "astralite",
	packageVersion: "2.0-1",
	architecture: "amd64",
};

export interface TreeFixture {
	readonly tree: PackageTree;
	readonly outputDir: string;
	readonly binarySource: string;
	readonly iconSource: string;
}

/**
 * Writes a binary and an icon of the given sizes under `root` and builds a tree in `root/dist`.
 */
export function makeTree(
	root: string,
	sizes: { readonly binary: number; readonly icon: number } = {
		binary: 64,
		icon: 16,
	},
): TreeFixture {
	const binarySource = writeFixture(
		root,
		"target/release/astra_lite",
		bytesOfSize(sizes.binary),
		0o755,
	);
	const iconSource = writeFixture(root, "ui/icon.png", bytesOfSize(sizes.icon));
	const outputDir = path.join(root, "dist");
	const tree = Effect.runSync(
		buildPackageTree({ identity, binarySource, iconSource, outputDir }),
	);
	return { tree, outputDir, binarySource, iconSource };
}
