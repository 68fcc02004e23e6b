import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";
import { afterEach, describe, expect, it } from "vitest";

import type { ProjectMetadata } from "../../../src/core/models.js";
import { writeDesktopEntry } from "../../../src/shell/desktop/writer.js";
import { makeTree } from "../../utils/fixtures.js";
import { createTempDir, type TempDir } from "../../utils/tempDir.js";

const metadata: ProjectMetadata = {
	name: "Astra Lite",
	version: "2.0.1",
	description: "Telescope control",
	packageName: "astralite",
	packageVersion: "2.0-1",
};

describe("writeDesktopEntry", () => {
	let temp: TempDir | null = null;

	afterEach(() => {
		temp?.cleanup();
		temp = null;
	});

	it("writes the entry under usr/share/applications named after the binary", () => {
		temp = createTempDir();
		const { tree } = makeTree(temp.dir);

		const file = Effect.runSync(
			writeDesktopEntry(tree, metadata, {
				displayName: "Astra",
				categories: "Science;",
			}),
		);

		expect(file).toBe(
			path.join(tree.root, "usr", "share", "applications", "astra_lite.desktop"),
		);
		expect(fs.readFileSync(file, "utf8")).toBe(
			[
				"[Desktop Entry]",
				"Version=2.0-1",
				"Type=Application",
				"Name=Astra",
				"Comment=Telescope control",
				"Categories=Science;",
				"TryExec=/opt/astralite/astra_lite",
				"Exec=/opt/astralite/astra_lite",
				"Icon=/opt/astralite/icon.png",
				"",
			].join("\n"),
		);
	});
});
