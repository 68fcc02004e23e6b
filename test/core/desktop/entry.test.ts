// CHANGE: Unit tests for desktop entry rendering
// WHY: Every key must be present even when its value is empty
// INVARIANT: |lines(render(e))| = 1 + |DESKTOP_ENTRY_KEYS|
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	DESKTOP_ENTRY_KEYS,
	desktopEntryFor,
	quoteExecArgument,
	renderDesktopEntry,
} from "../../../src/core/desktop/entry.js";
import type { ProjectMetadata } from "../../../src/core/models.js";

const metadata: ProjectMetadata = {
	name: "Astra Lite",
	version: "2.0.1",
	description: "Telescope control",
	packageName: "astralite",
	packageVersion: "2.0-1",
};

const tree = {
	binaryPath: "opt/astralite/astra_lite",
	iconPath: "opt/astralite/icon.png",
};

const settings = { displayName: null, categories: "Graphics;Astronomy" };

describe("renderDesktopEntry", () => {
	it("renders every field in order", () => {
		const text = renderDesktopEntry(desktopEntryFor(metadata, tree, settings));
		expect(text).toBe(
			[
				"[Desktop Entry]",
				"Version=2.0-1",
				"Type=Application",
				"Name=Astra Lite",
				"Comment=Telescope control",
				"Categories=Graphics;Astronomy",
				"TryExec=/opt/astralite/astra_lite",
				"Exec=/opt/astralite/astra_lite",
				"Icon=/opt/astralite/icon.png",
				"",
			].join("\n"),
		);
	});

	it("keeps an empty Comment line for an empty description", () => {
		const entry = desktopEntryFor({ ...metadata, description: "" }, tree, settings);
		const lines = renderDesktopEntry(entry).trimEnd().split("\n");
		expect(lines).toHaveLength(DESKTOP_ENTRY_KEYS.length + 1);
		expect(lines).toContain("Comment=");
	});

	it("escapes newlines inside values", () => {
		const entry = desktopEntryFor(
			{ ...metadata, description: "first\nsecond" },
			tree,
			settings,
		);
		expect(renderDesktopEntry(entry)).toContain("Comment=first\\nsecond\n");
	});
});

describe("desktopEntryFor", () => {
	it("prefers the configured display name", () => {
		const entry = desktopEntryFor(metadata, tree, {
			...settings,
			displayName: "AstraLite",
		});
		expect(entry.name).toBe("AstraLite");
	});

	it("points TryExec and Exec at the installed binary", () => {
		const entry = desktopEntryFor(metadata, tree, settings);
		expect(entry.tryExec).toBe("/opt/astralite/astra_lite");
		expect(entry.exec).toBe(entry.tryExec);
		expect(entry.icon).toBe("/opt/astralite/icon.png");
	});

	it("quotes Exec when the binary name contains a space", () => {
		const spaced = { ...tree, binaryPath: "opt/astralite/astra lite" };
		const lines = renderDesktopEntry(
			desktopEntryFor(metadata, spaced, settings),
		).split("\n");
		expect(lines).toContain('Exec="/opt/astralite/astra lite"');
		expect(lines).toContain("TryExec=/opt/astralite/astra lite");
	});

	it("escapes the quoted Exec value again at the string level", () => {
		const dollar = { ...tree, binaryPath: "opt/astralite/astra$ lite" };
		const lines = renderDesktopEntry(
			desktopEntryFor(metadata, dollar, settings),
		).split("\n");
		expect(lines).toContain('Exec="/opt/astralite/astra\\\\$ lite"');
	});
});

describe("quoteExecArgument", () => {
	it("leaves plain paths alone", () => {
		expect(quoteExecArgument("/opt/astralite/astra_lite")).toBe(
			"/opt/astralite/astra_lite",
		);
	});

	it("wraps reserved characters in double quotes", () => {
		expect(quoteExecArgument('/opt/a "b"')).toBe('"/opt/a \\"b\\""');
		expect(quoteExecArgument("/opt/a`b")).toBe('"/opt/a\\`b"');
	});

	it("doubles percent signs", () => {
		expect(quoteExecArgument("/opt/100%")).toBe("/opt/100%%");
	});
});
