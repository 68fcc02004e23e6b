// CHANGE: Unit tests for the descriptor section parser
// WHY: Metadata extraction relies on [package] keys surviving real Cargo.toml syntax
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { parseDescriptor } from "../../../src/core/metadata/descriptor.js";

const CARGO_TOML = [
	"# workspace manifest",
	"top = ignored",
	"[package]",
	'name = "astra_lite"',
	'version = "0.0.12"',
	'description = "Software for deepsky astrophotography"',
	"",
	"[dependencies]",
	'gtk = "0.16"',
	'anyhow = { version = "1.0", features = ["backtrace"] }',
	"",
	"[[bin]]",
	'name = "tool"',
].join("\n");

describe("parseDescriptor", () => {
	it("keeps raw values, quotes included", () => {
		const pkg = parseDescriptor(CARGO_TOML).get("package");
		expect(pkg?.get("name")).toBe('"astra_lite"');
		expect(pkg?.get("version")).toBe('"0.0.12"');
		expect(pkg?.get("description")).toBe(
			'"Software for deepsky astrophotography"',
		);
	});

	it("splits on the first '=' only", () => {
		const deps = parseDescriptor(CARGO_TOML).get("dependencies");
		expect(deps?.get("anyhow")).toBe(
			'{ version = "1.0", features = ["backtrace"] }',
		);
	});

	it("reads array-of-tables headers as plain sections", () => {
		expect(parseDescriptor(CARGO_TOML).get("bin")?.get("name")).toBe('"tool"');
	});

	it("ignores keys before the first header", () => {
		const sections = parseDescriptor(CARGO_TOML);
		expect([...sections.keys()]).toEqual(["package", "dependencies", "bin"]);
	});

	it("skips comments, accepts CRLF and keeps the last repeated key", () => {
		const text = "[package]\r\n; note\r\nname = a\r\n# other\r\nname = b\r\n";
		const pkg = parseDescriptor(text).get("package");
		expect(pkg?.size).toBe(1);
		expect(pkg?.get("name")).toBe("b");
	});

	it("merges repeated sections", () => {
		const text = "[package]\nname = a\n[other]\nx = 1\n[package]\nversion = 1.0.0";
		const pkg = parseDescriptor(text).get("package");
		expect(pkg?.get("name")).toBe("a");
		expect(pkg?.get("version")).toBe("1.0.0");
	});

	it("returns no sections for empty input", () => {
		expect(parseDescriptor("").size).toBe(0);
	});
});
