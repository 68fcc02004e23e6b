// CHANGE: End-to-end tests of the packaging pipeline with an in-process runner
// WHY: Stage order, artifact naming and cleanup are properties of the whole run
// INVARIANT: success ⇒ exists(<out>/astralite_2.0-1_amd64.deb) ∧ ¬exists(tree)
// INVARIANT: failure before assembly ⇒ tree kept ∧ dpkg-deb never called

import * as fs from "node:fs";
import * as path from "node:path";
import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
	buildPackage,
	type PipelineInput,
	runPipeline,
} from "../../src/app/buildPackage.js";
import type { PackagerConfig } from "../../src/core/models.js";
import { DEFAULT_PACKAGER_CONFIG } from "../../src/shell/config/loader.js";
import { projectLayout } from "../../src/shell/config/paths.js";
import {
	exitWith,
	type FakeHandler,
	fakeDpkgDeb,
	makeFakeRunner,
	succeedWith,
} from "../utils/fakeRunner.js";
import {
	bytesOfSize,
	createTempDir,
	type TempDir,
	writeFixture,
} from "../utils/tempDir.js";

const DESCRIPTOR = `[package]
name = "Astra Lite"
version = "2.0.1"
description = "Telescope control"
edition = "2021"

[dependencies]
version = "9.9.9"
`;

const config: PackagerConfig = {
	...DEFAULT_PACKAGER_CONFIG,
	maintainer: "Test Maintainer <test@example.org>",
	binary: "build/astra",
	icon: "assets/icon.png",
};

const SHLIBS = "shlibs:Depends=libc6 (>= 2.34)\n";

const healthyHandlers: Readonly<Record<string, FakeHandler>> = {
	dpkg: () => succeedWith("amd64\n"),
	"dpkg-shlibdeps": () => succeedWith(SHLIBS),
	"dpkg-deb": fakeDpkgDeb,
};

function writeProject(root: string): PipelineInput {
	writeFixture(root, "Cargo.toml", DESCRIPTOR);
	writeFixture(root, "build/astra", bytesOfSize(2048), 0o755);
	writeFixture(root, "assets/icon.png", bytesOfSize(512));
	return { layout: projectLayout(root, config), config };
}

describe("buildPackage", () => {
	let temp: TempDir | null = null;

	afterEach(() => {
		temp?.cleanup();
		temp = null;
	});

	it("produces the artifact and removes the tree", async () => {
		temp = createTempDir();
		const input = writeProject(temp.dir);
		const fake = makeFakeRunner(healthyHandlers);

		const result = await Effect.runPromise(
			buildPackage(input).pipe(Effect.provide(fake.layer)),
		);

		const outputDir = path.join(temp.dir, "dist");
		const treeRoot = path.join(outputDir, "astralite_2.0-1_amd64");
		expect(result).toEqual({
			artifactPath: path.join(outputDir, "astralite_2.0-1_amd64.deb"),
			identity: {
				packageName: "astralite",
				packageVersion: "2.0-1",
				architecture: "amd64",
			},
			dependencies: "libc6 (>= 2.34)",
			installedSizeKiB: 2,
		});
		expect(fs.existsSync(result.artifactPath)).toBe(true);
		expect(fs.existsSync(treeRoot)).toBe(false);
		expect(fake.calls.map((call) => call.command)).toEqual([
			"dpkg",
			"dpkg-shlibdeps",
			"dpkg-deb",
		]);
		expect(fake.calls[1]?.args).toEqual(["-O", "opt/astralite/astra"]);
	});

	it("keeps the tree when dependency resolution fails and recovers on the next run", async () => {
		temp = createTempDir();
		const input = writeProject(temp.dir);
		const treeRoot = path.join(temp.dir, "dist", "astralite_2.0-1_amd64");
		vi.spyOn(console, "error").mockImplementation(() => undefined);

		const failing = makeFakeRunner({
			...healthyHandlers,
			"dpkg-shlibdeps": () => exitWith(1, "cannot find library\n"),
		});
		const error = await Effect.runPromise(
			Effect.flip(buildPackage(input).pipe(Effect.provide(failing.layer))),
		);

		expect(error._tag).toBe("DependencyResolutionError");
		expect(failing.calls.map((call) => call.command)).not.toContain("dpkg-deb");
		expect(fs.existsSync(path.join(treeRoot, "opt", "astralite", "astra"))).toBe(
			true,
		);
		expect(fs.existsSync(path.join(treeRoot, "debian"))).toBe(false);
		expect(
			fs.readFileSync(
				path.join(treeRoot, "usr", "share", "applications", "astra.desktop"),
				"utf8",
			),
		).toContain("Name=Astra Lite\n");

		const healthy = makeFakeRunner(healthyHandlers);
		const result = await Effect.runPromise(
			buildPackage(input).pipe(Effect.provide(healthy.layer)),
		);
		expect(path.basename(result.artifactPath)).toBe("astralite_2.0-1_amd64.deb");
		expect(fs.existsSync(treeRoot)).toBe(false);
	});

	it("stops before any tool runs when the descriptor is invalid", async () => {
		temp = createTempDir();
		const input = writeProject(temp.dir);
		writeFixture(temp.dir, "Cargo.toml", '[package]\nname = "astra"\n');
		const fake = makeFakeRunner(healthyHandlers);

		const error = await Effect.runPromise(
			Effect.flip(buildPackage(input).pipe(Effect.provide(fake.layer))),
		);

		expect(error._tag).toBe("MetadataError");
		expect(fake.calls).toEqual([]);
		expect(fs.existsSync(path.join(temp.dir, "dist"))).toBe(false);
	});

	it("fails with IOError when the binary has not been built", async () => {
		temp = createTempDir();
		const input = writeProject(temp.dir);
		fs.rmSync(path.join(temp.dir, "build"), { recursive: true });
		const fake = makeFakeRunner(healthyHandlers);

		const error = await Effect.runPromise(
			Effect.flip(buildPackage(input).pipe(Effect.provide(fake.layer))),
		);

		expect(error._tag).toBe("IOError");
		expect(fake.calls.map((call) => call.command)).toEqual(["dpkg"]);
	});
});

describe("runPipeline", () => {
	let temp: TempDir | null = null;

	afterEach(() => {
		temp?.cleanup();
		temp = null;
	});

	it("returns 0 and reports the artifact", async () => {
		temp = createTempDir();
		const input = writeProject(temp.dir);
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const fake = makeFakeRunner(healthyHandlers);

		const code = await Effect.runPromise(
			runPipeline(input).pipe(Effect.provide(fake.layer)),
		);

		expect(code).toBe(0);
		expect(log).toHaveBeenCalledWith(
			`✅ Package created: ${path.join(temp.dir, "dist", "astralite_2.0-1_amd64.deb")}`,
		);
	});

	it("returns 1 and reports the failure", async () => {
		temp = createTempDir();
		const input = writeProject(temp.dir);
		const errorLog = vi
			.spyOn(console, "error")
			.mockImplementation(() => undefined);
		const fake = makeFakeRunner({
			...healthyHandlers,
			dpkg: () => exitWith(2, "dpkg: error: unknown option\n"),
		});

		const code = await Effect.runPromise(
			runPipeline(input).pipe(Effect.provide(fake.layer)),
		);

		expect(code).toBe(1);
		expect(errorLog).toHaveBeenCalledWith(
			"❌ Architecture probe failed: dpkg exited with 2: dpkg: error: unknown option",
		);
	});
});
