import { writeFileSync, symlinkSync } from "node:fs";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
	compareOrdinal,
	loadDirectory,
	selfEntry,
} from "./directory.js";
import { makeTree, removeTree } from "../test/fixtures.js";

describe("loadDirectory", () => {
	let root: string;

	beforeEach(() => {
		root = makeTree([
			"work/alpha",
			"work/Beta",
			"work/.hidden",
			"work/node_modules",
			"work/vendor",
		]);
	});

	afterEach(() => {
		removeTree(root);
	});

	it("should list visible subdirectories after the self entry", () => {
		const work = join(root, "work");
		const entries = loadDirectory(work);

		expect(entries).toEqual([
			{ displayName: "[work]", absolutePath: work },
			{ displayName: "Beta", absolutePath: join(work, "Beta") },
			{ displayName: "alpha", absolutePath: join(work, "alpha") },
		]);
	});

	it("should skip files and symbolic links", () => {
		const work = join(root, "work");
		writeFileSync(join(work, "notes.txt"), "hello");
		symlinkSync(join(work, "alpha"), join(work, "alpha-link"));

		const names = loadDirectory(work).map((entry) => entry.displayName);

		expect(names).toEqual(["[work]", "Beta", "alpha"]);
	});

	it("should honour a custom ignore list", () => {
		const work = join(root, "work");
		const names = loadDirectory(work, { ignore: ["alpha"] }).map(
			(entry) => entry.displayName,
		);

		expect(names).toEqual(["[work]", "Beta", "node_modules", "vendor"]);
	});

	it("should degrade to the self entry when the directory is unreadable", () => {
		const missing = join(root, "missing");

		expect(loadDirectory(missing)).toEqual([
			{ displayName: "[missing]", absolutePath: missing },
		]);
	});
});

describe("selfEntry", () => {
	it("should bracket the base name", () => {
		expect(selfEntry("/home/u/work")).toEqual({
			displayName: "[work]",
			absolutePath: "/home/u/work",
		});
	});

	it("should name the filesystem root after itself", () => {
		expect(selfEntry("/").displayName).toBe("[/]");
	});
});

describe("compareOrdinal", () => {
	it("should sort uppercase before lowercase", () => {
		expect(["b", "a", "C", "B"].sort(compareOrdinal)).toEqual([
			"B",
			"C",
			"a",
			"b",
		]);
	});

	it("should compare by UTF-8 bytes", () => {
		expect(["é", "z", "e"].sort(compareOrdinal)).toEqual(["e", "z", "é"]);
	});
});
