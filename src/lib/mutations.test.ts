import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
	FilesystemError,
	archiveDestination,
	archiveFolder,
	createFolder,
	deleteFolder,
	isValidFolderName,
} from "./mutations.js";
import { makeTree, removeTree } from "../test/fixtures.js";

describe("Filesystem mutations", () => {
	let root: string;

	beforeEach(() => {
		root = makeTree(["work/alpha/nested", "work/beta"]);
	});

	afterEach(() => {
		removeTree(root);
	});

	describe("createFolder", () => {
		it("should create a single folder", () => {
			const result = createFolder(join(root, "work"), "newdir");

			expect(result).toEqual({ ok: true });
			expect(existsSync(join(root, "work", "newdir"))).toBe(true);
		});

		it("should fail when the folder already exists", () => {
			const result = createFolder(join(root, "work"), "alpha");

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(FilesystemError);
				expect(result.error.code).toBe("EEXIST");
				expect(result.error.operation).toBe("create");
				expect(result.error.path).toBe(join(root, "work", "alpha"));
				expect(result.error.message).toMatch(/^Error: EEXIST/);
			}
		});

		it("should fail when the parent is missing", () => {
			const result = createFolder(join(root, "missing"), "newdir");

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("ENOENT");
			}
		});

		it("should reject names that are not a single entry", () => {
			const result = createFolder(join(root, "work"), "a/b");

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("EINVAL");
				expect(result.error.message).toBe('Error: invalid folder name "a/b"');
			}
			expect(existsSync(join(root, "work", "a"))).toBe(false);
		});
	});

	describe("deleteFolder", () => {
		it("should remove a folder and its contents", () => {
			const alpha = join(root, "work", "alpha");
			writeFileSync(join(alpha, "nested", "file.txt"), "data");

			expect(deleteFolder(alpha)).toEqual({ ok: true });
			expect(existsSync(alpha)).toBe(false);
			expect(existsSync(join(root, "work", "beta"))).toBe(true);
		});

		it("should succeed when the folder is already gone", () => {
			expect(deleteFolder(join(root, "work", "gone"))).toEqual({ ok: true });
		});
	});

	describe("archiveFolder", () => {
		it("should create the archive and move the folder into it", () => {
			const alpha = join(root, "work", "alpha");
			const archive = join(root, "archive");

			expect(archiveFolder(alpha, archive)).toEqual({ ok: true });
			expect(existsSync(alpha)).toBe(false);
			expect(existsSync(join(archive, "alpha", "nested"))).toBe(true);
		});

		it("should refuse to replace an archived folder of the same name", () => {
			const alpha = join(root, "work", "alpha");
			const archive = join(root, "archive");
			mkdirSync(join(archive, "alpha"), { recursive: true });

			const result = archiveFolder(alpha, archive);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("EEXIST");
				expect(result.error.message).toBe(
					`Error: ${join(archive, "alpha")} already exists`,
				);
			}
			expect(existsSync(alpha)).toBe(true);
		});

		it("should report when the archive directory cannot be created", () => {
			const blocker = join(root, "blocker");
			writeFileSync(blocker, "not a directory");

			const result = archiveFolder(join(root, "work", "beta"), blocker);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toMatch(/^Error creating archive dir: /);
				expect(result.error.path).toBe(blocker);
			}
		});
	});

	it("should compute the archive destination from the base name", () => {
		expect(archiveDestination("/home/u/work/alpha", "/home/u/Dev-Archive")).toBe(
			"/home/u/Dev-Archive/alpha",
		);
	});
});

describe("isValidFolderName", () => {
	it("should accept ordinary names", () => {
		expect(isValidFolderName("new dir")).toBe(true);
		expect(isValidFolderName(".config")).toBe(true);
	});

	it("should reject empty, relative and nested names", () => {
		expect(isValidFolderName("")).toBe(false);
		expect(isValidFolderName(".")).toBe(false);
		expect(isValidFolderName("..")).toBe(false);
		expect(isValidFolderName("a/b")).toBe(false);
		expect(isValidFolderName("a\0b")).toBe(false);
	});
});
