import { existsSync, mkdirSync, renameSync, rmSync } from "node:fs";
import { basename, join, sep } from "node:path";

export type MutationOperation = "create" | "delete" | "archive";

export class FilesystemError extends Error {
	constructor(
		message: string,
		public operation: MutationOperation,
		public path: string,
		public code?: string,
	) {
		super(message);
		this.name = "FilesystemError";
	}

	/**
	 * Wrap an error thrown by a filesystem call, keeping its system code.
	 */
	static fromError(
		operation: MutationOperation,
		path: string,
		error: unknown,
		prefix = "Error",
	): FilesystemError {
		const reason = error instanceof Error ? error.message : String(error);
		const code =
			error instanceof Error && "code" in error && typeof error.code === "string"
				? error.code
				: undefined;
		return new FilesystemError(`${prefix}: ${reason}`, operation, path, code);
	}
}

export type MutationResult =
	| { ok: true }
	| { ok: false; error: FilesystemError };

const OK: MutationResult = { ok: true };

function failure(error: FilesystemError): MutationResult {
	return { ok: false, error };
}

/**
 * Check that `name` names a single entry inside its parent.
 */
export function isValidFolderName(name: string): boolean {
	if (name === "" || name === "." || name === "..") {
		return false;
	}
	return !name.includes("/") && !name.includes(sep) && !name.includes("\0");
}

/**
 * Create the folder `name` directly inside `parent`.
 */
export function createFolder(parent: string, name: string): MutationResult {
	const path = join(parent, name);
	if (!isValidFolderName(name)) {
		return failure(
			new FilesystemError(
				`Error: invalid folder name "${name}"`,
				"create",
				path,
				"EINVAL",
			),
		);
	}

	try {
		mkdirSync(path, { mode: 0o755 });
		return OK;
	} catch (error) {
		return failure(FilesystemError.fromError("create", path, error));
	}
}

/**
 * Remove `path` and everything below it. There is no undo.
 */
export function deleteFolder(path: string): MutationResult {
	try {
		rmSync(path, { recursive: true, force: true });
		return OK;
	} catch (error) {
		return failure(FilesystemError.fromError("delete", path, error));
	}
}

export function archiveDestination(
	path: string,
	archiveDirectory: string,
): string {
	return join(archiveDirectory, basename(path));
}

/**
 * Move `path` into `archiveDirectory`, creating the archive when missing.
 * An existing entry with the same name is never replaced.
 */
export function archiveFolder(
	path: string,
	archiveDirectory: string,
): MutationResult {
	try {
		mkdirSync(archiveDirectory, { recursive: true, mode: 0o755 });
	} catch (error) {
		return failure(
			FilesystemError.fromError(
				"archive",
				archiveDirectory,
				error,
				"Error creating archive dir",
			),
		);
	}

	const destination = archiveDestination(path, archiveDirectory);
	if (existsSync(destination)) {
		return failure(
			new FilesystemError(
				`Error: ${destination} already exists`,
				"archive",
				path,
				"EEXIST",
			),
		);
	}

	try {
		renameSync(path, destination);
		return OK;
	} catch (error) {
		return failure(FilesystemError.fromError("archive", path, error));
	}
}
