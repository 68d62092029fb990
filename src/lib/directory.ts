import { readdirSync, type Dirent } from "node:fs";
import { basename, join } from "node:path";

export interface Entry {
	displayName: string;
	absolutePath: string;
}

export interface LoadDirectoryOptions {
	ignore?: readonly string[];
}

export const DEFAULT_IGNORED_NAMES: readonly string[] = [
	"node_modules",
	"vendor",
];

/**
 * Build the synthetic first entry that stands for the directory itself.
 */
export function selfEntry(path: string): Entry {
	const name = basename(path) || path;
	return { displayName: `[${name}]`, absolutePath: path };
}

/**
 * Order names by their UTF-8 bytes, so uppercase sorts before lowercase.
 */
export function compareOrdinal(a: string, b: string): number {
	return Buffer.compare(Buffer.from(a), Buffer.from(b));
}

function readEntries(path: string): Dirent[] {
	try {
		return readdirSync(path, { withFileTypes: true });
	} catch {
		// Unreadable directories list no children.
		return [];
	}
}

/**
 * Load the visible child directories of `path`, preceded by its self-entry.
 */
export function loadDirectory(
	path: string,
	{ ignore = DEFAULT_IGNORED_NAMES }: LoadDirectoryOptions = {},
): Entry[] {
	const names = readEntries(path)
		.filter((entry) => entry.isDirectory())
		.map((entry) => entry.name)
		.filter((name) => !name.startsWith(".") && !ignore.includes(name))
		.sort(compareOrdinal);

	return [
		selfEntry(path),
		...names.map((name) => ({
			displayName: name,
			absolutePath: join(path, name),
		})),
	];
}
