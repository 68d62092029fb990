import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";

/**
 * Resolve the user's home directory, or undefined when it cannot be found.
 */
export function resolveHomeDirectory(): string | undefined {
	try {
		return homedir() || undefined;
	} catch {
		return undefined;
	}
}

/**
 * Expand a leading `~` or `~/` to the home directory. Without a home
 * directory the path is returned unchanged.
 */
export function expandHome(path: string, home: string | undefined): string {
	if (!home) {
		return path;
	}
	if (path === "~") {
		return home;
	}
	if (path.startsWith("~/")) {
		return home + path.slice(1);
	}
	return path;
}

/**
 * Contract the home directory prefix back to `~` for display.
 */
export function contractHome(path: string, home: string | undefined): string {
	if (!home) {
		return path;
	}
	if (path === home) {
		return "~";
	}
	if (path.startsWith(`${home}/`)) {
		return `~${path.slice(home.length)}`;
	}
	return path;
}

export interface StartPathContext {
	cwd: string;
	home: string | undefined;
}

/**
 * Turn the optional start argument into an absolute directory path.
 */
export function resolveStartPath(
	start: string | undefined,
	{ cwd, home }: StartPathContext,
): string {
	if (!start) {
		return cwd;
	}
	return resolve(cwd, expandHome(start, home));
}

/**
 * Resolve the configured archive directory. Relative paths live under the
 * home directory, falling back to `cwd` when there is none.
 */
export function resolveArchiveDirectory(
	directory: string,
	{ cwd, home }: StartPathContext,
): string {
	const expanded = expandHome(directory, home);
	if (isAbsolute(expanded)) {
		return expanded;
	}
	return join(home ?? cwd, expanded);
}
