import { loadDirectory } from "../lib/directory.js";
import { loadConfig, type Config } from "../lib/config.js";
import { archiveFolder, createFolder, deleteFolder } from "../lib/mutations.js";
import type { NavigationDeps } from "../lib/navigation.js";
import {
	resolveArchiveDirectory,
	resolveHomeDirectory,
	resolveStartPath,
} from "../lib/paths.js";

export interface PickOptions {
	start?: string;
	configPath?: string;
}

export interface DepsContext {
	cwd: string;
	home: string | undefined;
}

/**
 * Bind the filesystem operations to the loaded configuration.
 */
export function createNavigationDeps(
	config: Config,
	context: DepsContext,
): NavigationDeps {
	return {
		archiveDirectory: resolveArchiveDirectory(config.archiveDirectory, context),
		loadDirectory: (path) => loadDirectory(path, { ignore: config.ignore }),
		createFolder,
		deleteFolder,
		archiveFolder,
	};
}

export async function pickFolder({
	start,
	configPath,
}: PickOptions = {}): Promise<string | undefined> {
	const config = await loadConfig({ configPath });
	const context: DepsContext = {
		cwd: process.cwd(),
		home: resolveHomeDirectory(),
	};
	const root = resolveStartPath(start, context);
	const deps = createNavigationDeps(config, context);

	const { launchTUI } = await import("../components/tui.js");
	const selection = await launchTUI({ root, deps, home: context.home });

	// Only the selected path goes to stdout, for `cd "$(pf)"`.
	if (selection) {
		console.log(selection);
	}

	return selection;
}
