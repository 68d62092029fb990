import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";
import { DEFAULT_IGNORED_NAMES } from "./directory.js";

export const configSchema = z.object({
	archiveDirectory: z.string().min(1).default("Dev-Archive"),
	ignore: z.array(z.string()).default([...DEFAULT_IGNORED_NAMES]),
});

export type Config = z.infer<typeof configSchema>;

export interface LoadConfigOptions {
	configPath?: string;
	searchFrom?: string;
}

export function parseConfig(raw: unknown): Config {
	return configSchema.parse(raw ?? {});
}

/**
 * Load `pf` configuration from an explicit file, or search for one from the
 * working directory up to the home directory and `~/.config/pf`.
 */
export async function loadConfig({
	configPath,
	searchFrom,
}: LoadConfigOptions = {}): Promise<Config> {
	const explorer = cosmiconfig("pf", { searchStrategy: "global" });
	const result = configPath
		? await explorer.load(configPath)
		: await explorer.search(searchFrom);

	return parseConfig(result?.config);
}
