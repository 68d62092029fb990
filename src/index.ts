#!/usr/bin/env node

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import figures from "figures";

async function main() {
	const cli = yargs(hideBin(process.argv))
		.scriptName("pf")
		.example("$0", "Browse from the current directory")
		.example("$0 ~/projects", "Browse from ~/projects")
		.example('cd "$($0)"', "Change to the selected folder")
		.command(
			"$0 [path]",
			"Browse folders and print the selected path",
			(yargs) => {
				return yargs
					.positional("path", {
						describe: "Folder to start in (defaults to the current directory)",
						type: "string",
					})
					.option("config", {
						describe: "Path to a configuration file",
						type: "string",
					});
			},
			async (argv) => {
				await handlePick(argv.path, { configPath: argv.config });
			},
		)
		.epilogue("Press Ctrl+G inside pf for keyboard shortcuts.")
		.help()
		.version()
		.strict();

	await cli.parseAsync();
}

async function handlePick(start?: string, options: { configPath?: string } = {}) {
	const { pickFolder } = await import("./commands/pick.js");

	try {
		await pickFolder({ start, configPath: options.configPath });
	} catch (error) {
		console.error(
			chalk.red(figures.cross),
			"Error:",
			error instanceof Error ? error.message : error,
		);
		process.exit(1);
	}
}

main().catch((error) => {
	console.error(
		chalk.red(figures.cross),
		"Error:",
		error instanceof Error ? error.message : error,
	);
	process.exit(1);
});
