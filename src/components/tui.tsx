import React from "react";
import { render } from "ink";
import { App } from "./App.js";
import {
	createNavigationState,
	type NavigationDeps,
} from "../lib/navigation.js";

export interface LaunchOptions {
	root: string;
	deps: NavigationDeps;
	home?: string;
}

/**
 * Run the picker on stderr and resolve with the selected path, if any.
 */
export async function launchTUI({
	root,
	deps,
	home,
}: LaunchOptions): Promise<string | undefined> {
	let selection: string | undefined;

	const output = process.stderr;
	const initialState = createNavigationState(
		root,
		deps,
		output.isTTY ? output.rows : 0,
	);

	const { waitUntilExit } = render(
		<App
			initialState={initialState}
			deps={deps}
			home={home}
			onExit={(outcome) => {
				selection = outcome.kind === "selected" ? outcome.path : undefined;
			}}
		/>,
		{ stdout: output, exitOnCtrlC: false },
	);
	await waitUntilExit();

	return selection;
}
