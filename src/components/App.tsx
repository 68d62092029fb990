import React, { useEffect } from "react";
import { Box, useApp, useInput, useStdout } from "ink";
import { toKeyLabel } from "../lib/keys.js";
import { archiveDestination } from "../lib/mutations.js";
import {
	filteredEntries,
	type NavigationDeps,
	type NavigationState,
	type Outcome,
} from "../lib/navigation.js";
import { contractHome } from "../lib/paths.js";
import { useNavigation } from "./hooks/useNavigation.js";
import { HeaderBar } from "./HeaderBar.js";
import { FilterLine } from "./FilterLine.js";
import { EntryListPanel } from "./EntryListPanel.js";
import { StatusLine } from "./StatusLine.js";
import { HelpModal } from "./modals/HelpModal.js";
import { ConfirmModal } from "./modals/ConfirmModal.js";
import { CreateFolderModal } from "./modals/CreateFolderModal.js";

interface AppProps {
	initialState: NavigationState;
	deps: NavigationDeps;
	home?: string;
	onExit?: (outcome: Outcome) => void;
}

export function App({ initialState, deps, home, onExit }: AppProps) {
	const { exit } = useApp();
	const { stdout } = useStdout();
	const { state, dispatch } = useNavigation(initialState, deps);
	const display = (path: string) => contractHome(path, home);

	// Track terminal height for the scroll window.
	useEffect(() => {
		const handleResize = () => {
			dispatch({ type: "resize", height: stdout.rows });
		};

		stdout.on("resize", handleResize);
		return () => {
			stdout.off("resize", handleResize);
		};
	}, [stdout, dispatch]);

	useEffect(() => {
		if (state.outcome) {
			onExit?.(state.outcome);
			exit();
		}
	}, [state.outcome, onExit, exit]);

	useInput(
		(input, key) => {
			const label = toKeyLabel(input, key);
			if (label) {
				dispatch({ type: "key", key: label });
			}
		},
		{ isActive: !state.outcome },
	);

	const { modal } = state;

	const renderModal = () => {
		switch (modal.kind) {
			case "help":
				return (
					<HelpModal archiveDirectory={display(deps.archiveDirectory)} />
				);
			case "createFolder":
				return (
					<CreateFolderModal
						parentPath={display(state.root)}
						draftName={modal.draftName}
					/>
				);
			case "confirmDelete":
				return (
					<ConfirmModal
						title="Delete folder?"
						color="red"
						details={[{ value: display(modal.target) }]}
						message="This will permanently delete the folder and all its contents!"
						confirmLabel="Delete"
					/>
				);
			case "confirmArchive":
				return (
					<ConfirmModal
						title="Move to Archive?"
						color="yellow"
						details={[
							{ label: "From:", value: display(modal.target) },
							{
								label: "To:",
								value: display(
									archiveDestination(modal.target, deps.archiveDirectory),
								),
							},
						]}
						message="The folder will be moved to your archive."
						confirmLabel="Archive"
					/>
				);
			default:
				return null;
		}
	};

	if (modal.kind !== "browsing") {
		return (
			<Box flexDirection="column">
				{renderModal()}
				<StatusLine mode={modal.kind} />
			</Box>
		);
	}

	const entries = filteredEntries(state);

	return (
		<Box flexDirection="column">
			<HeaderBar
				path={display(state.root)}
				folderCount={state.listing.length - 1}
			/>
			<FilterLine filter={state.filter} error={state.error} />
			<EntryListPanel
				entries={entries}
				cursor={state.cursor}
				offset={state.offset}
				height={state.height}
			/>
			<StatusLine mode={modal.kind} />
		</Box>
	);
}
