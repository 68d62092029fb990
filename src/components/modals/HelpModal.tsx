import React from "react";
import { Box, Text } from "ink";
import figures from "figures";

interface HelpModalProps {
	archiveDirectory: string;
}

function Shortcut({ keys, label }: { keys: string; label: string }) {
	return (
		<Text>
			{" "}
			<Text color="cyan">{keys.padEnd(11)}</Text> {label}
		</Text>
	);
}

export function HelpModal({ archiveDirectory }: HelpModalProps) {
	return (
		<Box
			borderStyle="double"
			borderColor="cyan"
			paddingX={2}
			paddingY={1}
			marginX={4}
			marginTop={1}
		>
			<Box flexDirection="column">
				<Text color="cyan" bold>
					pf - Keyboard Shortcuts
				</Text>

				<Box marginTop={1} flexDirection="column">
					<Text color="yellow" bold>
						Navigation:
					</Text>
					<Shortcut
						keys={`${figures.arrowUp} / ${figures.arrowDown}`}
						label="Navigate list"
					/>
					<Shortcut keys="Enter" label="Open folder" />
					<Shortcut keys="Esc" label="Go to parent folder" />
					<Shortcut keys="Tab" label="Select folder and exit" />
				</Box>

				<Box marginTop={1} flexDirection="column">
					<Text color="yellow" bold>
						Actions:
					</Text>
					<Shortcut keys="Ctrl+N" label="Create new folder" />
					<Shortcut keys="Ctrl+A" label={`Archive folder (${archiveDirectory})`} />
					<Shortcut keys="Alt+Bksp" label="Delete selected folder" />
				</Box>

				<Box marginTop={1} flexDirection="column">
					<Text color="yellow" bold>
						Filter & Help:
					</Text>
					<Shortcut keys="Backspace" label="Remove filter character" />
					<Shortcut keys="Ctrl+G" label="Toggle this help" />
					<Text color="gray"> Type any text to filter folders</Text>
					<Text color="gray"> Multiple words = match all</Text>
				</Box>

				<Box marginTop={1} flexDirection="column">
					<Text color="yellow" bold>
						Exit:
					</Text>
					<Shortcut keys="Ctrl+C" label="Quit without selecting" />
				</Box>

				<Box marginTop={2}>
					<Text color="gray">
						Press <Text color="cyan">Ctrl+G</Text> or{" "}
						<Text color="cyan">Esc</Text> to close this help
					</Text>
				</Box>
			</Box>
		</Box>
	);
}
