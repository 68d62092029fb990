import React from "react";
import { Box, Text } from "ink";
import type { ModalKind } from "../lib/navigation.js";

interface StatusLineProps {
	mode: ModalKind;
}

export function StatusLine({ mode }: StatusLineProps) {
	const getKeybindings = () => {
		switch (mode) {
			case "help":
				return "^G or Esc close help";
			case "createFolder":
				return "Enter create • Esc cancel";
			case "confirmDelete":
				return "y delete • n/Esc cancel";
			case "confirmArchive":
				return "y archive • n/Esc cancel";
			default:
				return "↑↓ nav • Enter open • Tab select • ^N new • ^G help";
		}
	};

	const getModeIndicator = () => {
		switch (mode) {
			case "help":
				return "HELP";
			case "createFolder":
				return "NEW FOLDER";
			case "confirmDelete":
				return "DELETE";
			case "confirmArchive":
				return "ARCHIVE";
			default:
				return ""; // No mode indicator while browsing
		}
	};

	const modeIndicator = getModeIndicator();

	return (
		<Box>
			{modeIndicator && (
				<>
					<Text color="cyan" bold>
						{modeIndicator}
					</Text>
					<Text color="gray"> • </Text>
				</>
			)}
			<Text backgroundColor="gray" color="whiteBright">
				{` ${getKeybindings()} `}
			</Text>
		</Box>
	);
}
