import React from "react";
import { Box, Text } from "ink";

interface HeaderBarProps {
	path: string;
	folderCount: number;
}

export function HeaderBar({ path, folderCount }: HeaderBarProps) {
	return (
		<Box>
			<Text color="blue" bold>
				{path}
			</Text>
			<Box flexGrow={1} />
			<Text color="gray">
				{folderCount} {folderCount === 1 ? "folder" : "folders"}
			</Text>
		</Box>
	);
}
