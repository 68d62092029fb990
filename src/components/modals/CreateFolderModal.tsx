import React from "react";
import { Box, Text } from "ink";

interface CreateFolderModalProps {
	parentPath: string;
	draftName: string;
}

export function CreateFolderModal({
	parentPath,
	draftName,
}: CreateFolderModalProps) {
	return (
		<Box
			borderStyle="double"
			borderColor="green"
			paddingX={1}
			paddingY={1}
			marginX={2}
			marginTop={1}
		>
			<Box flexDirection="column">
				<Text color="green" bold>
					Create new folder
				</Text>
				<Text color="gray">
					in {parentPath.endsWith("/") ? parentPath : `${parentPath}/`}
				</Text>
				<Box marginTop={1}>
					<Text color="gray">Name: </Text>
					<Text color="white">{draftName}</Text>
					<Text color="green">█</Text>
				</Box>
			</Box>
		</Box>
	);
}
