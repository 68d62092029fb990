import React from "react";
import { Box, Text } from "ink";

interface ConfirmModalProps {
	title: string;
	color: "red" | "yellow";
	details: Array<{ label?: string; value: string }>;
	message: string;
	confirmLabel: string;
}

export function ConfirmModal({
	title,
	color,
	details,
	message,
	confirmLabel,
}: ConfirmModalProps) {
	return (
		<Box
			borderStyle="double"
			borderColor={color}
			paddingX={2}
			paddingY={1}
			marginX={4}
			marginTop={1}
		>
			<Box flexDirection="column">
				<Text color={color} bold>
					{title}
				</Text>
				<Box marginTop={1} flexDirection="column">
					{details.map(({ label, value }) => (
						<Text key={`${label ?? ""}${value}`}>
							{label && <Text bold>{label.padEnd(6)}</Text>}
							{value}
						</Text>
					))}
				</Box>
				<Box marginTop={1} marginBottom={1}>
					<Text color="gray">{message}</Text>
				</Box>
				<Box>
					<Text color="gray">
						[<Text color="green">y</Text>] {confirmLabel} [
						<Text color="red">n</Text>/<Text color="red">Esc</Text>] Cancel
					</Text>
				</Box>
			</Box>
		</Box>
	);
}
