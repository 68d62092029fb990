import React from "react";
import { Box, Text } from "ink";
import type { Entry } from "../lib/directory.js";
import { formatRange, visibleWindow } from "../lib/viewport.js";

interface EntryListPanelProps {
	entries: Entry[];
	cursor: number;
	offset: number;
	height: number;
}

export function EntryListPanel({
	entries,
	cursor,
	offset,
	height,
}: EntryListPanelProps) {
	const view = visibleWindow(entries, offset, height);

	return (
		<Box flexDirection="column" marginTop={1}>
			{entries.length === 0 ? (
				<Text color="gray">No matching folders</Text>
			) : (
				view.items.map((entry, index) => {
					const isSelected = view.start + index === cursor;

					return (
						<Text
							key={entry.absolutePath}
							color={isSelected ? "blue" : undefined}
							bold={isSelected}
						>
							{isSelected ? "> " : "  "}
							{entry.displayName}
						</Text>
					);
				})
			)}
			<Text color="gray">{view.overflow ? formatRange(view) : " "}</Text>
		</Box>
	);
}
