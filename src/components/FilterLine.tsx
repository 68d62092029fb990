import React from "react";
import { Text } from "ink";

interface FilterLineProps {
	filter: string;
	error?: string;
}

export function FilterLine({ filter, error }: FilterLineProps) {
	if (error) {
		return <Text color="red">{error}</Text>;
	}

	if (filter) {
		return <Text color="yellow">Filter: {filter}_</Text>;
	}

	return <Text color="gray">Type to filter...</Text>;
}
