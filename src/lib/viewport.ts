// Lines taken by the path, filter line, blank line, range indicator and footer.
export const RESERVED_LINES = 5;
export const MIN_VISIBLE_LINES = 5;

export interface VisibleWindow<T> {
	start: number;
	end: number;
	total: number;
	items: T[];
	overflow: boolean;
}

export function visibleLines(height: number): number {
	if (height <= RESERVED_LINES) {
		return MIN_VISIBLE_LINES;
	}
	return height - RESERVED_LINES;
}

/**
 * Return the scroll offset that keeps `cursor` inside the visible window.
 */
export function fixScroll(
	cursor: number,
	offset: number,
	height: number,
): number {
	const visible = visibleLines(height);
	if (cursor < offset) {
		return cursor;
	}
	if (cursor >= offset + visible) {
		return cursor - visible + 1;
	}
	return offset;
}

export function visibleWindow<T>(
	items: T[],
	offset: number,
	height: number,
): VisibleWindow<T> {
	const visible = visibleLines(height);
	const start = Math.min(offset, items.length);
	const end = Math.min(start + visible, items.length);

	return {
		start,
		end,
		total: items.length,
		items: items.slice(start, end),
		overflow: items.length > visible,
	};
}

export function formatRange({ start, end, total }: VisibleWindow<unknown>) {
	return `(${start + 1}-${end} of ${total})`;
}
