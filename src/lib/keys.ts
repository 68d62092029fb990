import type { Key } from "ink";

export type KeyFlags = Pick<
	Key,
	| "upArrow"
	| "downArrow"
	| "return"
	| "escape"
	| "tab"
	| "shift"
	| "backspace"
	| "delete"
	| "ctrl"
	| "meta"
>;

export const KEYS = {
	up: "up",
	down: "down",
	open: "enter",
	parent: "esc",
	cancel: "esc",
	select: "tab",
	help: "ctrl+g",
	create: "ctrl+n",
	archive: "ctrl+a",
	delete: "alt+backspace",
	backspace: "backspace",
	quit: "ctrl+c",
} as const;

/**
 * Translate an Ink keypress into the label the navigation reducer handles.
 */
export function toKeyLabel(input: string, key: KeyFlags): string | undefined {
	if (key.upArrow) {
		return KEYS.up;
	}
	if (key.downArrow) {
		return KEYS.down;
	}
	if (key.return) {
		return KEYS.open;
	}
	if (key.tab) {
		return key.shift ? undefined : KEYS.select;
	}
	// Most terminals send DEL for backspace, which Ink reports as `delete`.
	if (key.backspace || key.delete) {
		return key.meta ? KEYS.delete : KEYS.backspace;
	}
	if (key.escape) {
		return KEYS.cancel;
	}
	if (!input) {
		return undefined;
	}
	if (key.ctrl) {
		return `ctrl+${input.toLowerCase()}`;
	}
	if (key.meta) {
		return `alt+${input}`;
	}
	return input;
}

/**
 * A label is printable when it is a single non-control character.
 */
export function isPrintable(label: string): boolean {
	const chars = Array.from(label);
	if (chars.length !== 1) {
		return false;
	}
	return label >= " " && label !== "\u007f";
}
