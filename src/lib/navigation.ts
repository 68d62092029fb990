import { dirname, join } from "node:path";
import type { Entry } from "./directory.js";
import { filterEntries } from "./filter.js";
import { KEYS, isPrintable } from "./keys.js";
import type { MutationResult } from "./mutations.js";
import { fixScroll } from "./viewport.js";

export type Modal =
	| { kind: "browsing" }
	| { kind: "help" }
	| { kind: "createFolder"; draftName: string }
	| { kind: "confirmDelete"; target: string }
	| { kind: "confirmArchive"; target: string };

export type ModalKind = Modal["kind"];

export type Outcome = { kind: "selected"; path: string } | { kind: "quit" };

export interface NavigationState {
	root: string;
	listing: Entry[];
	filter: string;
	cursor: number;
	offset: number;
	height: number;
	modal: Modal;
	error?: string;
	outcome?: Outcome;
}

export type NavigationEvent =
	| { type: "key"; key: string }
	| { type: "resize"; height: number };

/**
 * Filesystem collaborators of the reducer.
 */
export interface NavigationDeps {
	archiveDirectory: string;
	loadDirectory(path: string): Entry[];
	createFolder(parent: string, name: string): MutationResult;
	deleteFolder(path: string): MutationResult;
	archiveFolder(path: string, archiveDirectory: string): MutationResult;
}

const BROWSING: Modal = { kind: "browsing" };
const QUIT: Outcome = { kind: "quit" };

export function createNavigationState(
	root: string,
	deps: NavigationDeps,
	height = 0,
): NavigationState {
	return {
		root,
		listing: deps.loadDirectory(root),
		filter: "",
		cursor: 0,
		offset: 0,
		height,
		modal: BROWSING,
	};
}

export function filteredEntries(state: NavigationState): Entry[] {
	return filterEntries(state.listing, state.filter);
}

export function currentEntry(state: NavigationState): Entry | undefined {
	return filteredEntries(state)[state.cursor];
}

export function isFilesystemRoot(path: string): boolean {
	return dirname(path) === path;
}

function dropLastChar(text: string): string {
	return Array.from(text).slice(0, -1).join("");
}

function withCursor(state: NavigationState, cursor: number): NavigationState {
	return {
		...state,
		cursor,
		offset: fixScroll(cursor, state.offset, state.height),
	};
}

function reload(state: NavigationState, deps: NavigationDeps): NavigationState {
	return {
		...state,
		listing: deps.loadDirectory(state.root),
		cursor: 0,
		offset: 0,
	};
}

/**
 * Move the cursor onto the entry at `path` when it is visible.
 */
function selectPath(state: NavigationState, path: string): NavigationState {
	const index = filteredEntries(state).findIndex(
		(entry) => entry.absolutePath === path,
	);
	return index === -1 ? state : withCursor(state, index);
}

function openDirectory(
	state: NavigationState,
	path: string,
	deps: NavigationDeps,
): NavigationState {
	return reload({ ...state, root: path, filter: "" }, deps);
}

function goToParent(
	state: NavigationState,
	deps: NavigationDeps,
): NavigationState {
	const parent = dirname(state.root);
	if (parent === state.root) {
		return state;
	}
	return selectPath(openDirectory(state, parent, deps), state.root);
}

function deletableTarget(state: NavigationState): string | undefined {
	const entry = currentEntry(state);
	if (!entry) {
		return undefined;
	}
	const path = entry.absolutePath;
	if (path === state.root || isFilesystemRoot(path)) {
		return undefined;
	}
	return path;
}

function reduceBrowsing(
	state: NavigationState,
	key: string,
	deps: NavigationDeps,
): NavigationState {
	const entries = filteredEntries(state);

	switch (key) {
		case KEYS.quit:
			return { ...state, outcome: QUIT };
		case KEYS.help:
			return { ...state, modal: { kind: "help" } };
		case KEYS.parent:
			return goToParent(state, deps);
		case KEYS.up:
			return state.cursor > 0 ? withCursor(state, state.cursor - 1) : state;
		case KEYS.down:
			return state.cursor < entries.length - 1
				? withCursor(state, state.cursor + 1)
				: state;
		case KEYS.open: {
			const entry = entries[state.cursor];
			if (!entry) {
				return state;
			}
			if (entry.absolutePath === state.root) {
				return goToParent(state, deps);
			}
			return openDirectory(state, entry.absolutePath, deps);
		}
		case KEYS.select: {
			const entry = entries[state.cursor];
			if (!entry) {
				return state;
			}
			return {
				...state,
				outcome: { kind: "selected", path: entry.absolutePath },
			};
		}
		case KEYS.delete: {
			const target = deletableTarget(state);
			return target
				? { ...state, modal: { kind: "confirmDelete", target } }
				: state;
		}
		case KEYS.archive: {
			const target = deletableTarget(state);
			return target
				? { ...state, modal: { kind: "confirmArchive", target } }
				: state;
		}
		case KEYS.create:
			return { ...state, modal: { kind: "createFolder", draftName: "" } };
		case KEYS.backspace:
			if (state.filter === "") {
				return state;
			}
			return {
				...state,
				filter: dropLastChar(state.filter),
				cursor: 0,
				offset: 0,
			};
		default:
			if (!isPrintable(key)) {
				return state;
			}
			return { ...state, filter: state.filter + key, cursor: 0, offset: 0 };
	}
}

function reduceHelp(state: NavigationState, key: string): NavigationState {
	switch (key) {
		case KEYS.quit:
			return { ...state, outcome: QUIT };
		case KEYS.help:
		case KEYS.cancel:
			return { ...state, modal: BROWSING };
		default:
			return state;
	}
}

function reduceCreateFolder(
	state: NavigationState,
	draftName: string,
	key: string,
	deps: NavigationDeps,
): NavigationState {
	switch (key) {
		case KEYS.quit:
			return { ...state, outcome: QUIT };
		case KEYS.cancel:
			return { ...state, modal: BROWSING };
		case KEYS.backspace:
			return {
				...state,
				modal: { kind: "createFolder", draftName: dropLastChar(draftName) },
			};
		case KEYS.open: {
			if (draftName === "") {
				return state;
			}
			const result = deps.createFolder(state.root, draftName);
			if (!result.ok) {
				return { ...state, modal: BROWSING, error: result.error.message };
			}
			const reloaded = reload({ ...state, modal: BROWSING }, deps);
			return selectPath(reloaded, join(state.root, draftName));
		}
		default:
			if (!isPrintable(key)) {
				return state;
			}
			return {
				...state,
				modal: { kind: "createFolder", draftName: draftName + key },
			};
	}
}

function reduceConfirm(
	state: NavigationState,
	key: string,
	mutate: () => MutationResult,
	deps: NavigationDeps,
): NavigationState {
	switch (key) {
		case KEYS.quit:
			return { ...state, outcome: QUIT };
		case "y":
		case "Y": {
			const result = mutate();
			if (!result.ok) {
				return { ...state, modal: BROWSING, error: result.error.message };
			}
			return reload({ ...state, modal: BROWSING, error: undefined }, deps);
		}
		case "n":
		case "N":
		case KEYS.cancel:
			return { ...state, modal: BROWSING };
		default:
			return state;
	}
}

/**
 * Apply one input event to the navigation state.
 *
 * Modal dialogs capture every key while open. In browsing and help, a key
 * first clears any displayed error and is then handled as usual.
 */
export function reduce(
	state: NavigationState,
	event: NavigationEvent,
	deps: NavigationDeps,
): NavigationState {
	if (state.outcome) {
		return state;
	}

	if (event.type === "resize") {
		return {
			...state,
			height: event.height,
			offset: fixScroll(state.cursor, state.offset, event.height),
		};
	}

	const { modal } = state;
	switch (modal.kind) {
		case "createFolder":
			return reduceCreateFolder(state, modal.draftName, event.key, deps);
		case "confirmDelete":
			return reduceConfirm(
				state,
				event.key,
				() => deps.deleteFolder(modal.target),
				deps,
			);
		case "confirmArchive":
			return reduceConfirm(
				state,
				event.key,
				() => deps.archiveFolder(modal.target, deps.archiveDirectory),
				deps,
			);
	}

	const cleared: NavigationState =
		state.error === undefined ? state : { ...state, error: undefined };

	if (modal.kind === "help") {
		return reduceHelp(cleared, event.key);
	}
	return reduceBrowsing(cleared, event.key, deps);
}
