import type { Entry } from "./directory.js";

/**
 * Split filter text into lowercase words. Empty text yields no words.
 */
export function parseQuery(text: string): string[] {
	const query = text.trim().toLowerCase();
	return query === "" ? [] : query.split(/\s+/);
}

export function matchesQuery(entry: Entry, words: readonly string[]): boolean {
	const name = entry.displayName.toLowerCase();
	return words.every((word) => name.includes(word));
}

/**
 * Keep the entries whose name contains every word of `text`, in their
 * original order.
 */
export function filterEntries(entries: Entry[], text: string): Entry[] {
	const words = parseQuery(text);
	if (words.length === 0) {
		return entries;
	}

	return entries.filter((entry) => matchesQuery(entry, words));
}
