import { mkdirSync, mkdtempSync, realpathSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a scratch directory tree. `dirs` are relative paths created below
 * the returned root.
 */
export function makeTree(dirs: string[] = []): string {
	const root = realpathSync(mkdtempSync(join(tmpdir(), "pf-test-")));
	for (const dir of dirs) {
		mkdirSync(join(root, dir), { recursive: true });
	}
	return root;
}

export function removeTree(root: string): void {
	rmSync(root, { recursive: true, force: true });
}
