import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { TraversalError } from "../errors";
import type { PackOptionsFS, SourcePath } from "./types";

/**
 * Walks `root` recursively and returns every path found, the root included,
 * sorted by full path string. Symlinks below the root are listed but never
 * descended into.
 *
 * The order only depends on the names in the tree, so walking an unchanged
 * tree twice gives the same sequence.
 *
 * @throws {TraversalError} If the root or a directory below it cannot be read.
 */
export async function walkSorted(
	root: string,
	options: Pick<PackOptionsFS, "filter"> = {},
): Promise<SourcePath[]> {
	const { filter } = options;
	const resolvedRoot = path.resolve(root);

	let rootIsDirectory: boolean;
	try {
		rootIsDirectory = (await fs.stat(resolvedRoot)).isDirectory();
	} catch (err) {
		throw new TraversalError(resolvedRoot, err);
	}

	const found: { path: string; isDirectory: boolean }[] = [
		{ path: resolvedRoot, isDirectory: rootIsDirectory },
	];

	// Use a stack for non-recursive depth-first traversal.
	const stack = rootIsDirectory ? [resolvedRoot] : [];
	while (stack.length > 0) {
		const dir = stack.pop();
		if (dir === undefined) break;

		let dirents: Dirent[];
		try {
			dirents = await fs.readdir(dir, { withFileTypes: true });
		} catch (err) {
			throw new TraversalError(dir, err);
		}

		for (const dirent of dirents) {
			const childPath = path.join(dir, dirent.name);
			if (filter && !filter(childPath, dirent)) continue;

			const isDirectory = dirent.isDirectory();
			found.push({ path: childPath, isDirectory });
			if (isDirectory) stack.push(childPath);
		}
	}

	// Plain code unit comparison; localeCompare would depend on the host locale.
	found.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

	return found.map((entry, seq) => ({ ...entry, seq }));
}
