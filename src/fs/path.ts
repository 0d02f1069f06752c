import * as path from "node:path";
import { PathEscapeError } from "../errors";
import type { ArchiveLayout } from "./types";

// Validates that the given target path is within the destination directory and does not escape.
export function validateBounds(targetPath: string, destDir: string): void {
	const target = path.resolve(targetPath);
	const dest = path.resolve(destDir);
	if (target !== dest && !target.startsWith(dest + path.sep))
		throw new PathEscapeError(targetPath, destDir);
}

// Joins an untrusted entry name onto the destination and checks the result.
export function resolveEntryPath(destDir: string, entryName: string): string {
	const target = path.join(destDir, entryName);
	validateBounds(target, destDir);
	return target;
}

// Converts platform separators to the forward slashes zip entry names use.
export const toZipName = (p: string): string => p.split(path.sep).join("/");

/**
 * Computes the entry name of a source path, without the trailing slash of
 * directory entries. Returns `null` for the root of a directory archive,
 * which gets no entry of its own.
 */
export function entryNameOf(
	sourcePath: string,
	layout: ArchiveLayout,
): string | null {
	if (layout.baseDir === null) return path.basename(sourcePath);
	if (sourcePath === layout.root) return null;

	const relative = path.relative(layout.root, sourcePath);
	return toZipName(path.join(layout.baseDir, relative));
}
