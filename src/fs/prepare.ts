import { createReadStream, type Stats } from "node:fs";
import * as fs from "node:fs/promises";
import { pipeline } from "node:stream/promises";
import { PrepareError } from "../errors";
import { PERMISSION_MASK } from "../zip/constants";
import type { ContentReader } from "../zip/types";
import { entryNameOf } from "./path";
import type { ArchiveLayout, PreparedEntry, SourcePath } from "./types";

/**
 * Prepares one walked path for the archive: stats it and builds its header
 * and, for files, a content reader that is only invoked when the entry is
 * committed.
 *
 * Never throws. A failed stat is returned as an `"error"` entry so every
 * sequence number produces exactly one result.
 */
export async function prepareEntry(
	source: SourcePath,
	layout: ArchiveLayout,
): Promise<PreparedEntry> {
	const { seq } = source;
	const name = entryNameOf(source.path, layout);

	let stat: Stats;
	try {
		// Follow symlinks: a linked file is archived with its target's content.
		stat = await fs.stat(source.path);
	} catch (err) {
		return { kind: "error", seq, error: new PrepareError(source.path, err) };
	}

	if (stat.isDirectory()) {
		if (name === null) return { kind: "skip", seq };
		return {
			kind: "directory",
			seq,
			header: {
				name: `${name}/`,
				type: "directory",
				method: "store",
				mode: stat.mode & PERMISSION_MASK,
				mtime: stat.mtime,
				size: 0,
			},
		};
	}

	// The root was a directory when the walk ran.
	if (name === null) {
		return {
			kind: "error",
			seq,
			error: new PrepareError(source.path, "no longer a directory"),
		};
	}

	return {
		kind: "file",
		seq,
		header: {
			name,
			type: "file",
			method: "deflate",
			mode: stat.mode & PERMISSION_MASK,
			mtime: stat.mtime,
			size: stat.size,
		},
		content: readFileInto(source.path),
	};
}

// pipeline() closes the read stream on success and on failure.
function readFileInto(filePath: string): ContentReader {
	return async (sink) => {
		try {
			await pipeline(createReadStream(filePath), sink);
		} catch (err) {
			throw new PrepareError(filePath, err);
		}
	};
}
