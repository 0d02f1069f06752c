import type { Dirent } from "node:fs";
import type { PrepareError, TimeRestoreWarning } from "../errors";
import type { ContentReader, ZipHeader } from "../zip/types";

/**
 * Filesystem-specific configuration options for packing a file or directory
 * into a zip archive.
 */
export interface PackOptionsFS {
	/**
	 * Number of concurrent entry preparers.
	 * @default os.cpus().length || 8
	 */
	concurrency?: number;
	/**
	 * zlib compression level for file entries (0-9).
	 * @default 6
	 */
	level?: number;
	/**
	 * Filter function to include/exclude paths found by the walk (return false to
	 * exclude). Excluding a directory excludes everything below it. The source
	 * root itself is always included.
	 */
	filter?: (path: string, dirent: Dirent) => boolean;
}

/**
 * Filesystem-specific configuration options for extracting zip archives.
 */
export interface UnpackOptionsFS {
	/**
	 * Maximum number of entries restored at the same time. Each one holds an
	 * open destination file and a decompression stream.
	 * @default os.cpus().length || 8
	 */
	concurrency?: number;
	/** Called for non-fatal problems, such as a modification time that could not be restored. */
	onWarning?: (warning: TimeRestoreWarning) => void;
}

/** A path found by the walk, with its position in walk order. */
export interface SourcePath {
	/** Absolute, normalized path. */
	path: string;
	isDirectory: boolean;
	/** Index in the sorted walk; determines commit order. */
	seq: number;
}

/** How source paths map to entry names. */
export interface ArchiveLayout {
	/** Absolute path of the pack source. */
	root: string;
	/**
	 * Name of the root folder inside the archive when packing a directory;
	 * `null` when packing a single file.
	 */
	baseDir: string | null;
}

/** Result of preparing one {@link SourcePath}. */
export type PreparedEntry =
	/** The implicit archive root: nothing to write. */
	| { kind: "skip"; seq: number }
	| { kind: "directory"; seq: number; header: ZipHeader }
	| { kind: "file"; seq: number; header: ZipHeader; content: ContentReader }
	| { kind: "error"; seq: number; error: PrepareError };
