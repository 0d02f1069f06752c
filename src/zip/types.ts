import type { Readable, Writable } from "node:stream";

/** Compression method of an entry. Directories are always stored. */
export type ZipMethod = "deflate" | "store";

/**
 * Header information for a zip entry.
 */
export interface ZipHeader {
	/** Entry name inside the archive, `/`-separated. Directory names end with `/`. */
	name: string;
	/** Entry type. */
	type: "file" | "directory";
	/** Compression method. */
	method: ZipMethod;
	/** Unix permission bits (e.g. 0o644). */
	mode: number;
	/** Modification time, stored with the 2-second resolution of DOS timestamps. */
	mtime: Date;
	/** Uncompressed size in bytes. 0 for directories. */
	size: number;
}

/**
 * Streams an entry's content into `sink` and ends it. Resolves once every byte
 * has been handed to the sink.
 */
export type ContentReader = (sink: Writable) => Promise<void>;

/**
 * Append-only zip output. Entries appear in the archive in the order `add` is
 * called; calls must not overlap.
 */
export interface ZipWriter {
	/** Append one entry. Directory entries take no content. */
	add(header: ZipHeader, content?: ContentReader): Promise<void>;
	/** Write the central directory and close the output file. */
	finalize(): Promise<void>;
	/** Stop writing and close the output file, leaving an unterminated archive. */
	abort(): Promise<void>;
}

/** One entry of an opened archive. Entries can be opened concurrently. */
export interface ZipEntry {
	/** Entry name as recorded in the archive. */
	readonly name: string;
	/** Uncompressed size in bytes. */
	readonly size: number;
	isDirectory(): boolean;
	/** Unix permission bits, or a default when the archive carries none. */
	mode(): number;
	modifiedTime(): Date;
	/** Open a stream of the decompressed content. */
	open(): Promise<Readable>;
}

/** Read-only, random-access view of an archive. */
export interface ZipReader {
	/** Entries in central directory order. */
	readonly entries: readonly ZipEntry[];
	close(): Promise<void>;
}
