import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { PassThrough } from "node:stream";
import { pipeline } from "node:stream/promises";
import archiver from "archiver";
import { WriteError } from "../errors";
import { DEFAULT_LEVEL } from "./constants";
import type { ContentReader, ZipHeader, ZipWriter } from "./types";

/** Options for {@link createZipWriter}. */
export interface ZipWriterOptions {
	/**
	 * zlib compression level for deflated entries (0-9).
	 * @default 6
	 */
	level?: number;
}

/**
 * Create the archive file at `zipPath` (and any missing parent directories)
 * and return a {@link ZipWriter} that appends entries to it.
 *
 * @example
 * ```typescript
 * const writer = await createZipWriter("out/site.zip");
 * await writer.add({ name: "site/", type: "directory", method: "store", mode: 0o755, mtime, size: 0 });
 * await writer.add(indexHeader, (sink) => pipeline(createReadStream("index.html"), sink));
 * await writer.finalize();
 * ```
 */
export async function createZipWriter(
	zipPath: string,
	options: ZipWriterOptions = {},
): Promise<ZipWriter> {
	const { level = DEFAULT_LEVEL } = options;

	try {
		await fs.mkdir(path.dirname(zipPath), { recursive: true });
	} catch (err) {
		throw new WriteError(zipPath, err);
	}

	// DOS timestamps are read back as local time, so write them as local time.
	const archive = archiver("zip", { zlib: { level }, forceLocalTime: true });
	const output = createWriteStream(zipPath);
	const done = pipeline(archive, output);

	// Settles only on failure; raced against each entry so a dead output
	// cannot leave a content reader waiting on backpressure.
	let failure: unknown;
	const failed = new Promise<never>((_, reject) => {
		done.catch((err: unknown) => reject(new WriteError(zipPath, err)));
	});
	failed.catch((err: unknown) => {
		failure = err;
	});

	let closed = false;

	return {
		async add(header: ZipHeader, content?: ContentReader) {
			if (failure) throw failure;
			if (closed) throw new WriteError(zipPath, "archive is already closed");

			const data = {
				name: header.name,
				mode: header.mode,
				date: header.mtime,
				store: header.method === "store",
			};

			if (header.type === "directory" || !content) {
				// A name ending in "/" makes archiver record a directory entry.
				archive.append(Buffer.alloc(0), data);
				return;
			}

			const sink = new PassThrough();
			archive.append(sink, data);
			try {
				await Promise.race([content(sink), failed]);
			} catch (err) {
				sink.destroy();
				throw err;
			}
		},

		async finalize() {
			if (failure) throw failure;
			closed = true;
			try {
				await Promise.race([archive.finalize(), failed]);
				await Promise.race([done, failed]);
			} catch (err) {
				throw err instanceof WriteError ? err : new WriteError(zipPath, err);
			}
		},

		async abort() {
			if (closed) return;
			closed = true;
			// Tearing the stream down also closes the output file.
			archive.destroy();
			await Promise.allSettled([done]);
		},
	};
}
