import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import { cpus } from "node:os";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { RestoreError, TimeRestoreWarning } from "../errors";
import { DEFAULT_DIR_MODE } from "../zip/constants";
import { openZip } from "../zip/reader";
import type { ZipEntry, ZipReader } from "../zip/types";
import { createLimiter, ErrorSlot } from "./limit";
import { resolveEntryPath } from "./path";
import type { UnpackOptionsFS } from "./types";

/**
 * Extract a zip archive to a directory.
 *
 * The destination is created if missing. Directory entries are created first;
 * file entries are then restored concurrently, with at most `concurrency` of
 * them open at once. Files get the permission bits and modification time
 * recorded in the archive.
 *
 * Every entry is attempted even after a failure. The first error seen is
 * thrown once all entries have settled.
 *
 * @param zipPath - Archive to extract.
 * @param directoryPath - Path to directory where files will be extracted.
 * @param options - Optional extraction configuration.
 *
 * @example
 * ```typescript
 * import { unpackZip } from 'parallel-zip';
 *
 * await unpackZip('./dist/public.zip', './restore', {
 *   concurrency: 4,
 *   onWarning: (warning) => console.warn(warning.message),
 * });
 * ```
 */
export async function unpackZip(
	zipPath: string,
	directoryPath: string,
	options: UnpackOptionsFS = {},
): Promise<void> {
	const zip = await openZip(zipPath);
	try {
		await restoreEntries(zip, directoryPath, options);
	} finally {
		await zip.close();
	}
}

/**
 * Restores every entry of an already opened archive under `directoryPath`.
 * {@link unpackZip} is this plus opening and closing the archive.
 */
export async function restoreEntries(
	zip: ZipReader,
	directoryPath: string,
	options: UnpackOptionsFS = {},
): Promise<void> {
	const { concurrency = cpus().length || 8, onWarning } = options;
	const limit = createLimiter(concurrency);
	const destDir = path.resolve(directoryPath);

	try {
		await fs.mkdir(destDir, { recursive: true });
	} catch (err) {
		throw new RestoreError(directoryPath, err);
	}

	// Create all directories up front so no file worker races its parent.
	for (const entry of zip.entries) {
		if (!entry.isDirectory()) continue;
		const target = resolveEntryPath(destDir, entry.name);
		try {
			await fs.mkdir(target, { recursive: true, mode: DEFAULT_DIR_MODE });
		} catch (err) {
			throw new RestoreError(entry.name, err);
		}
	}

	const firstError = new ErrorSlot();
	await Promise.all(
		zip.entries
			.filter((entry) => !entry.isDirectory())
			.map((entry) =>
				limit(() => restoreFile(entry, destDir, onWarning)).catch(
					(err: unknown) => {
						firstError.set(err);
					},
				),
			),
	);
	firstError.throwIfSet();
}

async function restoreFile(
	entry: ZipEntry,
	destDir: string,
	onWarning: UnpackOptionsFS["onWarning"],
): Promise<void> {
	const target = resolveEntryPath(destDir, entry.name);

	try {
		// Covers files whose directory has no entry of its own.
		await fs.mkdir(path.dirname(target), {
			recursive: true,
			mode: DEFAULT_DIR_MODE,
		});

		const input = await entry.open();
		const output = createWriteStream(target, {
			flags: "w",
			mode: entry.mode(),
			// Use 512KB buffer for files > 1MB.
			highWaterMark: entry.size > 1048576 ? 524288 : undefined,
		});
		await pipeline(input, output);
	} catch (err) {
		throw new RestoreError(entry.name, err);
	}

	// Not fatal: reported through onWarning.
	await fs
		.utimes(target, new Date(), entry.modifiedTime())
		.catch((err: unknown) => {
			onWarning?.(new TimeRestoreWarning(target, err));
		});
}
