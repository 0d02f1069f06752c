import * as fs from "node:fs/promises";
import { cpus } from "node:os";
import * as path from "node:path";
import { PrepareError, TraversalError } from "../errors";
import { createZipWriter } from "../zip/writer";
import { createChannel } from "./channel";
import { prepareEntry } from "./prepare";
import { ReorderBuffer } from "./reorder";
import type { ArchiveLayout, PackOptionsFS, PreparedEntry } from "./types";
import { walkSorted } from "./walk";

/** A prepared entry that results in an archive entry. */
export type CommittableEntry = Extract<
	PreparedEntry,
	{ kind: "directory" | "file" }
>;

/**
 * Packs a file or directory into a zip archive at `zipPath`, creating missing
 * parent directories of the archive.
 *
 * Entries are prepared concurrently but written in sorted walk order, so an
 * unchanged tree always produces the same archive bytes. A directory source is
 * stored under its own name (`src/a.txt` for `packZip("src", ...)`); a file
 * source becomes a single entry named by its base name.
 *
 * On failure the archive file is left unterminated and must not be used.
 *
 * @param source - File or directory to pack.
 * @param zipPath - Archive file to create or overwrite.
 * @param options - Optional packing configuration using {@link PackOptionsFS}.
 *
 * @example
 * ```typescript
 * import { packZip } from 'parallel-zip';
 *
 * await packZip('./public', './dist/public.zip', {
 *   filter: (path, dirent) => dirent.name !== '.DS_Store',
 * });
 * ```
 */
export async function packZip(
	source: string,
	zipPath: string,
	options: PackOptionsFS = {},
): Promise<void> {
	const { concurrency = cpus().length || 8, level, filter } = options;
	if (!Number.isInteger(concurrency) || concurrency < 1)
		throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}.`);

	const root = path.resolve(source);
	let layout: ArchiveLayout;
	try {
		const stat = await fs.stat(root);
		layout = { root, baseDir: stat.isDirectory() ? path.basename(root) : null };
	} catch (err) {
		throw new TraversalError(root, err);
	}

	// Nothing is created on disk until the walk has succeeded.
	const paths = await walkSorted(root, { filter });

	const writer = await createZipWriter(zipPath, { level });
	const results = createChannel<PreparedEntry>(2 * concurrency);

	// Shared work queue: each worker claims the next unprepared index.
	let cursor = 0;
	const worker = async () => {
		while (cursor < paths.length) {
			const next = paths[cursor++];
			const entry = await prepareEntry(next, layout).catch(
				(err: unknown): PreparedEntry => ({
					kind: "error",
					seq: next.seq,
					error: new PrepareError(next.path, err),
				}),
			);
			if (!(await results.send(entry))) return;
		}
	};

	const workers = Promise.all(
		Array.from({ length: Math.min(concurrency, paths.length) }, worker),
	).finally(() => results.close());

	try {
		await commitInOrder(results, paths.length, (entry) =>
			writer.add(
				entry.header,
				entry.kind === "file" ? entry.content : undefined,
			),
		);
		await writer.finalize();
	} catch (err) {
		// Let in-flight workers finish their current item, then stop.
		cursor = paths.length;
		results.close();
		await writer.abort();
		throw err;
	} finally {
		await workers;
	}
}

/**
 * Consumes prepared entries in any arrival order and commits them strictly by
 * sequence number, one at a time.
 *
 * The first entry in sequence order that carries an error stops the run and is
 * thrown, after every entry before it has been committed. Directory roots
 * (`"skip"` entries) are consumed without a commit.
 *
 * @param results - Prepared entries, each sequence number `0..total-1` exactly once.
 * @param total - Number of entries to expect.
 * @param commit - Writes one entry; awaited before the next commit starts.
 */
export async function commitInOrder(
	results: AsyncIterable<PreparedEntry>,
	total: number,
	commit: (entry: CommittableEntry) => Promise<void>,
): Promise<void> {
	const reorder = new ReorderBuffer<PreparedEntry>();
	if (total === 0) return;

	for await (const entry of results) {
		if (entry.seq >= total)
			throw new RangeError(`Sequence number ${entry.seq} is out of range.`);
		reorder.push(entry);

		for (const ready of reorder.takeReady()) {
			if (ready.kind === "error") throw ready.error;
			if (ready.kind !== "skip") await commit(ready);
		}

		if (reorder.next === total) return;
	}

	throw new Error(
		`Results ended after ${reorder.next} of ${total} entries were committed.`,
	);
}
