import type { Readable } from "node:stream";
import * as yauzl from "yauzl";
import { ReadError } from "../errors";
import { DEFAULT_DIR_MODE, DEFAULT_FILE_MODE, PERMISSION_MASK } from "./constants";
import cp437 from "./cp437.json";
import type { ZipEntry, ZipReader } from "./types";

/**
 * Open the archive at `zipPath` and read its central directory.
 *
 * The returned entries can be opened independently and concurrently; call
 * {@link ZipReader.close} once every entry stream has been consumed.
 *
 * Entry names are listed as stored, apart from backslashes turned into
 * forward slashes. Absolute names and `..` segments are not rejected here;
 * callers extracting to disk must check each name against their destination.
 */
export async function openZip(zipPath: string): Promise<ZipReader> {
	const zipfile = await new Promise<yauzl.ZipFile>((resolve, reject) => {
		yauzl.open(
			zipPath,
			{ lazyEntries: true, autoClose: false, decodeStrings: false },
			(err, zf) => {
				if (err || !zf) reject(new ReadError(zipPath, err));
				else resolve(zf);
			},
		);
	});

	let raw: yauzl.Entry[];
	try {
		raw = await readEntries(zipfile);
	} catch (err) {
		zipfile.close();
		throw new ReadError(zipPath, err);
	}

	return {
		entries: raw.map((entry) => toZipEntry(zipfile, entry)),
		async close() {
			zipfile.close();
		},
	};
}

function readEntries(zipfile: yauzl.ZipFile): Promise<yauzl.Entry[]> {
	return new Promise((resolve, reject) => {
		const entries: yauzl.Entry[] = [];
		zipfile.on("entry", (entry: yauzl.Entry) => {
			entries.push(entry);
			zipfile.readEntry();
		});
		zipfile.once("end", () => resolve(entries));
		zipfile.once("error", reject);
		zipfile.readEntry();
	});
}

const UTF8_NAMES_FLAG = 0x800;
const CP437_HIGH = Array.from(cp437.high);

/**
 * Decodes a raw entry name: UTF-8 when the entry sets general purpose bit 11,
 * code page 437 otherwise.
 */
export function decodeEntryName(raw: Buffer, generalPurposeBitFlag: number): string {
	let name: string;
	if (generalPurposeBitFlag & UTF8_NAMES_FLAG) {
		name = raw.toString("utf8");
	} else {
		name = "";
		for (const byte of raw)
			name += byte < 0x80 ? String.fromCharCode(byte) : CP437_HIGH[byte - 0x80];
	}
	return name.replace(/\\/g, "/");
}

// With decodeStrings off, yauzl hands names over as Buffers.
function entryName(entry: yauzl.Entry): string {
	const raw: unknown = entry.fileName;
	if (Buffer.isBuffer(raw)) return decodeEntryName(raw, entry.generalPurposeBitFlag);
	return String(raw).replace(/\\/g, "/");
}

function toZipEntry(zipfile: yauzl.ZipFile, entry: yauzl.Entry): ZipEntry {
	const name = entryName(entry);
	const directory = name.endsWith("/");

	// Unix permission bits live in the upper 16 bits of the external attributes.
	const unixMode = (entry.externalFileAttributes >>> 16) & PERMISSION_MASK;
	const mode = unixMode || (directory ? DEFAULT_DIR_MODE : DEFAULT_FILE_MODE);

	return {
		name,
		size: entry.uncompressedSize,
		isDirectory: () => directory,
		mode: () => mode,
		modifiedTime: () => entry.getLastModDate(),
		open: () =>
			new Promise<Readable>((resolve, reject) => {
				zipfile.openReadStream(entry, (err, stream) => {
					if (err || !stream) reject(err ?? new Error("no stream"));
					else resolve(stream);
				});
			}),
	};
}
