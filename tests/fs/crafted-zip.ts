import * as fs from "node:fs/promises";
import { Readable, type Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createZipWriter } from "../../src/zip/writer";

export interface CraftedEntry {
	name: string;
	content?: string;
}

// archiver strips leading "/" and "../" from names, so entries are written
// under a same-length stand-in name and patched to the real name afterwards.
const standIn = (name: string) =>
	name.replace(/\.\./g, "__").replace(/^\//, "_");

/**
 * Writes a real zip archive whose entry names are stored exactly as given,
 * including absolute names and `..` segments. Entries are stored
 * uncompressed, so content must not contain a stand-in name.
 */
export async function writeCraftedZip(
	zipPath: string,
	entries: CraftedEntry[],
): Promise<void> {
	const writer = await createZipWriter(zipPath);
	for (const { name, content = "" } of entries) {
		const directory = name.endsWith("/");
		await writer.add(
			{
				name: standIn(name),
				type: directory ? "directory" : "file",
				method: "store",
				mode: directory ? 0o755 : 0o644,
				mtime: new Date(2023, 5, 7, 8, 9, 10),
				size: Buffer.byteLength(content),
			},
			directory
				? undefined
				: (sink: Writable) => pipeline(Readable.from([Buffer.from(content)]), sink),
		);
	}
	await writer.finalize();

	let bytes: Buffer = await fs.readFile(zipPath);
	for (const { name } of entries) {
		const from = Buffer.from(standIn(name));
		if (from.equals(Buffer.from(name))) continue;
		bytes = replaceAll(bytes, from, Buffer.from(name));
	}
	await fs.writeFile(zipPath, bytes);
}

function replaceAll(bytes: Buffer, from: Buffer, to: Buffer): Buffer {
	const out = Buffer.from(bytes);
	let at = out.indexOf(from);
	while (at !== -1) {
		to.copy(out, at);
		at = out.indexOf(from, at + from.length);
	}
	return out;
}
