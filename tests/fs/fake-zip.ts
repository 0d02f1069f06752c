import { Readable } from "node:stream";
import type { ZipEntry, ZipReader } from "../../src/zip/types";

export const FAKE_MTIME = new Date(2022, 2, 4, 5, 6, 8);

export interface FakeEntryOptions {
	content?: string;
	mode?: number;
	mtime?: Date;
	/** Milliseconds before the entry stream delivers its content. */
	delay?: number;
	/** Makes open() reject with this error. */
	openError?: Error;
}

// In-memory stand-in for an opened archive entry.
export function fakeEntry(
	name: string,
	options: FakeEntryOptions = {},
): ZipEntry {
	const {
		content = "",
		mode = 0o644,
		mtime = FAKE_MTIME,
		delay = 0,
		openError,
	} = options;

	return {
		name,
		size: Buffer.byteLength(content),
		isDirectory: () => name.endsWith("/"),
		mode: () => mode,
		modifiedTime: () => mtime,
		async open() {
			if (openError) throw openError;
			const stream = new Readable({ read() {} });
			setTimeout(() => {
				if (content.length > 0) stream.push(content);
				stream.push(null);
			}, delay);
			return stream;
		},
	};
}

export function fakeZip(entries: ZipEntry[]): ZipReader {
	return {
		entries,
		async close() {},
	};
}
