export { DEFAULT_DIR_MODE, DEFAULT_FILE_MODE, DEFAULT_LEVEL } from "./constants";
export { decodeEntryName, openZip } from "./reader";
export type {
	ContentReader,
	ZipEntry,
	ZipHeader,
	ZipMethod,
	ZipReader,
	ZipWriter,
} from "./types";
export { createZipWriter, type ZipWriterOptions } from "./writer";
