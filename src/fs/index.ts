export { createChannel, type Channel } from "./channel";
export { createLimiter, ErrorSlot, type Limiter } from "./limit";
export { type CommittableEntry, commitInOrder, packZip } from "./pack";
export { entryNameOf, resolveEntryPath, toZipName, validateBounds } from "./path";
export { prepareEntry } from "./prepare";
export { ReorderBuffer } from "./reorder";
export type {
	ArchiveLayout,
	PackOptionsFS,
	PreparedEntry,
	SourcePath,
	UnpackOptionsFS,
} from "./types";
export { restoreEntries, unpackZip } from "./unpack";
export { walkSorted } from "./walk";
