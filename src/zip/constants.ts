/** Permission bits restored when an entry carries none (e.g. archives made on Windows). */
export const DEFAULT_FILE_MODE = 0o644;
export const DEFAULT_DIR_MODE = 0o755;

/** Permission bits kept from `stat.mode` and from the external attributes. */
export const PERMISSION_MASK = 0o777;

/** zlib level used for deflated entries. */
export const DEFAULT_LEVEL = 6;
