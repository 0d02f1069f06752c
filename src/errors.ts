/** Stable error codes for pack and unpack failures. */
export type ZipArchiveErrorCode =
	| "TRAVERSAL_FAILED"
	| "PREPARE_FAILED"
	| "WRITE_FAILED"
	| "READ_FAILED"
	| "PATH_ESCAPE"
	| "RESTORE_FAILED"
	| "TIME_RESTORE_FAILED";

/**
 * Base class for every error raised by {@link packZip} and {@link unpackZip}.
 *
 * The `code` is stable across releases and safe to branch on; `message` is
 * meant for humans.
 */
export class ZipArchiveError extends Error {
	/** Machine-readable error code. */
	readonly code: ZipArchiveErrorCode;
	/** Filesystem path or entry name the error is about, if any. */
	readonly path?: string;

	constructor(
		code: ZipArchiveErrorCode,
		message: string,
		options: { path?: string; cause?: unknown } = {},
	) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = "ZipArchiveError";
		this.code = code;
		this.path = options.path;
	}
}

// Appends the cause's message, so the top-level error is readable on its own.
function describe(message: string, cause: unknown): string {
	if (cause instanceof Error) return `${message}: ${cause.message}`;
	if (cause === undefined) return message;
	return `${message}: ${String(cause)}`;
}

/** A source path could not be read while walking the tree. */
export class TraversalError extends ZipArchiveError {
	constructor(path: string, cause: unknown) {
		super("TRAVERSAL_FAILED", describe(`Cannot read "${path}"`, cause), {
			path,
			cause,
		});
		this.name = "TraversalError";
	}
}

/** A single source could not be stat'ed or opened. */
export class PrepareError extends ZipArchiveError {
	constructor(path: string, cause: unknown) {
		super("PREPARE_FAILED", describe(`Cannot prepare "${path}"`, cause), {
			path,
			cause,
		});
		this.name = "PrepareError";
	}
}

/** The archive output could not be written. */
export class WriteError extends ZipArchiveError {
	constructor(path: string, cause: unknown) {
		super("WRITE_FAILED", describe(`Cannot write archive "${path}"`, cause), {
			path,
			cause,
		});
		this.name = "WriteError";
	}
}

/** The archive could not be opened or its entry list parsed. */
export class ReadError extends ZipArchiveError {
	constructor(path: string, cause: unknown) {
		super("READ_FAILED", describe(`Cannot read archive "${path}"`, cause), {
			path,
			cause,
		});
		this.name = "ReadError";
	}
}

/** An entry would be written outside the extraction directory. */
export class PathEscapeError extends ZipArchiveError {
	constructor(target: string, root: string) {
		super(
			"PATH_ESCAPE",
			`Entry "${target}" points outside the extraction directory "${root}".`,
			{ path: target },
		);
		this.name = "PathEscapeError";
	}
}

/** An entry could not be restored to disk. */
export class RestoreError extends ZipArchiveError {
	constructor(entryName: string, cause: unknown) {
		super("RESTORE_FAILED", describe(`Cannot restore "${entryName}"`, cause), {
			path: entryName,
			cause,
		});
		this.name = "RestoreError";
	}
}

/** The modification time of a restored file could not be set. Never thrown. */
export class TimeRestoreWarning extends ZipArchiveError {
	constructor(path: string, cause: unknown) {
		super(
			"TIME_RESTORE_FAILED",
			describe(`Cannot set modification time of "${path}"`, cause),
			{ path, cause },
		);
		this.name = "TimeRestoreWarning";
	}
}
