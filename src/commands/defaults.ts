import * as path from "node:path";
import { InvalidArgumentError } from "commander";

// Default archive for `zip <src>`: the source's base name plus ".zip".
export function defaultArchivePath(source: string): string {
	return `${path.basename(path.resolve(source))}.zip`;
}

// Default destination for `unzip <zipfile>`: the archive's base name without a
// ".zip" suffix (any case) and without one further extension, so
// "site.tar.zip" extracts to "site".
export function defaultDestDir(zipPath: string): string {
	let base = path.basename(zipPath);

	const ext = path.extname(base);
	if (ext.toLowerCase() === ".zip") base = base.slice(0, -ext.length);

	const inner = path.extname(base);
	if (inner) base = base.slice(0, -inner.length);

	return base;
}

// Parses --jobs.
export function parseJobs(value: string): number {
	const jobs = Number(value);
	if (!Number.isInteger(jobs) || jobs < 1)
		throw new InvalidArgumentError("Must be a positive integer.");
	return jobs;
}
