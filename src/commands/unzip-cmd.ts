// `parallel-zip unzip`: extract an archive.
import * as fs from "node:fs/promises";
import { Command } from "commander";
import { unpackZip } from "../fs/unpack";
import { defaultDestDir, parseJobs } from "./defaults";

export function createUnzipCommand(): Command {
	return new Command("unzip")
		.description("Extract a zip archive into a directory (in parallel)")
		.argument("<zipfile>", "Archive to extract")
		.option("-d, --dest <dir>", "Directory to extract into")
		.option("-j, --jobs <n>", "Number of parallel workers", parseJobs)
		.action(
			async (zipfile: string, options: { dest?: string; jobs?: number }) => {
				try {
					await fs.stat(zipfile);
				} catch {
					throw new Error(`archive not found: ${zipfile}`);
				}

				const dest = options.dest ?? defaultDestDir(zipfile);

				try {
					await unpackZip(zipfile, dest, {
						concurrency: options.jobs,
						onWarning: (warning) => console.warn(`Warning: ${warning.message}`),
					});
				} catch (error) {
					const message = error instanceof Error ? error.message : String(error);
					throw new Error(`extraction failed: ${message}`, { cause: error });
				}

				console.log(`Extracted to: ${dest}`);
			},
		);
}
