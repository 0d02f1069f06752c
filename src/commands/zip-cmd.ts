// `parallel-zip zip`: pack a file or directory.
import * as fs from "node:fs/promises";
import { Command } from "commander";
import { packZip } from "../fs/pack";
import { defaultArchivePath, parseJobs } from "./defaults";

export function createZipCommand(): Command {
	return new Command("zip")
		.description("Pack a file or directory into a zip archive (in parallel)")
		.argument("<src>", "File or directory to pack")
		.option("-o, --output <path>", "Path of the output .zip")
		.option("-j, --jobs <n>", "Number of parallel workers", parseJobs)
		.action(
			async (src: string, options: { output?: string; jobs?: number }) => {
				try {
					await fs.stat(src);
				} catch {
					throw new Error(`path does not exist: ${src}`);
				}

				// Computed per invocation; nothing carries over between runs.
				const output = options.output ?? defaultArchivePath(src);

				try {
					await packZip(src, output, { concurrency: options.jobs });
				} catch (error) {
					const message = error instanceof Error ? error.message : String(error);
					throw new Error(`packing failed: ${message}`, { cause: error });
				}

				console.log(`Archive created: ${output}`);
			},
		);
}
