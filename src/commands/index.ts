import { Command } from "commander";
import { createUnzipCommand } from "./unzip-cmd";
import { createZipCommand } from "./zip-cmd";

export { defaultArchivePath, defaultDestDir, parseJobs } from "./defaults";

// Builds a fresh program; option values live on the returned instance only.
export function createProgram(): Command {
	return new Command()
		.name("parallel-zip")
		.description("Parallel zip archiver")
		.version("0.1.0")
		.addCommand(createZipCommand())
		.addCommand(createUnzipCommand());
}
