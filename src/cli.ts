#!/usr/bin/env node

// CLI entry point.
import { createProgram } from "./commands";

createProgram()
	.parseAsync()
	.catch((error: unknown) => {
		const message = error instanceof Error ? error.message : String(error);
		console.error(`Error: ${message}`);
		process.exit(1);
	});
