import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		// Some CLI tests change the working directory, which worker threads do not allow.
		pool: "forks",
		exclude: ["**/node_modules/**", "**/dist/**"],
		coverage: {
			exclude: ["**/node_modules/**", "**/dist/**", "**/tests/**"],
		},
	},
});
