import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { text } from "node:stream/consumers";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PrepareError, TraversalError, WriteError } from "../../src/errors";
import { packZip } from "../../src/fs/pack";
import { openZip } from "../../src/zip/reader";

async function entryNames(zipPath: string): Promise<string[]> {
	const zip = await openZip(zipPath);
	try {
		return zip.entries.map((entry) => entry.name);
	} finally {
		await zip.close();
	}
}

describe("packZip", () => {
	let tmpDir: string;
	let src: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "parallel-zip-pack-test-"));
		src = path.join(tmpDir, "src");
		await fs.mkdir(path.join(src, "b", "inner"), { recursive: true });
		await fs.mkdir(path.join(src, "empty"));
		await fs.writeFile(path.join(src, "a.txt"), "alpha");
		await fs.writeFile(path.join(src, "b-c.txt"), "dash");
		await fs.writeFile(path.join(src, "b", "c.txt"), "slash");
		await fs.writeFile(path.join(src, "b", "inner", "d.txt"), "deep");
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it("stores a directory under its own name in sorted walk order", async () => {
		const zipPath = path.join(tmpDir, "src.zip");
		await packZip(src, zipPath);

		expect(await entryNames(zipPath)).toEqual([
			"src/a.txt",
			"src/b/",
			"src/b-c.txt",
			"src/b/c.txt",
			"src/b/inner/",
			"src/b/inner/d.txt",
			"src/empty/",
		]);
	});

	it("keeps the same entry order whatever the worker count", async () => {
		const expected = [
			"src/a.txt",
			"src/b/",
			"src/b-c.txt",
			"src/b/c.txt",
			"src/b/inner/",
			"src/b/inner/d.txt",
			"src/empty/",
		];

		for (const concurrency of [1, 2, 7, 32]) {
			const zipPath = path.join(tmpDir, `src-${concurrency}.zip`);
			await packZip(src, zipPath, { concurrency });
			expect(await entryNames(zipPath)).toEqual(expected);
		}
	});

	it("produces byte-identical archives for an unchanged tree", async () => {
		const first = path.join(tmpDir, "first.zip");
		const second = path.join(tmpDir, "second.zip");

		await packZip(src, first, { concurrency: 4 });
		await packZip(src, second, { concurrency: 3 });

		const [a, b] = await Promise.all([fs.readFile(first), fs.readFile(second)]);
		expect(a.equals(b)).toBe(true);
	});

	it("packs a single file as one entry named by its base name", async () => {
		const file = path.join(src, "b", "inner", "d.txt");
		const zipPath = path.join(tmpDir, "d.zip");

		await packZip(file, zipPath);

		const zip = await openZip(zipPath);
		try {
			expect(zip.entries.map((entry) => entry.name)).toEqual(["d.txt"]);
			expect(await text(await zip.entries[0].open())).toBe("deep");
		} finally {
			await zip.close();
		}
	});

	it("creates missing parent directories of the archive", async () => {
		const zipPath = path.join(tmpDir, "out", "nested", "src.zip");

		await packZip(src, zipPath);

		expect((await fs.stat(zipPath)).isFile()).toBe(true);
	});

	it("packs an empty directory as an empty archive", async () => {
		const zipPath = path.join(tmpDir, "empty.zip");

		await packZip(path.join(src, "empty"), zipPath);

		expect(await entryNames(zipPath)).toEqual([]);
	});

	it("leaves filtered paths out", async () => {
		const zipPath = path.join(tmpDir, "filtered.zip");

		await packZip(src, zipPath, {
			filter: (_, dirent) => dirent.name !== "b",
		});

		expect(await entryNames(zipPath)).toEqual([
			"src/a.txt",
			"src/b-c.txt",
			"src/empty/",
		]);
	});

	it("stores the content of a symlinked file", async () => {
		await fs.symlink(path.join(src, "a.txt"), path.join(src, "z-link.txt"));
		const zipPath = path.join(tmpDir, "links.zip");

		await packZip(src, zipPath);

		const zip = await openZip(zipPath);
		try {
			const link = zip.entries.find((entry) => entry.name === "src/z-link.txt");
			expect(link?.isDirectory()).toBe(false);
			expect(link && (await text(await link.open()))).toBe("alpha");
		} finally {
			await zip.close();
		}
	});

	it("fails with a TraversalError before creating the archive when the source is missing", async () => {
		const zipPath = path.join(tmpDir, "missing.zip");

		await expect(packZip(path.join(tmpDir, "nope"), zipPath)).rejects.toBeInstanceOf(
			TraversalError,
		);
		await expect(fs.access(zipPath)).rejects.toThrow();
	});

	it("reports the earliest failing entry in walk order", async () => {
		// Dangling symlinks are walked but cannot be stat'ed.
		await fs.symlink(path.join(tmpDir, "nowhere-1"), path.join(src, "b", "broken"));
		await fs.symlink(path.join(tmpDir, "nowhere-2"), path.join(src, "a-broken"));

		const run = packZip(src, path.join(tmpDir, "broken.zip"), { concurrency: 4 });

		await expect(run).rejects.toBeInstanceOf(PrepareError);
		await expect(run).rejects.toMatchObject({
			code: "PREPARE_FAILED",
			path: path.join(src, "a-broken"),
		});
	});

	it("fails with a WriteError when the archive cannot be created", async () => {
		const blocker = path.join(tmpDir, "blocker");
		await fs.writeFile(blocker, "");

		await expect(
			packZip(src, path.join(blocker, "src.zip")),
		).rejects.toBeInstanceOf(WriteError);
	});

	it("rejects a non-positive worker count", async () => {
		await expect(
			packZip(src, path.join(tmpDir, "x.zip"), { concurrency: 0 }),
		).rejects.toThrow("Concurrency must be a positive integer, got 0.");
	});
});
