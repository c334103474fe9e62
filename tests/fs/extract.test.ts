import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { extractAll, extractMember, loadArchive } from "../../src/fs";
import { Archive } from "../../src/web";
import {
	BSD_ARCHIVE,
	DEB_PACKAGE,
	FIXTURE_DATE,
	GNU_ARCHIVE,
	MEMBER_CONTENT,
	MEMBER_NAMES,
} from "../web/fixtures";

describe("extract", () => {
	let tmpDir: string;

	beforeEach(async () => {
		tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "ar-kit-extract-test-"));
	});

	afterEach(async () => {
		await fs.rm(tmpDir, { recursive: true, force: true });
	});

	it.each([
		["GNU", GNU_ARCHIVE],
		["BSD", BSD_ARCHIVE],
	])("extracts every member of a %s archive", async (_, fixture) => {
		const destDir = path.join(tmpDir, "out");
		const archive = await loadArchive(fixture);

		try {
			const written = await extractAll(archive, destDir);
			expect(written).toHaveLength(5);
		} finally {
			await archive.close();
		}

		expect((await fs.readdir(destDir)).sort()).toEqual(MEMBER_NAMES);
		for (const name of MEMBER_NAMES) {
			expect(await fs.readFile(path.join(destDir, name), "utf8")).toBe(
				MEMBER_CONTENT[name],
			);
		}
	});

	it("applies the member mode and modification time", async () => {
		const archive = await loadArchive(GNU_ARCHIVE);
		const before = Date.now();

		try {
			const outPath = await extractMember(archive, archive.get("alpha.o"), tmpDir);
			expect(outPath).toBe(path.join(tmpDir, "alpha.o"));

			const stat = await fs.stat(outPath);
			expect(stat.mode & 0o777).toBe(0o644);
			expect(Math.floor(stat.mtimeMs / 1000)).toBe(FIXTURE_DATE);
			expect(stat.atimeMs).toBeGreaterThanOrEqual(before - 1000);
		} finally {
			await archive.close();
		}
	});

	it("overrides the file mode", async () => {
		const archive = await loadArchive(DEB_PACKAGE);

		try {
			const outPath = await extractMember(
				archive,
				archive.get("debian-binary"),
				tmpDir,
				{ fmode: 0o600 },
			);
			expect((await fs.stat(outPath)).mode & 0o777).toBe(0o600);
			expect(await fs.readFile(outPath, "utf8")).toBe("2.0\n");
		} finally {
			await archive.close();
		}
	});

	it("filters members", async () => {
		const archive = await loadArchive(DEB_PACKAGE);

		try {
			await extractAll(archive, tmpDir, {
				filter: (member) => member.filename.startsWith("data.tar"),
			});
		} finally {
			await archive.close();
		}

		expect(await fs.readdir(tmpDir)).toEqual(["data.tar.xz"]);
	});

	it("creates directories for nested names", async () => {
		const archive = new Archive({ format: "bsd" });
		archive.addContent("include/sub/header.h", "#pragma once\n");

		const [outPath] = await extractAll(archive, tmpDir);

		expect(outPath).toBe(path.join(tmpDir, "include", "sub", "header.h"));
		expect(await fs.readFile(outPath, "utf8")).toBe("#pragma once\n");
	});

	it("refuses names that escape the destination", async () => {
		const archive = new Archive({ format: "bsd" });
		archive.addContent("../escape.o", "x");
		const destDir = path.join(tmpDir, "out");

		await expect(extractAll(archive, destDir)).rejects.toThrow(
			'Path traversal attempt detected for member "../escape.o".',
		);
		await expect(fs.access(path.join(tmpDir, "escape.o"))).rejects.toThrow();
	});

	it("refuses to write through a symlink leaving the destination", async () => {
		const outside = path.join(tmpDir, "outside");
		const destDir = path.join(tmpDir, "out");
		await fs.mkdir(outside);
		await fs.mkdir(destDir);
		await fs.symlink(outside, path.join(destDir, "link"));

		const archive = new Archive({ format: "bsd" });
		archive.addContent("link/planted.o", "x");

		await expect(extractAll(archive, destDir)).rejects.toThrow(
			/symlink ".*link" points outside the extraction directory/,
		);
		expect(await fs.readdir(outside)).toEqual([]);
	});
});
