import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Archive, type ArchiveMember, ArchiveError } from "../web/index";
import { FileSink, FileSource } from "./file";
import type { AddFileOptionsFS, ArchiveOptionsFS } from "./types";

/**
 * Create an empty archive that can read external file payloads from disk.
 *
 * @example
 * ```typescript
 * import { addFile, createArchive, saveArchive } from 'ar-kit/fs';
 *
 * const archive = createArchive({ format: 'gnu' });
 * await addFile(archive, './build/alpha.o');
 * await addFile(archive, './build/a_long_object_name.o');
 * await saveArchive(archive, './libdemo.a');
 * await archive.close();
 * ```
 */
export function createArchive(options: ArchiveOptionsFS = {}): Archive {
	return new Archive({
		...options,
		openFile: (filePath) => FileSource.open(filePath),
	});
}

/**
 * Open and load the archive at `archivePath`. The file stays open so member
 * payloads can be read; call {@link Archive.close} when done. If loading
 * fails, the file is closed before the error is rethrown.
 *
 * @example
 * ```typescript
 * const archive = await loadArchive('./libdemo.a');
 * try {
 *   for (const member of archive) console.log(member.filename, member.filesize);
 * } finally {
 *   await archive.close();
 * }
 * ```
 */
export async function loadArchive(
	archivePath: string,
	options: ArchiveOptionsFS = {},
): Promise<Archive> {
	const archive = createArchive(options);
	await archive.load(await FileSource.open(archivePath));
	return archive;
}

/**
 * Write `archive` to `archivePath`.
 *
 * The archive is written to a temporary file in the same directory and moved
 * into place once complete, so the file it was loaded from can be the
 * destination. Afterwards the archive reads its members from the new file.
 */
export async function saveArchive(
	archive: Archive,
	archivePath: string,
): Promise<void> {
	const target = path.resolve(archivePath);
	const temporary = path.join(
		path.dirname(target),
		`.${path.basename(target)}.${randomUUID()}.tmp`,
	);

	try {
		await archive.save(await FileSink.open(temporary));
		await fs.rename(temporary, target);
	} catch (error) {
		await fs.rm(temporary, { force: true });
		throw error;
	}
}

/**
 * Add the file at `filePath` as a new member. Metadata comes from `stat`
 * unless overridden; the payload is read from disk when the archive is saved.
 *
 * @throws {ArchiveError} `UNSUPPORTED_MEMBER` if the path is not a regular file.
 */
export async function addFile(
	archive: Archive,
	filePath: string,
	options: AddFileOptionsFS = {},
): Promise<ArchiveMember> {
	const resolved = path.resolve(filePath);
	const stat = await fs.stat(resolved);

	if (!stat.isFile()) {
		throw new ArchiveError(
			"UNSUPPORTED_MEMBER",
			`"${filePath}" is not a regular file.`,
			{ member: filePath },
		);
	}

	return archive.add({
		name: options.name ?? path.basename(resolved),
		date: options.date ?? Math.floor(stat.mtimeMs / 1000),
		uid: options.uid ?? stat.uid,
		gid: options.gid ?? stat.gid,
		mode: options.mode ?? stat.mode,
		size: stat.size,
		origin: { type: "file", path: resolved },
	});
}
