import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type Archive, type ArchiveMember, noopLogger, writeStream } from "../web/index";
import { FileSink } from "./file";
import { resolveMemberPath, validatePath } from "./path";
import type { ExtractOptionsFS } from "./types";

// Permission bits, without the file type.
const PERMISSION_MASK = 0o7777;

async function writeMember(
	archive: Archive,
	member: ArchiveMember,
	root: string,
	validatedDirs: Set<string>,
	options: ExtractOptionsFS,
): Promise<string> {
	const logger = options.logger ?? noopLogger;
	const outPath = resolveMemberPath(root, member.filename);
	const parentDir = path.dirname(outPath);

	await validatePath(parentDir, root, validatedDirs);
	await fs.mkdir(parentDir, { recursive: true });

	const sink = await FileSink.open(outPath);
	try {
		await writeStream(archive.read(member), sink);
	} finally {
		await sink.close();
	}

	await fs.chmod(outPath, options.fmode ?? (member.mode & PERMISSION_MASK));

	if (options.preserveOwner ?? true) {
		try {
			await fs.chown(outPath, member.uid, member.gid);
		} catch (error) {
			logger.debug("Could not change owner", {
				path: outPath,
				uid: member.uid,
				gid: member.gid,
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}

	await fs.utimes(outPath, new Date(), member.date);

	logger.debug("Extracted member", {
		filename: member.filename,
		path: outPath,
		size: member.filesize,
	});

	return outPath;
}

/**
 * Extract one member into `directory`, creating intermediate directories.
 *
 * The written file gets the member's permission bits, owner (when allowed) and
 * modification time; its access time is set to now. Returns the written path.
 *
 * @throws {Error} if the member name would land outside `directory`.
 */
export async function extractMember(
	archive: Archive,
	member: ArchiveMember,
	directory: string,
	options: ExtractOptionsFS = {},
): Promise<string> {
	const root = path.resolve(directory);
	await fs.mkdir(root, { recursive: true });

	return writeMember(archive, member, root, new Set([root]), options);
}

/**
 * Extract every member, in archive order, into `directory`. A later member
 * overwrites an earlier one of the same name.
 *
 * @example
 * ```typescript
 * import { extractAll, loadArchive } from 'ar-kit/fs';
 *
 * const archive = await loadArchive('./package.deb');
 * try {
 *   await extractAll(archive, './out', {
 *     filter: (member) => member.filename.startsWith('data.tar'),
 *   });
 * } finally {
 *   await archive.close();
 * }
 * ```
 */
export async function extractAll(
	archive: Archive,
	directory: string,
	options: ExtractOptionsFS = {},
): Promise<string[]> {
	const root = path.resolve(directory);
	const validatedDirs = new Set<string>([root]);
	const written: string[] = [];

	await fs.mkdir(root, { recursive: true });

	for (const member of archive) {
		if (options.filter && !options.filter(member)) continue;
		written.push(
			await writeMember(archive, member, root, validatedDirs, options),
		);
	}

	return written;
}
