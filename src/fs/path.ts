import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Resolves a member filename to a path inside `root`.
 *
 * @throws {Error} if the name is absolute, empty, or escapes `root`.
 */
export function resolveMemberPath(root: string, filename: string): string {
	if (path.isAbsolute(filename)) {
		throw new Error(
			`Path traversal attempt detected for member "${filename}".`,
		);
	}

	const outPath = path.join(root, filename);
	if (outPath === root) {
		throw new Error(`Member name "${filename}" does not name a file.`);
	}

	validateBounds(
		outPath,
		root,
		`Path traversal attempt detected for member "${filename}".`,
	);

	return outPath;
}

/**
 * Recursively validates that each component of `currentPath` below `root` is
 * missing, a directory, or a symlink that stays inside `root`. Validated
 * directories are added to `cache`.
 */
export async function validatePath(
	currentPath: string,
	root: string,
	cache: Set<string>,
): Promise<void> {
	if (currentPath === root || cache.has(currentPath)) return;

	let stat: Stats;
	try {
		stat = await fs.lstat(currentPath);
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			// Will be created; only the parent needs checking.
			await validatePath(path.dirname(currentPath), root, cache);
			cache.add(currentPath);
			return;
		}

		throw err;
	}

	if (stat.isSymbolicLink()) {
		validateBounds(
			await fs.realpath(currentPath),
			root,
			`Path traversal attempt detected: symlink "${currentPath}" points outside the extraction directory.`,
		);
	} else if (!stat.isDirectory()) {
		throw new Error(
			`Path traversal attempt detected: "${currentPath}" is not a directory.`,
		);
	}

	await validatePath(path.dirname(currentPath), root, cache);
	cache.add(currentPath);
}

export function validateBounds(
	targetPath: string,
	root: string,
	errorMessage: string,
): void {
	if (!(targetPath === root || targetPath.startsWith(root + path.sep))) {
		throw new Error(errorMessage);
	}
}
