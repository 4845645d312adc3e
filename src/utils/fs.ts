import path from "node:path";
import fs from "fs-extra";

export async function ensureDir(dirPath: string): Promise<void> {
	await fs.ensureDir(dirPath);
}

export async function writeFile(
	filePath: string,
	content: string,
): Promise<void> {
	await fs.ensureDir(path.dirname(filePath));
	await fs.writeFile(filePath, content, "utf-8");
}

export async function readTextFile(filePath: string): Promise<string> {
	return await fs.readFile(filePath, "utf-8");
}

export async function fileExists(filePath: string): Promise<boolean> {
	return await fs.pathExists(filePath);
}

export async function isDirectory(dirPath: string): Promise<boolean> {
	if (!(await fs.pathExists(dirPath))) {
		return false;
	}
	const stat = await fs.stat(dirPath);
	return stat.isDirectory();
}

/**
 * Names of the direct child directories of `dirPath` (symlinks followed),
 * hidden ones excluded, sorted so that output does not depend on the
 * filesystem's listing order.
 */
export async function listSubdirectories(dirPath: string): Promise<string[]> {
	const entries = await fs.readdir(dirPath, { withFileTypes: true });
	const names: string[] = [];
	for (const entry of entries) {
		if (entry.name.startsWith(".")) continue;
		// Symlinked folders count when their target is a directory
		if (
			entry.isDirectory() ||
			(entry.isSymbolicLink() &&
				(await isDirectory(path.join(dirPath, entry.name))))
		) {
			names.push(entry.name);
		}
	}
	return names.sort();
}
