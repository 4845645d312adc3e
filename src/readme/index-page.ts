import path from "node:path";
import {
	GENERATED_MARKER,
	generateIndexHtml,
} from "../templates/index.js";
import type {
	IndexEntry,
	ProcessedAddon,
	RepoContext,
} from "../types/index.js";
import { WriteFailedError } from "../utils/errors.js";
import { fileExists, readTextFile, writeFile } from "../utils/fs.js";
import { README_FILENAME } from "./compose.js";

export const INDEX_FILENAME = "index.html";

export function indexEntries(processed: ProcessedAddon[]): IndexEntry[] {
	return [...processed]
		.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
		.map((addon) => ({
			name: addon.name,
			title: addon.title,
			href: `${encodeURIComponent(addon.name)}/${README_FILENAME}`,
		}));
}

export function renderIndexPage(
	processed: ProcessedAddon[],
	context: RepoContext,
): string {
	return generateIndexHtml(indexEntries(processed), context);
}

/**
 * An index.html without the generator marker was written by hand.
 */
async function isHandWritten(filePath: string): Promise<boolean> {
	if (!(await fileExists(filePath))) {
		return false;
	}
	const existing = await readTextFile(filePath);
	return !existing.includes(GENERATED_MARKER);
}

/**
 * Write index.html at `rootDir` linking every processed addon's README.
 * Returns the path written, or null when a hand-written index is in the way.
 */
export async function writeIndexPage(
	rootDir: string,
	processed: ProcessedAddon[],
	context: RepoContext,
): Promise<string | null> {
	const filePath = path.join(rootDir, INDEX_FILENAME);
	if (await isHandWritten(filePath)) {
		return null;
	}
	try {
		await writeFile(filePath, renderIndexPage(processed, context));
	} catch (error) {
		throw new WriteFailedError(filePath, error);
	}
	return filePath;
}
