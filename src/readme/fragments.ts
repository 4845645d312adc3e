import path from "node:path";
import { ensureDir, fileExists, readTextFile, writeFile } from "../utils/fs.js";
import {
	FRAGMENT_SECTIONS,
	FRAGMENTS_DIR,
	type FragmentName,
	fragmentFilename,
} from "./sections.js";

export interface Fragment {
	name: FragmentName;
	heading: string;
	path: string;
	content: string;
}

export function fragmentPath(addonDir: string, name: FragmentName): string {
	return path.join(addonDir, FRAGMENTS_DIR, fragmentFilename(name));
}

/**
 * Read the fragments of the addon at `addonDir` in section order. Missing
 * fragment files, and ones holding only whitespace, are left out.
 */
export async function collectFragments(addonDir: string): Promise<Fragment[]> {
	const fragments: Fragment[] = [];
	for (const section of FRAGMENT_SECTIONS) {
		const filePath = fragmentPath(addonDir, section.name);
		if (!(await fileExists(filePath))) {
			continue;
		}
		const content = await readTextFile(filePath);
		if (content.trim().length === 0) {
			continue;
		}
		fragments.push({
			name: section.name,
			heading: section.heading,
			path: filePath,
			content,
		});
	}
	return fragments;
}

/**
 * Create the `readme/` folder and an empty file for every missing fragment.
 * Returns the paths created.
 */
export async function scaffoldFragments(addonDir: string): Promise<string[]> {
	await ensureDir(path.join(addonDir, FRAGMENTS_DIR));
	const created: string[] = [];
	for (const section of FRAGMENT_SECTIONS) {
		const filePath = fragmentPath(addonDir, section.name);
		if (!(await fileExists(filePath))) {
			await writeFile(filePath, "");
			created.push(filePath);
		}
	}
	return created;
}
