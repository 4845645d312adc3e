import path from "node:path";
import { generateAddonReadme } from "../templates/index.js";
import type { Addon, RepoContext } from "../types/index.js";
import { WriteFailedError } from "../utils/errors.js";
import { writeFile } from "../utils/fs.js";
import { buildBadges } from "./badges.js";
import type { Fragment } from "./fragments.js";

export const README_FILENAME = "README.rst";

// Fragments longer than this in total get a table of contents
export const TOC_THRESHOLD = 1000;

const IMAGE_DIRECTIVE_RE = /^(.*\.\..*\s(?:figure|image)::\s+)(\S.*?)(\s*)$/;

export interface ComposeInput {
	addon: Addon;
	fragments: Fragment[];
	context: RepoContext;
}

/**
 * Base URL of the raw files of an addon, used to make fragment images
 * resolvable outside the repository.
 */
export function moduleUrl(context: RepoContext, addonName: string): string {
	const { orgName, repoName, branch } = context;
	return `https://raw.githubusercontent.com/${orgName}/${repoName}/${branch}/${addonName}/`;
}

/**
 * Point relative `image::` and `figure::` targets at `baseUrl`. Targets are
 * written relative to the readme/ folder, so `../` segments are dropped.
 */
export function rewriteImagePaths(content: string, baseUrl: string): string {
	return content
		.split("\n")
		.map((line) => {
			const match = IMAGE_DIRECTIVE_RE.exec(line);
			if (!match) {
				return line;
			}
			const [, directive, target, trailing] = match;
			if (target.startsWith("http")) {
				return line;
			}
			const relative = target.replace(/\.\.\//g, "").replace(/^\/+/, "");
			return `${directive}${new URL(relative, baseUrl).href}${trailing}`;
		})
		.join("\n");
}

export function readmeTitle(addon: Addon): string {
	return addon.manifest.name?.trim() || addon.name;
}

export function readmePath(addon: Addon): string {
	return path.join(addon.dir, README_FILENAME);
}

export function composeReadme({
	addon,
	fragments,
	context,
}: ComposeInput): string {
	const baseUrl = moduleUrl(context, addon.name);
	const size = fragments.reduce(
		(total, fragment) => total + fragment.content.length,
		0,
	);

	return generateAddonReadme({
		title: readmeTitle(addon),
		badges: buildBadges(addon.manifest, context, addon.name),
		toc: size > TOC_THRESHOLD,
		sections: fragments.map((fragment) => ({
			heading: fragment.heading,
			content: rewriteImagePaths(fragment.content, baseUrl).trimEnd(),
		})),
	});
}

/**
 * Write `content` to the addon's README.rst, replacing any previous one.
 */
export async function writeReadme(
	addon: Addon,
	content: string,
): Promise<string> {
	const filePath = readmePath(addon);
	try {
		await writeFile(filePath, content);
	} catch (error) {
		throw new WriteFailedError(filePath, error);
	}
	return filePath;
}
