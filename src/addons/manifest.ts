import path from "node:path";
import YAML from "yaml";
import type { AddonManifest, ManifestFile } from "../types/index.js";
import { fileExists, readTextFile } from "../utils/fs.js";

/**
 * Descriptor file names, in lookup order. The first one present wins.
 */
export const MANIFEST_FILENAMES = [
	"__manifest__.py",
	"__openerp__.py",
	"manifest.json",
	"manifest.yaml",
	"manifest.yml",
] as const;

const STRING_FIELDS = {
	name: "name",
	summary: "summary",
	version: "version",
	license: "license",
	author: "author",
	website: "website",
	development_status: "developmentStatus",
} as const satisfies Record<string, keyof AddonManifest>;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringField(value: unknown): string | undefined {
	if (typeof value === "string") {
		return value;
	}
	// Some descriptors list authors
	if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
		return value.join(", ");
	}
	return undefined;
}

function toManifest(data: Record<string, unknown>): AddonManifest {
	const manifest: AddonManifest = {};
	for (const [key, field] of Object.entries(STRING_FIELDS)) {
		const value = toStringField(data[key]);
		if (value !== undefined) {
			manifest[field] = value;
		}
	}
	if (typeof data.installable === "boolean") {
		manifest.installable = data.installable;
	}
	return manifest;
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pull the known keys out of a descriptor that is not a valid literal
 * mapping, one key at a time.
 */
function recoverManifest(text: string): AddonManifest {
	// Commented-out entries must not win over live ones
	const content = text
		.split("\n")
		.filter((line) => !line.trimStart().startsWith("#"))
		.join("\n");
	const manifest: AddonManifest = {};
	for (const [key, field] of Object.entries(STRING_FIELDS)) {
		const match = new RegExp(
			`["']${escapeRegExp(key)}["']\\s*:\\s*(?:"([^"]*)"|'([^']*)')`,
		).exec(content);
		if (match) {
			manifest[field] = match[1] ?? match[2];
		}
	}
	const declarations = [
		...content.matchAll(/["']installable["']\s*:\s*(True|False|true|false)\b/g),
	];
	const installable = declarations.at(-1);
	if (installable) {
		manifest.installable = installable[1].toLowerCase() === "true";
	}
	return manifest;
}

/**
 * Parse descriptor text. Python dict literals, JSON and YAML mappings all read
 * as YAML flow or block mappings (`True`/`False` are core-schema booleans).
 */
export function parseManifest(content: string): {
	manifest: AddonManifest;
	malformed: boolean;
} {
	let data: unknown;
	try {
		data = YAML.parse(content, { logLevel: "error" });
	} catch {
		return { manifest: recoverManifest(content), malformed: true };
	}

	if (isRecord(data)) {
		return { manifest: toManifest(data), malformed: false };
	}
	return { manifest: recoverManifest(content), malformed: true };
}

/**
 * Read the descriptor of the addon at `addonDir`, or null when it has none.
 */
export async function readManifest(
	addonDir: string,
): Promise<ManifestFile | null> {
	for (const filename of MANIFEST_FILENAMES) {
		const manifestPath = path.join(addonDir, filename);
		if (await fileExists(manifestPath)) {
			const content = await readTextFile(manifestPath);
			return { path: manifestPath, ...parseManifest(content) };
		}
	}
	return null;
}
