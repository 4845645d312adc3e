import path from "node:path";
import type {
	Addon,
	DiscoveryOptions,
	ManifestFile,
} from "../types/index.js";
import { DirectoryNotFoundError, errorMessage } from "../utils/errors.js";
import { isDirectory, listSubdirectories } from "../utils/fs.js";
import { readManifest } from "./manifest.js";

export const DEFAULT_DISCOVERY_OPTIONS: DiscoveryOptions = {
	installableByDefault: true,
};

/**
 * Every direct, non-hidden subdirectory of `rootDir` as an addon, with its
 * installable flag resolved. Sorted by name.
 *
 * An addon without a descriptor, or whose descriptor does not declare
 * `installable`, takes `options.installableByDefault`. A descriptor that
 * cannot be read is reported on the addon through `manifestError`.
 */
export async function scanAddons(
	rootDir: string,
	options: DiscoveryOptions = DEFAULT_DISCOVERY_OPTIONS,
): Promise<Addon[]> {
	const root = path.resolve(rootDir);
	if (!(await isDirectory(root))) {
		throw new DirectoryNotFoundError(root);
	}

	const addons: Addon[] = [];
	for (const name of await listSubdirectories(root)) {
		const dir = path.join(root, name);
		let manifestFile: ManifestFile | null = null;
		let manifestError: string | null = null;
		try {
			manifestFile = await readManifest(dir);
		} catch (error) {
			manifestError = errorMessage(error);
		}
		const manifest = manifestFile?.manifest ?? {};
		addons.push({
			name,
			dir,
			manifestPath: manifestFile?.path ?? null,
			manifest,
			manifestMalformed: manifestFile?.malformed ?? false,
			manifestError,
			installable: manifest.installable ?? options.installableByDefault,
		});
	}
	return addons;
}

export async function findAddons(
	rootDir: string,
	options: DiscoveryOptions = DEFAULT_DISCOVERY_OPTIONS,
): Promise<Addon[]> {
	const addons = await scanAddons(rootDir, options);
	return addons.filter(
		(addon) => addon.installable && addon.manifestError === null,
	);
}

function containsPath(dir: string, target: string): boolean {
	const relative = path.relative(dir, target);
	return (
		relative === "" ||
		(!relative.startsWith("..") && !path.isAbsolute(relative))
	);
}

/**
 * Keep the addons touched by `files` (paths relative to `cwd`, as handed over
 * by a pre-commit hook). An empty list selects every addon.
 */
export function selectAddons(
	addons: Addon[],
	files: string[],
	cwd: string = process.cwd(),
): Addon[] {
	if (files.length === 0) {
		return addons;
	}
	const targets = files.map((file) => path.resolve(cwd, file));
	return addons.filter((addon) =>
		targets.some((target) => containsPath(addon.dir, target)),
	);
}
