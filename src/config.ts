import path from "node:path";
import type { RunConfig } from "./types/index.js";
import { loadConfigFile } from "./utils/config-resolver.js";
import { MissingRequiredOptionError } from "./utils/errors.js";

export interface GenerateOptions {
	orgName?: string;
	repoName?: string;
	branch?: string;
	addonsDir?: string;
	genHtml?: boolean;
	installableByDefault?: boolean;
	initFragments?: boolean;
	config?: string;
}

function required(value: string | undefined, flag: string): string {
	if (value === undefined || value === "") {
		throw new MissingRequiredOptionError(flag);
	}
	return value;
}

/**
 * Resolve run settings from CLI flags and the config file.
 * Priority: CLI flags > config file > defaults
 *
 * A relative addonsDir from the config file is taken relative to that file.
 */
export async function resolveRunConfig(
	options: GenerateOptions,
	files: string[] = [],
	cwd: string = process.cwd(),
): Promise<RunConfig> {
	const loaded = await loadConfigFile(options.config, cwd);
	const config = loaded.config;
	const configDir = loaded.path ? path.dirname(loaded.path) : cwd;

	const orgName = required(options.orgName ?? config.orgName, "--org-name");
	const repoName = required(options.repoName ?? config.repoName, "--repo-name");
	const branch = required(options.branch ?? config.branch, "--branch");
	const addonsDir = options.addonsDir
		? path.resolve(cwd, options.addonsDir)
		: path.resolve(configDir, required(config.addonsDir, "--addons-dir"));

	return {
		orgName,
		repoName,
		branch,
		addonsDir,
		genHtml: options.genHtml ?? config.genHtml ?? false,
		installableByDefault:
			options.installableByDefault ?? config.installableByDefault ?? true,
		initFragments: options.initFragments ?? config.initFragments ?? false,
		files,
	};
}
