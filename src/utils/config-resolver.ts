import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import type { GenReadmeConfig } from "../types/index.js";
import { ConfigError } from "./errors.js";

export const CONFIG_FILENAME = "gen-readme.json";

export interface LoadedConfig {
	path: string | null;
	config: GenReadmeConfig;
}

const STRING_KEYS = ["orgName", "repoName", "branch", "addonsDir"] as const;
const BOOLEAN_KEYS = ["genHtml", "installableByDefault", "initFragments"] as const;

/**
 * Resolve config file path using the following priority:
 * 1. --config <path> (explicit path, must exist)
 * 2. ./gen-readme.json (current directory)
 *
 * Returns null when neither applies.
 */
export async function resolveConfigPath(
	configPath: string | undefined,
	cwd: string = process.cwd(),
): Promise<string | null> {
	if (configPath) {
		const resolved = configPath.startsWith("~")
			? path.join(os.homedir(), configPath.slice(1))
			: path.resolve(cwd, configPath);
		if (!(await fs.pathExists(resolved))) {
			throw new ConfigError(`Config file not found: ${resolved}`);
		}
		return resolved;
	}

	const cwdConfig = path.join(cwd, CONFIG_FILENAME);
	if (await fs.pathExists(cwdConfig)) {
		return cwdConfig;
	}
	return null;
}

export function validateConfig(
	data: unknown,
	source: string,
): GenReadmeConfig {
	if (typeof data !== "object" || data === null || Array.isArray(data)) {
		throw new ConfigError(`Config file must contain a JSON object: ${source}`);
	}

	const config: GenReadmeConfig = {};
	for (const key of STRING_KEYS) {
		const value: unknown = Reflect.get(data, key);
		if (value === undefined) continue;
		if (typeof value !== "string") {
			throw new ConfigError(`"${key}" must be a string in ${source}`);
		}
		config[key] = value;
	}
	for (const key of BOOLEAN_KEYS) {
		const value: unknown = Reflect.get(data, key);
		if (value === undefined) continue;
		if (typeof value !== "boolean") {
			throw new ConfigError(`"${key}" must be a boolean in ${source}`);
		}
		config[key] = value;
	}
	return config;
}

/**
 * Load gen-readme.json, or an empty config when there is none.
 */
export async function loadConfigFile(
	configPath: string | undefined,
	cwd: string = process.cwd(),
): Promise<LoadedConfig> {
	const resolvedPath = await resolveConfigPath(configPath, cwd);
	if (!resolvedPath) {
		return { path: null, config: {} };
	}

	let data: unknown;
	try {
		data = await fs.readJson(resolvedPath);
	} catch {
		throw new ConfigError(`Failed to parse config file: ${resolvedPath}`);
	}
	return { path: resolvedPath, config: validateConfig(data, resolvedPath) };
}
