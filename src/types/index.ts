/**
 * Fields read from an addon's descriptor. Every field is optional: a missing
 * descriptor yields an empty manifest.
 */
export interface AddonManifest {
	name?: string;
	summary?: string;
	version?: string;
	license?: string;
	author?: string;
	website?: string;
	developmentStatus?: string;
	installable?: boolean;
}

export interface ManifestFile {
	path: string;
	manifest: AddonManifest;
	// Text did not parse as a literal mapping; fields were recovered by pattern
	malformed: boolean;
}

export interface Addon {
	name: string;
	dir: string;
	manifestPath: string | null;
	manifest: AddonManifest;
	manifestMalformed: boolean;
	// Descriptor exists but could not be read
	manifestError: string | null;
	installable: boolean;
}

export interface DiscoveryOptions {
	installableByDefault: boolean;
}

export interface RepoContext {
	orgName: string;
	repoName: string;
	branch: string;
}

export interface RunConfig extends RepoContext {
	addonsDir: string;
	genHtml: boolean;
	installableByDefault: boolean;
	initFragments: boolean;
	// Restrict the run to addons containing one of these paths (pre-commit mode)
	files: string[];
}

export interface ProcessedAddon {
	name: string;
	title: string;
	readmePath: string;
	sections: number;
}

export interface FailedAddon {
	name: string;
	error: string;
}

export interface RunSummary {
	processed: ProcessedAddon[];
	failed: FailedAddon[];
	notInstallable: string[];
	indexPath: string | null;
}

export interface Badge {
	image: string;
	target: string;
	alt: string;
}

export interface IndexEntry {
	name: string;
	title: string;
	href: string;
}

/**
 * Shape of gen-readme.json. Every key mirrors a CLI flag.
 */
export interface GenReadmeConfig {
	orgName?: string;
	repoName?: string;
	branch?: string;
	addonsDir?: string;
	genHtml?: boolean;
	installableByDefault?: boolean;
	initFragments?: boolean;
}
