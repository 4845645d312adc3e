import type { AddonManifest, Badge, RepoContext } from "../types/index.js";

const DEVELOPMENT_STATUS_URL =
	"https://odoo-community.org/page/development-status";

export const DEFAULT_DEVELOPMENT_STATUS = "Beta";

// Keyed by lower-cased development status
export const DEVELOPMENT_STATUS_BADGES: Record<string, Badge> = {
	mature: {
		image: "https://img.shields.io/badge/maturity-Mature-brightgreen.png",
		target: DEVELOPMENT_STATUS_URL,
		alt: "Mature",
	},
	"production/stable": {
		image: "https://img.shields.io/badge/maturity-Production%2FStable-green.png",
		target: DEVELOPMENT_STATUS_URL,
		alt: "Production/Stable",
	},
	beta: {
		image: "https://img.shields.io/badge/maturity-Beta-yellow.png",
		target: DEVELOPMENT_STATUS_URL,
		alt: "Beta",
	},
	alpha: {
		image: "https://img.shields.io/badge/maturity-Alpha-red.png",
		target: DEVELOPMENT_STATUS_URL,
		alt: "Alpha",
	},
};

export const LICENSE_BADGES: Record<string, Badge> = {
	"AGPL-3": {
		image: "https://img.shields.io/badge/licence-AGPL--3-blue.png",
		target: "http://www.gnu.org/licenses/agpl-3.0-standalone.html",
		alt: "License: AGPL-3",
	},
	"LGPL-3": {
		image: "https://img.shields.io/badge/licence-LGPL--3-blue.png",
		target: "http://www.gnu.org/licenses/lgpl-3.0-standalone.html",
		alt: "License: LGPL-3",
	},
	"GPL-3": {
		image: "https://img.shields.io/badge/licence-GPL--3-blue.png",
		target: "http://www.gnu.org/licenses/gpl-3.0-standalone.html",
		alt: "License: GPL-3",
	},
	"OPL-1": {
		image: "https://img.shields.io/badge/licence-OPL--1-blue.png",
		target: "https://www.tldrlegal.com/license/open-public-license-v1-0-opl-1-0",
		alt: "License: OPL-1",
	},
	"OEEL-1": {
		image: "https://img.shields.io/badge/licence-OEEL--1-blue.png",
		target: "https://www.tldrlegal.com/license/open-public-license-v1-0-opl-1-0",
		alt: "License: OEEL-1",
	},
};

export const PRE_COMMIT_BADGE: Badge = {
	image: "https://img.shields.io/badge/pre_commit-passed-green",
	target: "https://pre-commit.com/",
	alt: "Pre-Commit",
};

function lookupBadge(
	table: Record<string, Badge>,
	key: string | undefined,
): Badge | undefined {
	return key !== undefined && Object.hasOwn(table, key) ? table[key] : undefined;
}

// shields.io escapes "-" as "--" and "_" as "__" inside badge text
function shieldsText(text: string): string {
	return encodeURIComponent(text.replace(/-/g, "--").replace(/_/g, "__"));
}

export function repositoryBadge(
	context: RepoContext,
	addonName: string,
): Badge {
	const { orgName, repoName, branch } = context;
	return {
		image: `https://img.shields.io/badge/github-${shieldsText(`${orgName}/${repoName}`)}-lightgray.png?logo=github`,
		target: `https://github.com/${orgName}/${repoName}/tree/${branch}/${addonName}`,
		alt: `${orgName}/${repoName}`,
	};
}

/**
 * Badges shown under an addon's title: development status, license,
 * pre-commit and a link to the addon in its repository.
 */
export function buildBadges(
	manifest: AddonManifest,
	context: RepoContext,
	addonName: string,
): Badge[] {
	const badges: Badge[] = [];

	const status = (
		manifest.developmentStatus ?? DEFAULT_DEVELOPMENT_STATUS
	).toLowerCase();
	const statusBadge = lookupBadge(DEVELOPMENT_STATUS_BADGES, status);
	if (statusBadge) {
		badges.push(statusBadge);
	}

	const licenseBadge = lookupBadge(LICENSE_BADGES, manifest.license);
	if (licenseBadge) {
		badges.push(licenseBadge);
	}

	badges.push(PRE_COMMIT_BADGE);
	badges.push(repositoryBadge(context, addonName));
	return badges;
}
