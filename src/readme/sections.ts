/**
 * Documentation sections, in the order they appear in every generated
 * README. Each section is read from `readme/<name>.rst`.
 */
export const FRAGMENT_SECTIONS = [
	{ name: "DESCRIPTION", heading: "Description" },
	{ name: "INSTALL", heading: "Installation" },
	{ name: "CONFIGURE", heading: "Configuration" },
	{ name: "USAGE", heading: "Usage" },
	{ name: "ROADMAP", heading: "Known issues / Roadmap" },
	{ name: "DEVELOP", heading: "Development" },
	{ name: "CONTRIBUTORS", heading: "Contributors" },
	{ name: "CREDITS", heading: "Credits" },
	{ name: "HISTORY", heading: "Changelog" },
] as const;

export type FragmentName = (typeof FRAGMENT_SECTIONS)[number]["name"];

export const FRAGMENTS_DIR = "readme";
export const FRAGMENT_EXTENSION = ".rst";

export function fragmentFilename(name: FragmentName): string {
	return `${name}${FRAGMENT_EXTENSION}`;
}
