import type { Badge } from "../../types/index.js";

export const GENERATED_MARKER = "generated by gen-readme";

export interface ReadmeSection {
	heading: string;
	content: string;
}

export interface AddonReadmeInput {
	title: string;
	badges: Badge[];
	toc: boolean;
	sections: ReadmeSection[];
}

function overlined(title: string): string {
	const bar = "=".repeat(title.length);
	return `${bar}
${title}
${bar}`;
}

function underlined(heading: string): string {
	return `${heading}
${"=".repeat(heading.length)}`;
}

function badgeDefinitions(badges: Badge[]): string {
	return badges
		.map(
			(badge, index) => `.. |badge${index + 1}| image:: ${badge.image}
    :target: ${badge.target}
    :alt: ${badge.alt}`,
		)
		.join("\n");
}

function badgeLine(badges: Badge[]): string {
	return badges.map((_, index) => `|badge${index + 1}|`).join(" ");
}

export function generateAddonReadme(input: AddonReadmeInput): string {
	const blocks = [
		overlined(input.title),
		`..
   !! This file is ${GENERATED_MARKER}, do not edit it by hand. !!
   !! Edit the fragments in the readme/ folder and run it again.  !!`,
	];

	if (input.badges.length > 0) {
		blocks.push(badgeDefinitions(input.badges), badgeLine(input.badges));
	}

	if (input.toc) {
		blocks.push(`**Table of contents**

.. contents::
   :local:`);
	}

	for (const section of input.sections) {
		blocks.push(underlined(section.heading), section.content);
	}

	return `${blocks.join("\n\n")}\n`;
}
