import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	type TempDirectory,
	createTempDirectory,
} from "../../__tests__/helpers/temp-directory.js";
import { TEST_CONTEXT, createMockAddon } from "../../__tests__/mocks/addons.js";
import { WriteFailedError } from "../utils/errors.js";
import {
	composeReadme,
	moduleUrl,
	readmeTitle,
	rewriteImagePaths,
	writeReadme,
} from "./compose.js";
import type { Fragment } from "./fragments.js";

const HEADER = `========
my_addon
========

..
   !! This file is generated by gen-readme, do not edit it by hand. !!
   !! Edit the fragments in the readme/ folder and run it again.  !!

.. |badge1| image:: https://img.shields.io/badge/maturity-Beta-yellow.png
    :target: https://odoo-community.org/page/development-status
    :alt: Beta
.. |badge2| image:: https://img.shields.io/badge/pre_commit-passed-green
    :target: https://pre-commit.com/
    :alt: Pre-Commit
.. |badge3| image:: https://img.shields.io/badge/github-acme%2Ftools-lightgray.png?logo=github
    :target: https://github.com/acme/tools/tree/16.0/my_addon
    :alt: acme/tools

|badge1| |badge2| |badge3|
`;

function fragment(
	name: Fragment["name"],
	heading: string,
	content: string,
): Fragment {
	return { name, heading, path: `/repo/my_addon/readme/${name}.rst`, content };
}

describe("readme composition", () => {
	const addon = createMockAddon();

	describe("composeReadme", () => {
		it("should emit only the header when there are no fragments", () => {
			const readme = composeReadme({
				addon,
				fragments: [],
				context: TEST_CONTEXT,
			});
			expect(readme).toBe(HEADER);
		});

		it("should append each fragment under its heading", () => {
			const readme = composeReadme({
				addon,
				fragments: [
					fragment("DESCRIPTION", "Description", "Hello\n"),
					fragment("USAGE", "Usage", "Run it\n"),
				],
				context: TEST_CONTEXT,
			});

			expect(readme).toBe(`${HEADER}
Description
===========

Hello

Usage
=====

Run it
`);
		});

		it("should use the manifest name as title", () => {
			const readme = composeReadme({
				addon: createMockAddon({ manifest: { name: "Sale Extras" } }),
				fragments: [],
				context: TEST_CONTEXT,
			});
			expect(readme.startsWith("===========\nSale Extras\n===========\n")).toBe(
				true,
			);
		});

		it("should add a table of contents for long readmes", () => {
			const long = fragment("USAGE", "Usage", `${"x".repeat(1001)}\n`);
			const short = fragment("USAGE", "Usage", "Run it\n");

			const withToc = composeReadme({
				addon,
				fragments: [long],
				context: TEST_CONTEXT,
			});
			const withoutToc = composeReadme({
				addon,
				fragments: [short],
				context: TEST_CONTEXT,
			});

			expect(withToc).toContain(
				"|badge1| |badge2| |badge3|\n\n**Table of contents**\n\n.. contents::\n   :local:\n\nUsage\n=====\n",
			);
			expect(withoutToc).not.toContain(".. contents::");
		});

		it("should produce identical output for identical input", () => {
			const input = {
				addon,
				fragments: [fragment("CREDITS", "Credits", "Acme\n")],
				context: TEST_CONTEXT,
			};
			expect(composeReadme(input)).toBe(composeReadme(input));
		});
	});

	describe("rewriteImagePaths", () => {
		const baseUrl = moduleUrl(TEST_CONTEXT, "my_addon");

		it("should build the raw content URL of the addon", () => {
			expect(baseUrl).toBe(
				"https://raw.githubusercontent.com/acme/tools/16.0/my_addon/",
			);
		});

		it("should resolve relative image targets against the addon", () => {
			expect(
				rewriteImagePaths(".. image:: ../static/description/screen.png", baseUrl),
			).toBe(
				".. image:: https://raw.githubusercontent.com/acme/tools/16.0/my_addon/static/description/screen.png",
			);
		});

		it("should rewrite figures and substitution images", () => {
			const content = `Intro

.. figure:: ../static/img/flow.png
   :alt: Flow

.. |logo| image:: static/logo.png`;

			expect(rewriteImagePaths(content, baseUrl)).toBe(`Intro

.. figure:: https://raw.githubusercontent.com/acme/tools/16.0/my_addon/static/img/flow.png
   :alt: Flow

.. |logo| image:: https://raw.githubusercontent.com/acme/tools/16.0/my_addon/static/logo.png`);
		});

		it("should leave absolute URLs alone", () => {
			const line = ".. image:: https://example.com/shot.png";
			expect(rewriteImagePaths(line, baseUrl)).toBe(line);
		});
	});

	describe("readmeTitle", () => {
		it("should fall back to the addon name when the manifest name is blank", () => {
			expect(readmeTitle(createMockAddon({ manifest: { name: "  " } }))).toBe(
				"my_addon",
			);
		});
	});

	describe("writeReadme", () => {
		let tempDir: TempDirectory;

		beforeEach(async () => {
			tempDir = await createTempDirectory("gen-readme-compose-");
		});

		afterEach(async () => {
			await tempDir.cleanup();
		});

		it("should write README.rst at the addon root", async () => {
			const dir = path.join(tempDir.path, "my_addon");
			const filePath = await writeReadme(createMockAddon({ dir }), "content\n");

			expect(filePath).toBe(path.join(dir, "README.rst"));
			expect(await fs.readFile(filePath, "utf-8")).toBe("content\n");
		});

		it("should raise WriteFailedError when the file cannot be written", async () => {
			const dir = path.join(tempDir.path, "blocked");
			await fs.ensureDir(path.join(dir, "README.rst"));

			await expect(
				writeReadme(createMockAddon({ dir }), "content\n"),
			).rejects.toBeInstanceOf(WriteFailedError);
		});
	});
});
