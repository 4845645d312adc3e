import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	type TempDirectory,
	createAddonFixture,
	createTempDirectory,
} from "../../__tests__/helpers/temp-directory.js";
import { collectFragments, fragmentPath, scaffoldFragments } from "./fragments.js";
import { FRAGMENT_SECTIONS } from "./sections.js";

describe("fragments", () => {
	let tempDir: TempDirectory;

	beforeEach(async () => {
		tempDir = await createTempDirectory("gen-readme-fragments-");
	});

	afterEach(async () => {
		await tempDir.cleanup();
	});

	describe("collectFragments", () => {
		it("should return nothing when the addon has no readme folder", async () => {
			const addonDir = await createAddonFixture(tempDir.path, "bare");
			expect(await collectFragments(addonDir)).toEqual([]);
		});

		it("should follow section order, not file creation order", async () => {
			const addonDir = await createAddonFixture(tempDir.path, "ordered", {
				fragments: {
					HISTORY: "16.0.1.0.0\n",
					USAGE: "Run it\n",
					DESCRIPTION: "Hello\n",
					CONFIGURE: "Set it up\n",
				},
			});

			const fragments = await collectFragments(addonDir);

			expect(fragments.map((fragment) => fragment.name)).toEqual([
				"DESCRIPTION",
				"CONFIGURE",
				"USAGE",
				"HISTORY",
			]);
		});

		it("should carry heading, path and raw content", async () => {
			const addonDir = await createAddonFixture(tempDir.path, "single", {
				fragments: { ROADMAP: "* Faster exports\n" },
			});

			expect(await collectFragments(addonDir)).toEqual([
				{
					name: "ROADMAP",
					heading: "Known issues / Roadmap",
					path: path.join(addonDir, "readme", "ROADMAP.rst"),
					content: "* Faster exports\n",
				},
			]);
		});

		it("should skip empty and whitespace-only fragments", async () => {
			const addonDir = await createAddonFixture(tempDir.path, "blank", {
				fragments: { DESCRIPTION: "", USAGE: "  \n\n", CREDITS: "Acme\n" },
			});

			const fragments = await collectFragments(addonDir);

			expect(fragments.map((fragment) => fragment.name)).toEqual(["CREDITS"]);
		});

		it("should ignore files that are not known sections", async () => {
			const addonDir = await createAddonFixture(tempDir.path, "extra", {
				fragments: { DESCRIPTION: "Hello\n", NOTES: "Not a section\n" },
			});

			const fragments = await collectFragments(addonDir);

			expect(fragments.map((fragment) => fragment.name)).toEqual(["DESCRIPTION"]);
		});
	});

	describe("scaffoldFragments", () => {
		it("should create every missing fragment and keep existing ones", async () => {
			const addonDir = await createAddonFixture(tempDir.path, "scaffold", {
				fragments: { DESCRIPTION: "Hello\n" },
			});

			const created = await scaffoldFragments(addonDir);

			expect(created).toHaveLength(FRAGMENT_SECTIONS.length - 1);
			expect(created).not.toContain(fragmentPath(addonDir, "DESCRIPTION"));
			expect(
				await fs.readFile(fragmentPath(addonDir, "DESCRIPTION"), "utf-8"),
			).toBe("Hello\n");
			expect(await fs.readFile(fragmentPath(addonDir, "USAGE"), "utf-8")).toBe("");
		});

		it("should leave the collected fragments unchanged", async () => {
			const addonDir = await createAddonFixture(tempDir.path, "unchanged", {
				fragments: { USAGE: "Run it\n" },
			});
			const before = await collectFragments(addonDir);

			await scaffoldFragments(addonDir);

			expect(await collectFragments(addonDir)).toEqual(before);
		});

		it("should create nothing on a second run", async () => {
			const addonDir = await createAddonFixture(tempDir.path, "twice");
			await scaffoldFragments(addonDir);
			expect(await scaffoldFragments(addonDir)).toEqual([]);
		});
	});
});
