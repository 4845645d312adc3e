import path from "node:path";
import { scanAddons, selectAddons } from "./addons/discovery.js";
import {
	composeReadme,
	readmeTitle,
	writeReadme,
} from "./readme/compose.js";
import { collectFragments, scaffoldFragments } from "./readme/fragments.js";
import { writeIndexPage } from "./readme/index-page.js";
import type {
	Addon,
	ProcessedAddon,
	RunConfig,
	RunSummary,
} from "./types/index.js";
import { errorMessage } from "./utils/errors.js";
import { log, pluralize } from "./utils/logger.js";
import { withSpinner } from "./utils/spinner.js";

/**
 * Collect, compose and write the README of a single addon.
 */
export async function processAddon(
	addon: Addon,
	config: RunConfig,
): Promise<ProcessedAddon> {
	if (config.initFragments) {
		const created = await scaffoldFragments(addon.dir);
		if (created.length > 0) {
			log.step(
				`${addon.name}: created ${pluralize(created.length, "empty fragment")}`,
			);
		}
	}

	const fragments = await collectFragments(addon.dir);
	const content = composeReadme({ addon, fragments, context: config });
	const readmePath = await writeReadme(addon, content);

	return {
		name: addon.name,
		title: readmeTitle(addon),
		readmePath,
		sections: fragments.length,
	};
}

/**
 * Generate the README of every installable addon under `config.addonsDir`.
 *
 * Addons are handled one at a time. A failing addon is recorded in the
 * summary and the run moves on; only an unusable addons directory aborts.
 */
export async function generateReadmes(config: RunConfig): Promise<RunSummary> {
	const rootDir = path.resolve(config.addonsDir);
	const addons = await withSpinner(`Scanning ${rootDir}`, () =>
		scanAddons(rootDir, {
			installableByDefault: config.installableByDefault,
		}),
	);

	const summary: RunSummary = {
		processed: [],
		failed: [],
		notInstallable: [],
		indexPath: null,
	};

	for (const addon of addons) {
		if (addon.manifestMalformed && addon.manifestPath) {
			log.warn(
				`${addon.name}: could not parse ${path.basename(addon.manifestPath)}, read it field by field`,
			);
		}
		if (addon.manifestError === null && !addon.installable) {
			summary.notInstallable.push(addon.name);
			log.skip(`${addon.name} (not installable)`);
		}
	}

	const selected = selectAddons(
		addons.filter(
			(addon) => addon.installable || addon.manifestError !== null,
		),
		config.files,
	);

	for (const addon of selected) {
		if (addon.manifestError !== null) {
			summary.failed.push({ name: addon.name, error: addon.manifestError });
			log.error(`${addon.name}: ${addon.manifestError}`);
			continue;
		}
		try {
			const processed = await processAddon(addon, config);
			summary.processed.push(processed);
			log.step(
				`${addon.name}: ${pluralize(processed.sections, "section")} -> ${path.relative(rootDir, processed.readmePath)}`,
			);
		} catch (error) {
			summary.failed.push({ name: addon.name, error: errorMessage(error) });
			log.error(`${addon.name}: ${errorMessage(error)}`);
		}
	}

	if (config.genHtml) {
		try {
			summary.indexPath = await writeIndexPage(
				rootDir,
				summary.processed,
				config,
			);
			if (summary.indexPath === null) {
				log.warn(
					"index.html was not generated by gen-readme, leaving it untouched",
				);
			}
		} catch (error) {
			log.error(errorMessage(error));
		}
	}

	return summary;
}
