import { Command } from "commander";
import { type GenerateOptions, resolveRunConfig } from "../config.js";
import { outputSummary } from "../output.js";
import { generateReadmes } from "../pipeline.js";
import { errorMessage } from "../utils/errors.js";
import { log } from "../utils/logger.js";

export function createGenerateCommand(): Command {
	return new Command()
		.name("gen-readme")
		.description(
			"Generate README.rst for every installable addon from its readme/ fragments",
		)
		.argument(
			"[files...]",
			"Only regenerate the addons containing these files (pre-commit mode)",
		)
		.option("--org-name <name>", "Organization name, e.g. acme")
		.option("--repo-name <name>", "Repository name, e.g. server-tools")
		.option("--branch <name>", "Series or branch, e.g. 16.0")
		.option(
			"--addons-dir <dir>",
			"Directory containing the addons; every installable addon found there gets a README",
		)
		.option("--gen-html", "Also write an index.html linking every README")
		.option("--no-gen-html", "Do not write index.html (default)")
		.option(
			"--installable-by-default",
			"Treat addons that do not declare 'installable' as installable (default)",
		)
		.option(
			"--no-installable-by-default",
			"Skip addons that do not declare 'installable'",
		)
		.option(
			"--init-fragments",
			"Create the readme/ folder and empty fragment files where missing",
		)
		.option("-c, --config <path>", "Path to gen-readme.json config file")
		.action(async (files: string[], options: GenerateOptions) => {
			try {
				const config = await resolveRunConfig(options, files);
				const summary = await generateReadmes(config);
				outputSummary(summary);
			} catch (error) {
				log.blank();
				log.error(errorMessage(error));
				process.exit(1);
			}
		});
}
