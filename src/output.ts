import type { RunSummary } from "./types/index.js";
import { log, pluralize } from "./utils/logger.js";

export function summaryLine(summary: RunSummary): string {
	const parts = [
		`${pluralize(summary.processed.length, "README")} generated`,
		`${summary.failed.length} failed`,
	];
	if (summary.notInstallable.length > 0) {
		parts.push(`${summary.notInstallable.length} not installable`);
	}
	return parts.join(", ");
}

/**
 * Print the end-of-run report.
 */
export function outputSummary(summary: RunSummary): void {
	log.blank();
	if (summary.failed.length > 0) {
		log.warn(summaryLine(summary));
		for (const failure of summary.failed) {
			log.step(`${failure.name}: ${failure.error}`);
		}
	} else {
		log.success(summaryLine(summary));
	}

	if (summary.indexPath) {
		log.info(`Index page: ${summary.indexPath}`);
	}
}
