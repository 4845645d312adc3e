import type { IndexEntry, RepoContext } from "../../types/index.js";
import { GENERATED_MARKER } from "./addon-readme.js";

export const INDEX_GENERATOR_META = `<meta name="generator" content="${GENERATED_MARKER}" />`;

export function escapeHtml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&#39;");
}

function entryItem(entry: IndexEntry): string {
	return `      <li><a href="${escapeHtml(entry.href)}">${escapeHtml(entry.title)}</a> <code>${escapeHtml(entry.name)}</code></li>`;
}

export function generateIndexHtml(
	entries: IndexEntry[],
	context: RepoContext,
): string {
	const repo = escapeHtml(`${context.orgName}/${context.repoName}`);
	const branch = escapeHtml(context.branch);
	const items =
		entries.length > 0
			? `    <ul>
${entries.map(entryItem).join("\n")}
    </ul>`
			: "    <p>No addons were generated.</p>";

	return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    ${INDEX_GENERATOR_META}
    <title>${repo} (${branch})</title>
  </head>
  <body>
    <h1>${repo}</h1>
    <p>Branch: ${branch}</p>
${items}
  </body>
</html>
`;
}
