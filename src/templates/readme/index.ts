export {
	GENERATED_MARKER,
	generateAddonReadme,
	type AddonReadmeInput,
	type ReadmeSection,
} from "./addon-readme.js";
export {
	INDEX_GENERATOR_META,
	escapeHtml,
	generateIndexHtml,
} from "./index-html.js";
