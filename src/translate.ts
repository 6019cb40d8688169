/**
 * Shared translation orchestrator.
 * Used by both the agent tool entry point and the CLI binary.
 */

import type { TranslatorConfig } from "./config.js";
import { readDocx, writeDocx } from "./docx.js";
import type { FetchFn } from "./providers.js";
import { Translator } from "./translator.js";

export { resolveConfig, type TranslatorConfig } from "./config.js";
export * from "./errors.js";
export * from "./model.js";
export { loadDocx, packDocx, readDocx, writeDocx } from "./docx.js";
export { parseDocumentXml, serializeDocumentXml } from "./ooxml.js";
export * from "./providers.js";
export { Translator, rebuildParagraph, type DocumentTranslation, type TranslateOptions } from "./translator.js";

export interface TranslateDocxOptions {
	inputPath: string;
	outputPath: string;
	targetLanguage: string;
	config: TranslatorConfig;
	concurrency?: number;
	preserveSection?: boolean;
	signal?: AbortSignal;
	onProgress?: (message: string) => void;
	/** Replaces the global fetch for provider requests. */
	fetch?: FetchFn;
}

export interface TranslateDocxResult {
	outputPath: string;
	targetLanguage: string;
	paragraphsTranslated: number;
	paragraphsFailed: number;
}

export async function translateDocx(options: TranslateDocxOptions): Promise<TranslateDocxResult> {
	const { inputPath, outputPath, targetLanguage, config, signal, onProgress } = options;

	// Step 1: Read the .docx into a document model
	onProgress?.("Reading document...");
	const source = await readDocx(inputPath);

	// Step 2: Translate paragraphs and table cells
	onProgress?.(`Translating to ${targetLanguage} via ${config.provider}...`);
	const translator = Translator.fromConfig(config, options.fetch);
	const { document, translated, failed } = await translator.translateDocumentWithStats(source, targetLanguage, {
		concurrency: options.concurrency,
		preserveSection: options.preserveSection,
		signal,
		onProgress,
	});

	// Step 3: Write the translated document, sharing the source's media
	onProgress?.("Writing document...");
	await writeDocx(document, outputPath);

	onProgress?.(`Done. Translated ${translated} paragraphs to ${targetLanguage}.`);
	if (failed > 0) {
		onProgress?.(`Warning: ${failed} paragraphs could not be translated and kept their original text.`);
	}

	return { outputPath, targetLanguage, paragraphsTranslated: translated, paragraphsFailed: failed };
}
