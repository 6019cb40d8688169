import type { TranslatorConfig } from "./config.js";
import { StructuralError, TranslationAbortedError } from "./errors.js";
import {
	createDocument,
	createTable,
	flattenText,
	isRun,
	type Block,
	type DocxDocument,
	type Paragraph,
	type Table,
} from "./model.js";
import { createProvider, type FetchFn, type TranslationProvider } from "./providers.js";

export interface TranslateOptions {
	/** Max simultaneous provider requests (default: 1, strictly in reading order). */
	concurrency?: number;
	/** Keep the source's section properties instead of default page settings. */
	preserveSection?: boolean;
	signal?: AbortSignal;
	onProgress?: (message: string) => void;
}

export interface DocumentTranslation {
	document: DocxDocument;
	/** Paragraphs the provider translated. */
	translated: number;
	/** Paragraphs that kept their original text because the provider failed. */
	failed: number;
	/** Distinct blank paragraphs passed through untouched. */
	skipped: number;
}

interface TextOutcome {
	text: string;
	failed: boolean;
}

/**
 * Translates paragraphs and tables of a document while keeping its shape.
 *
 * Limitation: a translated paragraph loses its run boundaries. The
 * provider returns one string with no alignment to the source runs, so
 * the result is a single run formatted like the paragraph's first run.
 * Partial bold, italics and the like inside a sentence do not survive.
 * Paragraph-level markup (hyperlinks, tracked insertions, simple fields)
 * is dropped with the runs, text inside it included, since that text is
 * never sent for translation.
 */
export class Translator {
	constructor(readonly provider: TranslationProvider) {}

	static fromConfig(config: TranslatorConfig, fetchFn?: FetchFn): Translator {
		return new Translator(
			createProvider(config.provider, {
				apiKey: config.apiKey,
				apiURL: config.apiURL,
				model: config.model,
				sourceLanguage: config.sourceLanguage,
				timeoutMs: config.timeoutMs,
				fetch: fetchFn,
			}),
		);
	}

	translate(text: string, targetLanguage: string, signal?: AbortSignal): Promise<string> {
		return this.provider.translate(text, targetLanguage, signal);
	}

	/**
	 * Translate one paragraph. Blank paragraphs come back as the same
	 * object; a provider failure keeps the original text.
	 */
	async translateParagraph(
		paragraph: Paragraph,
		targetLanguage: string,
		options: Pick<TranslateOptions, "signal" | "onProgress"> = {},
	): Promise<Paragraph> {
		const text = flattenText(paragraph);
		if (isBlank(text)) return paragraph;

		const outcome = await this.translateText(text, targetLanguage, options);
		return rebuildParagraph(paragraph, outcome.text);
	}

	async translateDocument(doc: DocxDocument, targetLanguage: string, options: TranslateOptions = {}): Promise<DocxDocument> {
		const { document } = await this.translateDocumentWithStats(doc, targetLanguage, options);
		return document;
	}

	/**
	 * Translate every paragraph of `doc`, in body tables and nested tables
	 * included, and assemble a new document of the same shape. The source
	 * is left untouched; media are shared with it.
	 *
	 * Tables are checked before any request is made: a table without rows
	 * or columns, or with a row whose cell count differs from the first
	 * row's, rejects with a StructuralError.
	 */
	async translateDocumentWithStats(
		doc: DocxDocument,
		targetLanguage: string,
		options: TranslateOptions = {},
	): Promise<DocumentTranslation> {
		const texts: string[] = [];
		const slots = new Map<Paragraph, number>();
		const blanks = new Set<Paragraph>();

		const collect = (blocks: Block[]): void => {
			for (const block of blocks) {
				if (block.kind === "paragraph") {
					if (slots.has(block) || blanks.has(block)) continue;
					const text = flattenText(block);
					if (isBlank(text)) {
						blanks.add(block);
						continue;
					}
					slots.set(block, texts.length);
					texts.push(text);
				} else if (block.kind === "table") {
					tableColumns(block);
					for (const row of block.rows) {
						for (const cell of row.cells) collect(cell.content);
					}
				}
			}
		};
		collect(doc.body);

		const results: string[] = new Array(texts.length);
		const concurrency = batchSize(options.concurrency);
		let failed = 0;

		for (let i = 0; i < texts.length; i += concurrency) {
			if (options.signal?.aborted) {
				throw new TranslationAbortedError();
			}

			const batch = texts.slice(i, i + concurrency);
			const outcomes = await Promise.all(batch.map((text) => this.translateText(text, targetLanguage, options)));

			outcomes.forEach((outcome, offset) => {
				results[i + offset] = outcome.text;
				if (outcome.failed) failed++;
			});
			options.onProgress?.(`Translated ${i + batch.length}/${texts.length} paragraphs`);
		}

		const rebuild = (block: Block): Block => {
			switch (block.kind) {
				case "paragraph": {
					const slot = slots.get(block);
					return slot === undefined ? block : rebuildParagraph(block, results[slot]);
				}
				case "table":
					return rebuildTable(block, rebuild);
				case "markup":
					// No translatable text model for it; carried over as-is.
					return block;
			}
		};

		const document = createDocument({ resources: doc.resources, namespaces: doc.namespaces });
		if (options.preserveSection) {
			document.section = doc.section;
		}
		document.body = doc.body.map(rebuild);

		return { document, translated: texts.length - failed, failed, skipped: blanks.size };
	}

	private async translateText(
		text: string,
		targetLanguage: string,
		options: Pick<TranslateOptions, "signal" | "onProgress">,
	): Promise<TextOutcome> {
		try {
			return { text: await this.provider.translate(text, targetLanguage, options.signal), failed: false };
		} catch (error) {
			if (error instanceof TranslationAbortedError) throw error;
			if (options.signal?.aborted) throw new TranslationAbortedError();

			const message = `Paragraph translation failed, keeping original text: ${error instanceof Error ? error.message : String(error)}`;
			console.warn(message);
			options.onProgress?.(message);
			return { text, failed: true };
		}
	}
}

/** Requests per batch; anything that is not a finite number >= 1 means one at a time. */
function batchSize(concurrency: number | undefined): number {
	if (concurrency === undefined || !Number.isFinite(concurrency)) return 1;
	return Math.max(1, Math.floor(concurrency));
}

function isBlank(text: string): boolean {
	return text.trim() === "";
}

/**
 * A copy of `paragraph` whose runs are replaced by one run holding `text`,
 * formatted like the first source run. A paragraph without runs stays
 * without runs.
 */
export function rebuildParagraph(paragraph: Paragraph, text: string): Paragraph {
	const firstRun = paragraph.children.find(isRun);
	return {
		kind: "paragraph",
		properties: paragraph.properties,
		children: firstRun
			? [{ kind: "run", properties: firstRun.properties, children: [{ kind: "text", text }] }]
			: [],
	};
}

/** Column count of a rectangular table; throws StructuralError otherwise. */
export function tableColumns(table: Table): number {
	const [first] = table.rows;
	if (!first) {
		throw new StructuralError("Table has no rows");
	}
	const cols = first.cells.length;
	if (cols === 0) {
		throw new StructuralError("Table's first row has no cells");
	}
	table.rows.forEach((row, i) => {
		if (row.cells.length !== cols) {
			throw new StructuralError(`Table row ${i} has ${row.cells.length} cells, expected ${cols} like the first row`);
		}
	});
	return cols;
}

function rebuildTable(source: Table, rebuild: (block: Block) => Block): Table {
	const table = createTable(source.rows.length, tableColumns(source));
	table.properties = source.properties;
	table.grid = source.grid;

	source.rows.forEach((row, i) => {
		const target = table.rows[i];
		target.properties = row.properties;
		row.cells.forEach((cell, j) => {
			const newCell = target.cells[j];
			newCell.properties = cell.properties;
			newCell.content = cell.content.map(rebuild);
		});
	});

	return table;
}
