/**
 * In-memory model of a Word document body.
 *
 * Formatting (paragraph, run, table, row and cell properties) is kept as
 * opaque XML elements: the translator copies them by reference and never
 * looks inside. Anything the model has no variant for is carried as
 * markup so it survives a read/write cycle.
 */

import type { Element } from "@xmldom/xmldom";
import { StructuralError } from "./errors.js";
import { W_NS, parseFragment } from "./xml.js";

/** Opaque formatting blob, e.g. a `<w:pPr>` element. */
export type Properties = Element | null;

export interface TextSpan {
	kind: "text";
	text: string;
}

/** Non-text content kept as-is: tabs, breaks, drawings, bookmarks, hyperlinks... */
export interface InlineMarkup {
	kind: "markup";
	element: Element;
}

export type RunChild = TextSpan | InlineMarkup;

export interface Run {
	kind: "run";
	properties: Properties;
	children: RunChild[];
}

export type ParagraphChild = Run | InlineMarkup;

export interface Paragraph {
	kind: "paragraph";
	properties: Properties;
	children: ParagraphChild[];
}

export interface TableCell {
	properties: Properties;
	/** Ordinarily paragraphs; a cell may also hold a nested table. */
	content: Block[];
}

export interface TableRow {
	properties: Properties;
	cells: TableCell[];
}

export interface Table {
	kind: "table";
	properties: Properties;
	grid: Properties;
	rows: TableRow[];
}

/** A body element with no dedicated variant (`w:sdt`, `w:bookmarkStart`, ...). */
export interface MarkupBlock {
	kind: "markup";
	element: Element;
}

export type Block = Paragraph | Table | MarkupBlock;

/** Page size and margins, in twentieths of a point. */
export interface PageSetup {
	width: number;
	height: number;
	margin: {
		top: number;
		right: number;
		bottom: number;
		left: number;
		header: number;
		footer: number;
		gutter: number;
	};
}

export type Section = { kind: "page"; page: PageSetup } | { kind: "markup"; element: Element };

export const A4_PAGE: PageSetup = {
	width: 11906,
	height: 16838,
	margin: { top: 1440, right: 1440, bottom: 1440, left: 1440, header: 708, footer: 708, gutter: 0 },
};

/** Root attributes written on `<w:document>` when a document is created from scratch. */
export const DEFAULT_NAMESPACES: ReadonlyArray<readonly [string, string]> = [
	["xmlns:wpc", "http://schemas.microsoft.com/office/word/2010/wordprocessingCanvas"],
	["xmlns:mc", "http://schemas.openxmlformats.org/markup-compatibility/2006"],
	["xmlns:o", "urn:schemas-microsoft-com:office:office"],
	["xmlns:r", "http://schemas.openxmlformats.org/officeDocument/2006/relationships"],
	["xmlns:m", "http://schemas.openxmlformats.org/officeDocument/2006/math"],
	["xmlns:v", "urn:schemas-microsoft-com:vml"],
	["xmlns:wp14", "http://schemas.microsoft.com/office/word/2010/wordprocessingDrawing"],
	["xmlns:wp", "http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing"],
	["xmlns:w10", "urn:schemas-microsoft-com:office:word"],
	["xmlns:w", W_NS],
	["xmlns:w14", "http://schemas.microsoft.com/office/word/2010/wordml"],
	["xmlns:w15", "http://schemas.microsoft.com/office/word/2012/wordml"],
	["xmlns:wps", "http://schemas.microsoft.com/office/word/2010/wordprocessingShape"],
	["xmlns:a", "http://schemas.openxmlformats.org/drawingml/2006/main"],
	["xmlns:pic", "http://schemas.openxmlformats.org/drawingml/2006/picture"],
	["mc:Ignorable", "w14 w15 wp14"],
];

/**
 * Package contents shared between documents: embedded media (by file
 * name under `word/media/`) and every other zip part except the main
 * document XML.
 *
 * A store is not owned by any document. A translated document holds the
 * same store as its source, so media are never copied.
 */
export class ResourceStore {
	private readonly media = new Map<string, Uint8Array>();
	private readonly parts = new Map<string, Uint8Array>();

	/** Register a media file. A name already present keeps its first data; returns false. */
	addMedia(name: string, data: Uint8Array): boolean {
		if (this.media.has(name)) return false;
		this.media.set(name, data);
		return true;
	}

	getMedia(name: string): Uint8Array | undefined {
		return this.media.get(name);
	}

	/** Media names in registration order. */
	mediaNames(): string[] {
		return [...this.media.keys()];
	}

	setPart(path: string, data: Uint8Array): void {
		this.parts.set(path, data);
	}

	getPart(path: string): Uint8Array | undefined {
		return this.parts.get(path);
	}

	hasPart(path: string): boolean {
		return this.parts.has(path);
	}

	partPaths(): string[] {
		return [...this.parts.keys()];
	}
}

export interface DocxDocument {
	namespaces: Array<[string, string]>;
	body: Block[];
	section: Section;
	readonly resources: ResourceStore;
}

export interface CreateDocumentOptions {
	resources?: ResourceStore;
	namespaces?: ReadonlyArray<readonly [string, string]>;
	page?: PageSetup;
}

/** A new, empty document with A4 page setup unless told otherwise. */
export function createDocument(options: CreateDocumentOptions = {}): DocxDocument {
	const namespaces = options.namespaces ?? DEFAULT_NAMESPACES;
	return {
		namespaces: namespaces.map(([name, value]): [string, string] => [name, value]),
		body: [],
		section: { kind: "page", page: options.page ?? A4_PAGE },
		resources: options.resources ?? new ResourceStore(),
	};
}

export function createTextSpan(text: string): TextSpan {
	return { kind: "text", text };
}

export function createRun(text?: string, properties: Properties = null): Run {
	return {
		kind: "run",
		properties,
		children: text === undefined ? [] : [createTextSpan(text)],
	};
}

export function createParagraph(runs: Run[] = [], properties: Properties = null): Paragraph {
	return { kind: "paragraph", properties, children: [...runs] };
}

/** Usable text width of an A4 page with one-inch margins. */
const DEFAULT_TABLE_WIDTH = 9026;

/**
 * Allocate a `rows` × `cols` table whose every cell holds one empty
 * paragraph, with a plain grid style and evenly split columns.
 */
export function createTable(rows: number, cols: number): Table {
	if (!Number.isInteger(rows) || rows < 1) {
		throw new StructuralError(`Cannot create a table with ${rows} rows`);
	}
	if (!Number.isInteger(cols) || cols < 1) {
		throw new StructuralError(`Cannot create a table with ${cols} columns`);
	}

	const colWidth = Math.floor(DEFAULT_TABLE_WIDTH / cols);
	const gridCols = `<w:gridCol w:w="${colWidth}"/>`.repeat(cols);

	const tableRows: TableRow[] = [];
	for (let i = 0; i < rows; i++) {
		const cells: TableCell[] = [];
		for (let j = 0; j < cols; j++) {
			cells.push({
				properties: parseFragment(`<w:tcPr><w:tcW w:w="${colWidth}" w:type="dxa"/></w:tcPr>`),
				content: [createParagraph()],
			});
		}
		tableRows.push({ properties: null, cells });
	}

	return {
		kind: "table",
		properties: parseFragment(
			`<w:tblPr><w:tblStyle w:val="TableGrid"/><w:tblW w:w="0" w:type="auto"/><w:tblLook w:val="04A0"/></w:tblPr>`,
		),
		grid: parseFragment(`<w:tblGrid>${gridCols}</w:tblGrid>`),
		rows: tableRows,
	};
}

export function isRun(child: ParagraphChild): child is Run {
	return child.kind === "run";
}

/**
 * The paragraph's text as the reader sees it: every text span of every
 * run, in order, with nothing in between. Markup outside runs (hyperlinks,
 * fields) does not contribute.
 */
export function flattenText(paragraph: Paragraph): string {
	let text = "";
	for (const child of paragraph.children) {
		if (!isRun(child)) continue;
		for (const span of child.children) {
			if (span.kind === "text") text += span.text;
		}
	}
	return text;
}
