/**
 * WordprocessingML codec for the document model.
 *
 * Reading: `<w:body>` children become blocks. `w:p`, `w:r` and `w:t` map to
 * Paragraph, Run and TextSpan; `w:tbl`, `w:tr` and `w:tc` map to the table
 * types; property elements (`w:pPr`, `w:rPr`, `w:tblPr`, `w:tblGrid`,
 * `w:trPr`, `w:tcPr`) are kept as opaque elements; everything else is
 * carried as markup.
 *
 * Writing: a fresh DOM is assembled from the model and serialized once,
 * so namespace declarations live only on the root element.
 */

import { DOMParser } from "@xmldom/xmldom";
import type { Document, Element, Node } from "@xmldom/xmldom";
import {
	A4_PAGE,
	ResourceStore,
	type Block,
	type DocxDocument,
	type Paragraph,
	type ParagraphChild,
	type Properties,
	type Run,
	type RunChild,
	type Section,
	type Table,
	type TableCell,
	type TableRow,
} from "./model.js";
import { W_NS, XML_NS, childElements, isW, serializeXml } from "./xml.js";

const XML_DECLARATION = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n`;

interface ParsedContainer {
	blocks: Block[];
	section: Element | null;
}

/**
 * Parse the XML of `word/document.xml` into a document that refers to
 * `resources` for everything outside the main part.
 */
export function parseDocumentXml(xml: string, resources: ResourceStore = new ResourceStore()): DocxDocument {
	const dom = new DOMParser().parseFromString(xml, "text/xml");
	const root = dom.documentElement;
	if (!root || !isW(root, "document")) {
		throw new Error("Expected a <w:document> root element in document XML");
	}

	const namespaces: Array<[string, string]> = [];
	for (let i = 0; i < root.attributes.length; i++) {
		const attr = root.attributes.item(i);
		if (attr) namespaces.push([attr.name, attr.value]);
	}

	const body = childElements(root).find((el) => isW(el, "body"));
	const { blocks, section } = body ? parseContainer(body) : { blocks: [], section: null };

	return {
		namespaces,
		body: blocks,
		// A body without <w:sectPr> takes the application's defaults; A4 stands in for them.
		section: section ? { kind: "markup", element: section } : { kind: "page", page: A4_PAGE },
		resources,
	};
}

function parseContainer(container: Element): ParsedContainer {
	const blocks: Block[] = [];
	let section: Element | null = null;

	for (const el of childElements(container)) {
		if (isW(el, "p")) {
			blocks.push(parseParagraph(el));
		} else if (isW(el, "tbl")) {
			blocks.push(parseTable(el));
		} else if (isW(el, "sectPr")) {
			section = el;
		} else {
			blocks.push({ kind: "markup", element: el });
		}
	}

	return { blocks, section };
}

function parseParagraph(el: Element): Paragraph {
	let properties: Properties = null;
	const children: ParagraphChild[] = [];

	for (const child of childElements(el)) {
		if (isW(child, "pPr")) {
			properties = child;
		} else if (isW(child, "r")) {
			children.push(parseRun(child));
		} else {
			children.push({ kind: "markup", element: child });
		}
	}

	return { kind: "paragraph", properties, children };
}

function parseRun(el: Element): Run {
	let properties: Properties = null;
	const children: RunChild[] = [];

	for (const child of childElements(el)) {
		if (isW(child, "rPr")) {
			properties = child;
		} else if (isW(child, "t")) {
			children.push({ kind: "text", text: child.textContent ?? "" });
		} else {
			children.push({ kind: "markup", element: child });
		}
	}

	return { kind: "run", properties, children };
}

function parseTable(el: Element): Table {
	let properties: Properties = null;
	let grid: Properties = null;
	const rows: TableRow[] = [];

	for (const child of childElements(el)) {
		if (isW(child, "tblPr")) properties = child;
		else if (isW(child, "tblGrid")) grid = child;
		else if (isW(child, "tr")) rows.push(parseRow(child));
	}

	return { kind: "table", properties, grid, rows };
}

function parseRow(el: Element): TableRow {
	let properties: Properties = null;
	const cells: TableCell[] = [];

	for (const child of childElements(el)) {
		if (isW(child, "trPr")) properties = child;
		else if (isW(child, "tc")) cells.push(parseCell(child));
	}

	return { properties, cells };
}

function parseCell(el: Element): TableCell {
	let properties: Properties = null;
	const content: Block[] = [];

	for (const child of childElements(el)) {
		if (isW(child, "tcPr")) {
			properties = child;
		} else if (isW(child, "p")) {
			content.push(parseParagraph(child));
		} else if (isW(child, "tbl")) {
			content.push(parseTable(child));
		} else {
			content.push({ kind: "markup", element: child });
		}
	}

	return { properties, content };
}

/**
 * Serialize a document model to the XML of `word/document.xml`.
 */
export function serializeDocumentXml(doc: DocxDocument): string {
	const namespaces: ReadonlyArray<readonly [string, string]> = doc.namespaces.some(([name]) => name === "xmlns:w")
		? doc.namespaces
		: [["xmlns:w", W_NS], ...doc.namespaces];
	const attrs = namespaces.map(([name, value]) => ` ${name}="${escapeXml(value)}"`).join("");

	const dom = new DOMParser().parseFromString(`<w:document${attrs}><w:body/></w:document>`, "text/xml");
	const root = dom.documentElement;
	const body = root ? childElements(root)[0] : undefined;
	if (!body) {
		throw new Error("Failed to create document skeleton");
	}

	const writer = new BodyWriter(dom);
	for (const block of doc.body) {
		body.appendChild(writer.block(block));
	}
	body.appendChild(writer.section(doc.section));

	return XML_DECLARATION + serializeXml(dom);
}

class BodyWriter {
	constructor(private readonly dom: Document) {}

	block(block: Block): Node {
		switch (block.kind) {
			case "paragraph":
				return this.paragraph(block);
			case "table":
				return this.table(block);
			case "markup":
				return this.copy(block.element);
		}
	}

	section(section: Section): Node {
		if (section.kind === "markup") return this.copy(section.element);

		const { width, height, margin } = section.page;
		const sectPr = this.w("sectPr");
		const pgSz = this.w("pgSz");
		this.attr(pgSz, "w", width);
		this.attr(pgSz, "h", height);
		const pgMar = this.w("pgMar");
		this.attr(pgMar, "top", margin.top);
		this.attr(pgMar, "right", margin.right);
		this.attr(pgMar, "bottom", margin.bottom);
		this.attr(pgMar, "left", margin.left);
		this.attr(pgMar, "header", margin.header);
		this.attr(pgMar, "footer", margin.footer);
		this.attr(pgMar, "gutter", margin.gutter);
		sectPr.appendChild(pgSz);
		sectPr.appendChild(pgMar);
		return sectPr;
	}

	private paragraph(paragraph: Paragraph): Element {
		const p = this.w("p");
		this.appendProperties(p, paragraph.properties);
		for (const child of paragraph.children) {
			p.appendChild(child.kind === "run" ? this.run(child) : this.copy(child.element));
		}
		return p;
	}

	private run(run: Run): Element {
		const r = this.w("r");
		this.appendProperties(r, run.properties);
		for (const child of run.children) {
			r.appendChild(child.kind === "text" ? this.text(child.text) : this.copy(child.element));
		}
		return r;
	}

	private text(text: string): Element {
		const t = this.w("t");
		if (text !== text.trim()) {
			t.setAttributeNS(XML_NS, "xml:space", "preserve");
		}
		t.appendChild(this.dom.createTextNode(text));
		return t;
	}

	private table(table: Table): Element {
		const tbl = this.w("tbl");
		this.appendProperties(tbl, table.properties);
		this.appendProperties(tbl, table.grid);
		for (const row of table.rows) {
			const tr = this.w("tr");
			this.appendProperties(tr, row.properties);
			for (const cell of row.cells) {
				tr.appendChild(this.cell(cell));
			}
			tbl.appendChild(tr);
		}
		return tbl;
	}

	private cell(cell: TableCell): Element {
		const tc = this.w("tc");
		this.appendProperties(tc, cell.properties);
		for (const block of cell.content) {
			tc.appendChild(this.block(block));
		}
		// Word rejects a cell that does not end in a paragraph.
		const last = cell.content[cell.content.length - 1];
		if (!last || last.kind !== "paragraph") {
			tc.appendChild(this.w("p"));
		}
		return tc;
	}

	private appendProperties(parent: Element, properties: Properties): void {
		if (properties) parent.appendChild(this.copy(properties));
	}

	private copy(element: Element): Node {
		return this.dom.importNode(element, true);
	}

	private w(localName: string): Element {
		return this.dom.createElementNS(W_NS, `w:${localName}`);
	}

	private attr(el: Element, localName: string, value: number): void {
		el.setAttributeNS(W_NS, `w:${localName}`, String(value));
	}
}

/**
 * Escape special XML characters for use in an attribute value.
 */
export function escapeXml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;");
}
