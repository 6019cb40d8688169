import JSZip from "jszip";
import { readFile, writeFile } from "node:fs/promises";
import { ResourceStore, type DocxDocument } from "./model.js";
import { parseDocumentXml, serializeDocumentXml } from "./ooxml.js";

export const DOCUMENT_XML_PATH = "word/document.xml";
const MEDIA_PREFIX = "word/media/";

const CONTENT_TYPES_PATH = "[Content_Types].xml";
const PACKAGE_RELS_PATH = "_rels/.rels";
const DOCUMENT_RELS_PATH = "word/_rels/document.xml.rels";

const MEDIA_CONTENT_TYPES: Record<string, string> = {
	png: "image/png",
	jpg: "image/jpeg",
	jpeg: "image/jpeg",
	gif: "image/gif",
	bmp: "image/bmp",
	tif: "image/tiff",
	tiff: "image/tiff",
	svg: "image/svg+xml",
	emf: "image/x-emf",
	wmf: "image/x-wmf",
};

/**
 * Read a .docx file into a document model.
 * A .docx is a zip archive; `word/document.xml` becomes the body and
 * every other entry lands in the document's resource store.
 */
export async function readDocx(inputPath: string): Promise<DocxDocument> {
	const buffer = await readFile(inputPath);
	return loadDocx(buffer, inputPath);
}

export async function loadDocx(data: Uint8Array, source = "input"): Promise<DocxDocument> {
	const zip = await JSZip.loadAsync(data);

	const documentFile = zip.file(DOCUMENT_XML_PATH);
	if (!documentFile) {
		throw new Error(`No ${DOCUMENT_XML_PATH} found in ${source}. Is this a valid .docx file?`);
	}

	const resources = new ResourceStore();
	const entries: JSZip.JSZipObject[] = [];
	zip.forEach((_relativePath, file) => {
		if (!file.dir && file.name !== DOCUMENT_XML_PATH) entries.push(file);
	});

	for (const file of entries) {
		const bytes = await file.async("uint8array");
		if (file.name.startsWith(MEDIA_PREFIX)) {
			resources.addMedia(file.name.slice(MEDIA_PREFIX.length), bytes);
		} else {
			resources.setPart(file.name, bytes);
		}
	}

	const documentXml = await documentFile.async("string");
	return parseDocumentXml(documentXml, resources);
}

/**
 * Zip a document model into .docx bytes. Package parts a document
 * created from scratch lacks get minimal defaults.
 */
export async function packDocx(doc: DocxDocument): Promise<Buffer> {
	const documentXml = serializeDocumentXml(doc);
	validateXml(documentXml);

	const { resources } = doc;
	const zip = new JSZip();

	if (!resources.hasPart(CONTENT_TYPES_PATH)) {
		zip.file(CONTENT_TYPES_PATH, defaultContentTypes(resources.mediaNames()));
	}
	if (!resources.hasPart(PACKAGE_RELS_PATH)) {
		zip.file(PACKAGE_RELS_PATH, DEFAULT_PACKAGE_RELS);
	}
	if (!resources.hasPart(DOCUMENT_RELS_PATH)) {
		zip.file(DOCUMENT_RELS_PATH, DEFAULT_DOCUMENT_RELS);
	}

	for (const path of resources.partPaths()) {
		const data = resources.getPart(path);
		if (data) zip.file(path, data);
	}
	for (const name of resources.mediaNames()) {
		const data = resources.getMedia(name);
		if (data) zip.file(MEDIA_PREFIX + name, data);
	}
	zip.file(DOCUMENT_XML_PATH, documentXml);

	return zip.generateAsync({
		type: "nodebuffer",
		compression: "DEFLATE",
		compressionOptions: { level: 6 },
	});
}

/**
 * Write a document model to outputPath as a .docx file.
 */
export async function writeDocx(doc: DocxDocument, outputPath: string): Promise<void> {
	const output = await packDocx(doc);
	await writeFile(outputPath, output);
}

/**
 * Basic XML well-formedness check. Verifies that every opening tag has
 * a matching closing tag and vice versa. Throws on mismatches so we
 * never produce a corrupt .docx.
 */
export function validateXml(xml: string): void {
	const tagStack: string[] = [];
	const tagRegex = /<(\/?)([a-zA-Z0-9:_.-]+)((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>/g;
	let match: RegExpExecArray | null;

	while ((match = tagRegex.exec(xml)) !== null) {
		const [, isClosing, tagName, , isSelfClosing] = match;
		if (isSelfClosing) continue;
		if (isClosing) {
			const expected = tagStack.pop();
			if (expected !== tagName) {
				const pos = match.index;
				const context = xml.slice(Math.max(0, pos - 80), Math.min(xml.length, pos + 80));
				throw new Error(
					`Malformed XML: closing </${tagName}> but expected </${expected ?? "?"}> near position ${pos}\nContext: ...${context}...`,
				);
			}
		} else {
			tagStack.push(tagName);
		}
	}

	if (tagStack.length > 0) {
		throw new Error(`Malformed XML: unclosed tags: ${tagStack.join(", ")}`);
	}
}

function defaultContentTypes(mediaNames: string[]): string {
	const extensions = new Set<string>();
	for (const name of mediaNames) {
		const ext = name.slice(name.lastIndexOf(".") + 1).toLowerCase();
		if (ext in MEDIA_CONTENT_TYPES) extensions.add(ext);
	}
	const mediaDefaults = [...extensions]
		.map((ext) => `<Default Extension="${ext}" ContentType="${MEDIA_CONTENT_TYPES[ext]}"/>`)
		.join("");

	return (
		`<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
		`<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">` +
		`<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>` +
		`<Default Extension="xml" ContentType="application/xml"/>` +
		mediaDefaults +
		`<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>` +
		`</Types>`
	);
}

const DEFAULT_PACKAGE_RELS =
	`<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
	`<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">` +
	`<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>` +
	`</Relationships>`;

const DEFAULT_DOCUMENT_RELS =
	`<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
	`<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"></Relationships>`;
