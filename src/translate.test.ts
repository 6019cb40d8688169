import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

/**
 * Tests for the translate orchestrator.
 *
 * File I/O is mocked out of the docx module and provider requests go to
 * an injected fetch, so the orchestration runs entirely in memory.
 */

vi.mock("./docx.js", async (importOriginal) => ({
	...(await importOriginal<typeof import("./docx.js")>()),
	readDocx: vi.fn(),
	writeDocx: vi.fn(),
}));

import { translateDocx } from "./translate.js";
import { readDocx, writeDocx } from "./docx.js";
import { createDocument, createParagraph, createRun, flattenText, type DocxDocument } from "./model.js";
import type { TranslatorConfig } from "./config.js";
import type { FetchFn } from "./providers.js";

const mockReadDocx = vi.mocked(readDocx);
const mockWriteDocx = vi.mocked(writeDocx);

const config: TranslatorConfig = {
	apiKey: "test-key",
	apiURL: "https://llm.example.test/v1/chat/completions",
	provider: "openai",
};

function makeSimpleDoc(...texts: string[]): DocxDocument {
	const doc = createDocument();
	doc.body = texts.map((text) => createParagraph(text ? [createRun(text)] : []));
	return doc;
}

function replyingFetch(reply: (userMessage: string) => string) {
	return vi.fn<FetchFn>(async (_url, init) => {
		const body: { messages: Array<{ content: string }> } = JSON.parse(String(init.body));
		const content = body.messages[body.messages.length - 1].content;
		return new Response(JSON.stringify({ choices: [{ message: { content: reply(content) } }] }), { status: 200 });
	});
}

function writtenDocument(): DocxDocument {
	const [call] = mockWriteDocx.mock.calls;
	if (!call) throw new Error("writeDocx was not called");
	return call[0];
}

describe("translateDocx", () => {
	beforeEach(() => {
		vi.clearAllMocks();
		vi.spyOn(console, "warn").mockImplementation(() => {});
		mockWriteDocx.mockResolvedValue(undefined);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("orchestrates read -> translate -> write", async () => {
		const source = makeSimpleDoc("Hello");
		mockReadDocx.mockResolvedValue(source);
		const fetchMock = replyingFetch(() => "Hallo");

		const result = await translateDocx({
			inputPath: "/input.docx",
			outputPath: "/output.docx",
			targetLanguage: "German",
			config,
			fetch: fetchMock,
		});

		expect(result).toEqual({
			outputPath: "/output.docx",
			targetLanguage: "German",
			paragraphsTranslated: 1,
			paragraphsFailed: 0,
		});
		expect(mockReadDocx).toHaveBeenCalledWith("/input.docx");
		expect(mockWriteDocx).toHaveBeenCalledWith(expect.anything(), "/output.docx");

		const written = writtenDocument();
		expect(written).not.toBe(source);
		expect(written.resources).toBe(source.resources);
		const [paragraph] = written.body;
		expect(paragraph.kind === "paragraph" && flattenText(paragraph)).toBe("Hallo");
	});

	it("sends the paragraph text in the configured provider's format", async () => {
		mockReadDocx.mockResolvedValue(makeSimpleDoc("Hello"));
		const fetchMock = replyingFetch((user) => user);

		await translateDocx({
			inputPath: "/input.docx",
			outputPath: "/output.docx",
			targetLanguage: "French",
			config: { ...config, provider: "dashscope", sourceLanguage: "English" },
			fetch: fetchMock,
		});

		const [url, init] = fetchMock.mock.calls[0];
		expect(url).toBe(config.apiURL);
		expect(JSON.parse(String(init.body))).toMatchObject({
			model: "qwen-plus",
			messages: [{ role: "system" }, { role: "user", content: "Hello" }],
		});
	});

	it("handles a document with no translatable text", async () => {
		mockReadDocx.mockResolvedValue(makeSimpleDoc("", "   "));
		const fetchMock = replyingFetch(() => "unused");

		const result = await translateDocx({
			inputPath: "/input.docx",
			outputPath: "/output.docx",
			targetLanguage: "German",
			config,
			fetch: fetchMock,
		});

		expect(result.paragraphsTranslated).toBe(0);
		// Should still produce output
		expect(mockWriteDocx).toHaveBeenCalledTimes(1);
		expect(writtenDocument().body).toHaveLength(2);
		// Should not call the provider
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it("keeps original text and reports failures when the provider errors", async () => {
		mockReadDocx.mockResolvedValue(makeSimpleDoc("Test"));
		const fetchMock = vi.fn<FetchFn>(async () => new Response("unauthorized", { status: 401 }));
		const progress: string[] = [];

		const result = await translateDocx({
			inputPath: "/input.docx",
			outputPath: "/output.docx",
			targetLanguage: "French",
			config,
			fetch: fetchMock,
			onProgress: (msg) => progress.push(msg),
		});

		expect(result.paragraphsFailed).toBe(1);
		expect(result.paragraphsTranslated).toBe(0);
		const [paragraph] = writtenDocument().body;
		expect(paragraph.kind === "paragraph" && flattenText(paragraph)).toBe("Test");
		expect(progress).toContain("Warning: 1 paragraphs could not be translated and kept their original text.");
	});

	it("calls onProgress callbacks", async () => {
		mockReadDocx.mockResolvedValue(makeSimpleDoc("Hello"));
		const progress: string[] = [];

		await translateDocx({
			inputPath: "/input.docx",
			outputPath: "/output.docx",
			targetLanguage: "French",
			config,
			fetch: replyingFetch(() => "Bonjour"),
			onProgress: (msg) => progress.push(msg),
		});

		expect(progress).toEqual([
			"Reading document...",
			"Translating to French via openai...",
			"Translated 1/1 paragraphs",
			"Writing document...",
			"Done. Translated 1 paragraphs to French.",
		]);
	});

	it("does not write anything when reading fails", async () => {
		mockReadDocx.mockRejectedValue(new Error("No word/document.xml found in /input.docx. Is this a valid .docx file?"));

		await expect(
			translateDocx({
				inputPath: "/input.docx",
				outputPath: "/output.docx",
				targetLanguage: "German",
				config,
				fetch: replyingFetch(() => "unused"),
			}),
		).rejects.toThrow(/No word\/document.xml found/);
		expect(mockWriteDocx).not.toHaveBeenCalled();
	});
});
