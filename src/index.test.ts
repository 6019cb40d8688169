import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";

vi.mock("./translate.js", () => ({ translateDocx: vi.fn() }));

import registerExtension from "./index.js";
import { translateDocx } from "./translate.js";

const mockTranslateDocx = vi.mocked(translateDocx);

/** The part of the registered tool these tests call. */
interface RegisteredTool {
	name: string;
	execute(
		toolCallId: string,
		params: Record<string, unknown>,
		onUpdate: ((update: unknown) => void) | undefined,
		ctx: unknown,
		signal?: AbortSignal,
	): Promise<{ details: unknown }>;
}

function registeredTool(): RegisteredTool {
	const tools: RegisteredTool[] = [];
	const pi = { registerTool: (tool: RegisteredTool) => tools.push(tool) };
	registerExtension(pi as unknown as ExtensionAPI);
	const [tool] = tools;
	if (!tool) throw new Error("No tool registered");
	return tool;
}

const result = {
	outputPath: "/out.docx",
	targetLanguage: "German",
	paragraphsTranslated: 2,
	paragraphsFailed: 0,
};

describe("translate_docx tool", () => {
	beforeEach(() => {
		vi.clearAllMocks();
		vi.stubEnv("TRANSLATOR_API_KEY", "test-key");
		mockTranslateDocx.mockImplementation(async (options) => {
			options.onProgress?.("Reading document...");
			return result;
		});
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it("forwards the host's abort signal and reports progress through onUpdate", async () => {
		const tool = registeredTool();
		const controller = new AbortController();
		const onUpdate = vi.fn();

		const output = await tool.execute(
			"call-1",
			{ input_path: "/in.docx", output_path: "/out.docx", target_language: "German", provider: "dashscope" },
			onUpdate,
			{},
			controller.signal,
		);

		expect(tool.name).toBe("translate_docx");
		expect(mockTranslateDocx).toHaveBeenCalledWith(
			expect.objectContaining({
				inputPath: "/in.docx",
				outputPath: "/out.docx",
				targetLanguage: "German",
				concurrency: 1,
				signal: controller.signal,
				config: expect.objectContaining({ provider: "dashscope", apiKey: "test-key" }),
			}),
		);
		expect(onUpdate).toHaveBeenCalledWith({
			content: [{ type: "text", text: "Reading document..." }],
			details: { progress: "Reading document..." },
		});
		expect(output.details).toEqual({ result });
	});

	it("runs without an update callback", async () => {
		const tool = registeredTool();

		await expect(
			tool.execute("call-2", { input_path: "/in.docx", output_path: "/out.docx", target_language: "German" }, undefined, {}),
		).resolves.toMatchObject({ details: { result } });
	});
});
