import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Type } from "@sinclair/typebox";
import { resolveConfig } from "./config.js";
import { translateDocx, type TranslateDocxResult } from "./translate.js";

/** Tool details: progress lines while running, the result once done. */
interface ToolDetails {
	progress?: string;
	result?: TranslateDocxResult;
}

export default function (pi: ExtensionAPI) {
	pi.registerTool({
		name: "translate_docx",
		label: "Translate DOCX",
		description:
			"Translate the paragraphs and tables of a Word document (.docx) into another language. " +
			"Keeps paragraph, table and cell formatting; each paragraph becomes a single run " +
			"formatted like its first run. Reads provider settings from TRANSLATOR_* environment variables.",
		parameters: Type.Object({
			input_path: Type.String({ description: "Absolute path to the source .docx file" }),
			output_path: Type.String({ description: "Absolute path for the translated .docx output" }),
			target_language: Type.String({ description: "Target language, e.g. 'German', 'French', 'Japanese'" }),
			provider: Type.Optional(
				Type.Union([Type.Literal("openai"), Type.Literal("dashscope")], {
					description: "Translation provider (default: $TRANSLATOR_PROVIDER or openai)",
				}),
			),
			concurrency: Type.Optional(
				Type.Number({ description: "Max parallel translation requests (default: 1)", minimum: 1, maximum: 20 }),
			),
		}),

		async execute(_toolCallId, params, onUpdate, _ctx, signal) {
			const { input_path, output_path, target_language } = params;

			const result = await translateDocx({
				inputPath: input_path,
				outputPath: output_path,
				targetLanguage: target_language,
				config: resolveConfig({ provider: params.provider }),
				concurrency: params.concurrency ?? 1,
				signal,
				onProgress: (message) => {
					const progress: ToolDetails = { progress: message };
					onUpdate?.({ content: [{ type: "text", text: message }], details: progress });
				},
			});
			const details: ToolDetails = { result };

			return {
				content: [
					{
						type: "text",
						text: `Translated document saved to ${result.outputPath}\n` +
							`  Paragraphs translated: ${result.paragraphsTranslated}\n` +
							`  Paragraphs kept in original: ${result.paragraphsFailed}\n` +
							`  Target language: ${result.targetLanguage}`,
					},
				],
				details,
			};
		},
	});
}
