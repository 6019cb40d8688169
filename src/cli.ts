#!/usr/bin/env node

/**
 * CLI entry point for docx-translator.
 * Resolves the provider configuration from flags and TRANSLATOR_* env
 * variables, then delegates to the shared translateDocx() orchestrator.
 */

import { parseConcurrency, resolveConfig } from "./config.js";
import { TranslationAbortedError } from "./errors.js";
import { translateDocx } from "./translate.js";

function usage(): never {
	console.error(`Usage: docx-translator --input <file.docx> --output <file.docx> --lang <language> [options]

Options:
  --input, -i       Source .docx file (required)
  --output, -o      Output .docx file (required)
  --lang, -l        Target language, e.g. "French" (required)
  --provider        "openai" or "dashscope" (default: $TRANSLATOR_PROVIDER or openai)
  --model           Model ID (default: gpt-3.5-turbo / qwen-plus)
  --api-key         API key (default: $TRANSLATOR_API_KEY)
  --api-url         Chat-completion endpoint (default: the provider's public endpoint)
  --source-lang     Source language for the dashscope provider (default: Chinese)
  --concurrency     Max parallel translation requests (default: 1)
  --timeout         Per-request timeout in milliseconds
  --keep-section    Keep the source page setup instead of A4 defaults
  --help, -h        Show this help`);
	process.exit(1);
}

const VALUE_FLAGS: Record<string, string> = {
	"--input": "input", "-i": "input",
	"--output": "output", "-o": "output",
	"--lang": "lang", "-l": "lang",
	"--provider": "provider",
	"--model": "model",
	"--api-key": "apiKey",
	"--api-url": "apiURL",
	"--source-lang": "sourceLang",
	"--concurrency": "concurrency",
	"--timeout": "timeout",
};

function parseArgs(argv: string[]): Record<string, string> {
	const args: Record<string, string> = {};
	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === "--help" || arg === "-h") usage();
		if (arg === "--keep-section") {
			args.keepSection = "true";
			continue;
		}

		const key = VALUE_FLAGS[arg];
		if (key && i + 1 < argv.length) {
			args[key] = argv[++i];
		}
	}
	return args;
}

async function main() {
	const args = parseArgs(process.argv.slice(2));

	if (!args.input || !args.output || !args.lang) {
		console.error("Error: --input, --output, and --lang are required.\n");
		usage();
	}

	const config = resolveConfig({
		apiKey: args.apiKey,
		apiURL: args.apiURL,
		provider: args.provider,
		model: args.model,
		sourceLanguage: args.sourceLang,
		timeoutMs: args.timeout ? parseInt(args.timeout, 10) : undefined,
	});
	const concurrency = parseConcurrency(args.concurrency);

	// Handle signals for graceful shutdown
	const controller = new AbortController();
	const handleSignal = () => {
		console.error("\nReceived signal, aborting translation...");
		controller.abort();
	};
	process.on("SIGINT", handleSignal);
	process.on("SIGTERM", handleSignal);

	try {
		const result = await translateDocx({
			inputPath: args.input,
			outputPath: args.output,
			targetLanguage: args.lang,
			config,
			concurrency,
			preserveSection: args.keepSection === "true",
			signal: controller.signal,
			onProgress: (msg) => console.error(msg),
		});

		// Output result as JSON on stdout for machine consumption
		console.log(JSON.stringify(result));
	} catch (error) {
		if (error instanceof TranslationAbortedError) {
			console.error("Translation aborted by user.");
			process.exit(1);
		}
		throw error;
	} finally {
		process.off("SIGINT", handleSignal);
		process.off("SIGTERM", handleSignal);
	}
}

main().catch((err: unknown) => {
	console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
	process.exit(1);
});
