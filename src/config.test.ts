import { describe, expect, it } from "vitest";
import { DEFAULT_API_URLS, parseConcurrency, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

function problemsOf(fn: () => unknown): string[] {
	try {
		fn();
	} catch (error) {
		if (error instanceof ConfigError) return error.problems;
		throw error;
	}
	throw new Error("Expected a ConfigError");
}

describe("resolveConfig", () => {
	it("reads the API key from the environment and defaults to the openai endpoint", () => {
		expect(resolveConfig({}, { TRANSLATOR_API_KEY: "test-key" })).toEqual({
			apiKey: "test-key",
			apiURL: "https://api.openai.com/v1/chat/completions",
			provider: "openai",
		});
	});

	it("uses the dashscope endpoint when that provider is selected", () => {
		const config = resolveConfig({}, { TRANSLATOR_API_KEY: "test-key", TRANSLATOR_PROVIDER: "dashscope" });

		expect(config.provider).toBe("dashscope");
		expect(config.apiURL).toBe(DEFAULT_API_URLS.dashscope);
	});

	it("lets explicit values win over the environment", () => {
		const config = resolveConfig(
			{ apiKey: "flag-key", apiURL: "http://localhost:8080/v1/chat/completions", model: "local-model", timeoutMs: 5000 },
			{
				TRANSLATOR_API_KEY: "env-key",
				TRANSLATOR_API_URL: "https://env.example.test/chat",
				TRANSLATOR_MODEL: "env-model",
				TRANSLATOR_TIMEOUT_MS: "100",
			},
		);

		expect(config).toEqual({
			apiKey: "flag-key",
			apiURL: "http://localhost:8080/v1/chat/completions",
			provider: "openai",
			model: "local-model",
			timeoutMs: 5000,
		});
	});

	it("reads the remaining settings from the environment", () => {
		const config = resolveConfig(
			{},
			{
				TRANSLATOR_API_KEY: "test-key",
				TRANSLATOR_PROVIDER: "dashscope",
				TRANSLATOR_MODEL: "qwen-max",
				TRANSLATOR_SOURCE_LANGUAGE: "Japanese",
				TRANSLATOR_TIMEOUT_MS: "2500",
			},
		);

		expect(config).toMatchObject({ model: "qwen-max", sourceLanguage: "Japanese", timeoutMs: 2500 });
	});

	it("requires an API key", () => {
		const problems = problemsOf(() => resolveConfig({}, {}));

		expect(problems.some((problem) => problem.startsWith("/apiKey: "))).toBe(true);
	});

	it("rejects an empty API key", () => {
		const problems = problemsOf(() => resolveConfig({}, { TRANSLATOR_API_KEY: "" }));

		expect(problems.some((problem) => problem.startsWith("/apiKey: "))).toBe(true);
	});

	it("rejects an unknown provider", () => {
		const problems = problemsOf(() => resolveConfig({ provider: "deepl" }, { TRANSLATOR_API_KEY: "test-key" }));

		expect(problems.some((problem) => problem.startsWith("/provider: "))).toBe(true);
		expect(problems.some((problem) => problem.startsWith("/apiURL: "))).toBe(true);
	});

	it("rejects a timeout that is not a positive integer", () => {
		const problems = problemsOf(() =>
			resolveConfig({}, { TRANSLATOR_API_KEY: "test-key", TRANSLATOR_TIMEOUT_MS: "soon" }),
		);

		expect(problems.some((problem) => problem.startsWith("/timeoutMs: "))).toBe(true);
	});

	it("rejects an API URL without an http scheme", () => {
		const problems = problemsOf(() =>
			resolveConfig({ apiURL: "ftp://example.test" }, { TRANSLATOR_API_KEY: "test-key" }),
		);

		expect(problems.some((problem) => problem.startsWith("/apiURL: "))).toBe(true);
	});

	it("lists every problem in the error message", () => {
		expect(() => resolveConfig({ provider: "deepl" }, {})).toThrow(/Invalid translator configuration:\n {2}\//);
	});
});

describe("parseConcurrency", () => {
	it("defaults to one request at a time", () => {
		expect(parseConcurrency(undefined)).toBe(1);
	});

	it("accepts a positive integer", () => {
		expect(parseConcurrency("4")).toBe(4);
	});

	it.each(["abc", "0", "-2", "2.5", "", "3x"])("rejects %j", (raw) => {
		expect(problemsOf(() => parseConcurrency(raw))).toEqual([`/concurrency: Expected a positive integer, got "${raw}"`]);
	});
});
