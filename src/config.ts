import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import type { ProviderName } from "./providers.js";

export const DEFAULT_API_URLS: Record<ProviderName, string> = {
	openai: "https://api.openai.com/v1/chat/completions",
	dashscope: "https://dashscope.aliyuncs.com/compatible-mode/v1/chat/completions",
};

export const TranslatorConfigSchema = Type.Object({
	apiKey: Type.String({ minLength: 1 }),
	apiURL: Type.String({ pattern: "^https?://" }),
	provider: Type.Union([Type.Literal("openai"), Type.Literal("dashscope")]),
	model: Type.Optional(Type.String({ minLength: 1 })),
	sourceLanguage: Type.Optional(Type.String({ minLength: 1 })),
	timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
});

export type TranslatorConfig = Static<typeof TranslatorConfigSchema>;

/** Values given explicitly, e.g. from CLI flags. Unset ones fall back to the environment. */
export interface ConfigOverrides {
	apiKey?: string;
	apiURL?: string;
	provider?: string;
	model?: string;
	sourceLanguage?: string;
	timeoutMs?: number;
}

export type Env = Record<string, string | undefined>;

/**
 * Build a translator configuration from explicit values and
 * `TRANSLATOR_*` environment variables. The API URL defaults to the
 * selected provider's public endpoint.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): TranslatorConfig {
	const provider = overrides.provider ?? env.TRANSLATOR_PROVIDER ?? "openai";
	const timeout = overrides.timeoutMs ?? parseTimeout(env.TRANSLATOR_TIMEOUT_MS);

	const candidate = dropUndefined({
		apiKey: overrides.apiKey ?? env.TRANSLATOR_API_KEY,
		apiURL: overrides.apiURL ?? env.TRANSLATOR_API_URL ?? defaultApiUrl(provider),
		provider,
		model: overrides.model ?? env.TRANSLATOR_MODEL,
		sourceLanguage: overrides.sourceLanguage ?? env.TRANSLATOR_SOURCE_LANGUAGE,
		timeoutMs: timeout,
	});

	if (Value.Check(TranslatorConfigSchema, candidate)) {
		return candidate;
	}

	const problems = [...Value.Errors(TranslatorConfigSchema, candidate)].map(
		(error) => `${error.path || "/"}: ${error.message}`,
	);
	throw new ConfigError(problems);
}

/** Parse a `--concurrency` value; unset means one request at a time. */
export function parseConcurrency(raw: string | undefined): number {
	if (raw === undefined) return 1;
	const value = Number(raw);
	if (raw.trim() === "" || !Number.isInteger(value) || value < 1) {
		throw new ConfigError([`/concurrency: Expected a positive integer, got "${raw}"`]);
	}
	return value;
}

function defaultApiUrl(provider: string): string | undefined {
	return provider === "openai" || provider === "dashscope" ? DEFAULT_API_URLS[provider] : undefined;
}

function parseTimeout(raw: string | undefined): number | undefined {
	if (raw === undefined || raw.trim() === "") return undefined;
	return Number(raw);
}

function dropUndefined(values: Record<string, string | number | undefined>): Record<string, string | number> {
	const result: Record<string, string | number> = {};
	for (const [key, value] of Object.entries(values)) {
		if (value !== undefined) result[key] = value;
	}
	return result;
}
