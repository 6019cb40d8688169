/**
 * Translation providers speaking a chat-completion HTTP contract:
 * `POST` a `{ model, messages }` JSON body with a bearer token, read the
 * translation from `choices[0].message.content`.
 */

import {
	MalformedResponseError,
	ProviderError,
	TranslationAbortedError,
	TransportError,
} from "./errors.js";

interface RawResponse {
	ok: boolean;
	status: number;
	body: string;
}

export type ProviderName = "openai" | "dashscope";

export const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "dashscope"];

export interface TranslationProvider {
	readonly name: string;
	/** Translate `text` into `targetLanguage`. Empty text resolves to "" without a request. */
	translate(text: string, targetLanguage: string, signal?: AbortSignal): Promise<string>;
}

export interface ChatMessage {
	role: "system" | "user" | "assistant";
	content: string;
}

export interface ChatRequestBody {
	model: string;
	messages: ChatMessage[];
	translation_options?: Record<string, string>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface ProviderOptions {
	apiKey: string;
	apiURL: string;
	model?: string;
	/** Abort a single request after this many milliseconds. */
	timeoutMs?: number;
	/** Defaults to the global fetch, which keeps connections pooled across calls. */
	fetch?: FetchFn;
}

export abstract class ChatCompletionProvider implements TranslationProvider {
	abstract readonly name: ProviderName;
	protected abstract readonly defaultModel: string;

	private readonly fetchFn: FetchFn;

	constructor(protected readonly options: ProviderOptions) {
		this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
	}

	get model(): string {
		return this.options.model ?? this.defaultModel;
	}

	protected abstract buildRequest(text: string, targetLanguage: string): ChatRequestBody;

	async translate(text: string, targetLanguage: string, signal?: AbortSignal): Promise<string> {
		if (text === "") return "";

		const request = this.buildRequest(text, targetLanguage);
		const response = await this.post(JSON.stringify(request), signal);

		if (!response.ok) {
			throw new ProviderError(response.status, response.body);
		}

		let payload: unknown;
		try {
			payload = JSON.parse(response.body);
		} catch (error) {
			throw new MalformedResponseError("body", `is not valid JSON (${errorMessage(error)})`);
		}

		return extractContent(payload);
	}

	/**
	 * Send the request and read the whole body. The timeout and the
	 * caller's signal cover both the headers and the body.
	 */
	private async post(body: string, signal?: AbortSignal): Promise<RawResponse> {
		if (signal?.aborted) throw new TranslationAbortedError();

		const controller = new AbortController();
		const onAbort = () => controller.abort();
		signal?.addEventListener("abort", onAbort, { once: true });

		let timedOut = false;
		const timer =
			this.options.timeoutMs === undefined
				? undefined
				: setTimeout(() => {
						timedOut = true;
						controller.abort();
					}, this.options.timeoutMs);

		// A stub or a misbehaving stream may ignore the signal; settle on abort regardless.
		const aborted = new Promise<never>((_resolve, reject) => {
			controller.signal.addEventListener("abort", () => reject(new Error("Request aborted")), { once: true });
		});

		try {
			const response = await Promise.race([
				this.fetchFn(this.options.apiURL, {
					method: "POST",
					headers: {
						"Content-Type": "application/json",
						Authorization: `Bearer ${this.options.apiKey}`,
					},
					body,
					signal: controller.signal,
				}),
				aborted,
			]);
			const text = await Promise.race([response.text(), aborted]);
			return { ok: response.ok, status: response.status, body: text };
		} catch (error) {
			if (signal?.aborted) throw new TranslationAbortedError();
			if (timedOut) {
				throw new TransportError(`Request to ${this.options.apiURL} timed out after ${this.options.timeoutMs}ms`, {
					cause: error,
				});
			}
			throw new TransportError(`Request to ${this.options.apiURL} failed: ${errorMessage(error)}`, { cause: error });
		} finally {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
		}
	}
}

/** Generic OpenAI-compatible chat-completion endpoint. */
export class OpenAIChatProvider extends ChatCompletionProvider {
	readonly name = "openai";
	protected readonly defaultModel = "gpt-3.5-turbo";

	protected buildRequest(text: string, targetLanguage: string): ChatRequestBody {
		return {
			model: this.model,
			messages: [
				{ role: "system", content: "You are a professional translator." },
				{ role: "user", content: `Translate the following text to ${targetLanguage}: ${text}` },
			],
		};
	}
}

export interface DashScopeOptions extends ProviderOptions {
	/** The language the documents are written in. Defaults to Chinese. */
	sourceLanguage?: string;
}

/**
 * DashScope (Qwen) compatible-mode endpoint. The source language is fixed
 * per provider; only the raw text is sent as the user message.
 */
export class DashScopeProvider extends ChatCompletionProvider {
	readonly name = "dashscope";
	protected readonly defaultModel = "qwen-plus";
	readonly sourceLanguage: string;

	constructor(options: DashScopeOptions) {
		super(options);
		this.sourceLanguage = options.sourceLanguage ?? "Chinese";
	}

	protected buildRequest(text: string, targetLanguage: string): ChatRequestBody {
		return {
			model: this.model,
			messages: [
				{
					role: "system",
					content:
						`You are a master translator. Translate the user's ${this.sourceLanguage} input into ${targetLanguage}. ` +
						"Return only the translated content, with nothing else.",
				},
				{ role: "user", content: text },
			],
			translation_options: {
				source_lang: this.sourceLanguage,
				target_lang: targetLanguage,
			},
		};
	}
}

export function createProvider(name: ProviderName, options: DashScopeOptions): ChatCompletionProvider {
	switch (name) {
		case "openai":
			return new OpenAIChatProvider(options);
		case "dashscope":
			return new DashScopeProvider(options);
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pull `choices[0].message.content` out of a parsed response body,
 * naming the first field that is missing or has the wrong type.
 */
export function extractContent(payload: unknown): string {
	if (!isRecord(payload)) {
		throw new MalformedResponseError("body", "is not a JSON object");
	}

	const choices = payload.choices;
	if (!Array.isArray(choices) || choices.length === 0) {
		throw new MalformedResponseError("choices", "is missing or empty");
	}

	const first: unknown = choices[0];
	if (!isRecord(first)) {
		throw new MalformedResponseError("choices[0]", "is not an object");
	}

	const message = first.message;
	if (!isRecord(message)) {
		throw new MalformedResponseError("choices[0].message", "is missing or not an object");
	}

	const content = message.content;
	if (typeof content !== "string") {
		throw new MalformedResponseError("choices[0].message.content", "is missing or not a string");
	}

	return content;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
