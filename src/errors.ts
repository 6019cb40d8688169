/**
 * Error types raised while translating a document.
 *
 * Provider failures (transport, HTTP status, response shape) are contained
 * per paragraph by the translator. Structural, configuration and abort
 * errors reach the caller.
 */

export class TranslationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** The provider could not be reached, or the request timed out. */
export class TransportError extends TranslationError {}

/** The provider answered with a non-2xx status. */
export class ProviderError extends TranslationError {
	readonly status: number;
	readonly body: string;

	constructor(status: number, body: string) {
		super(`API request failed with status ${status}: ${body}`);
		this.status = status;
		this.body = body;
	}
}

/** The provider answered 2xx, but not with a usable chat-completion payload. */
export class MalformedResponseError extends TranslationError {
	readonly field: string;

	constructor(field: string, detail: string) {
		super(`Invalid API response: ${field} ${detail}`);
		this.field = field;
	}
}

/** The input document has a shape the translator cannot rebuild. */
export class StructuralError extends TranslationError {}

export class TranslationAbortedError extends TranslationError {
	constructor() {
		super("Translation aborted");
	}
}

export class ConfigError extends TranslationError {
	readonly problems: string[];

	constructor(problems: string[]) {
		super(`Invalid translator configuration:\n  ${problems.join("\n  ")}`);
		this.problems = problems;
	}
}
