export class MalformedDocumentError extends Error {
	constructor(detail: string) {
		super(`Malformed rules document: ${detail}`);
		this.name = "MalformedDocumentError";
	}
}

export class TransportError extends Error {
	readonly status?: number;

	constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
		super(message, { cause: options.cause });
		this.name = "TransportError";
		this.status = options.status;
	}
}

export class HashMismatchError extends Error {
	constructor(
		readonly expected: string,
		readonly actual: string,
	) {
		super(`Hash validation failed. Expected: ${expected}, Actual: ${actual}`);
		this.name = "HashMismatchError";
	}
}

export class ConfigError extends Error {
	constructor(detail: string) {
		super(`Invalid configuration: ${detail}`);
		this.name = "ConfigError";
	}
}
