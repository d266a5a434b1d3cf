export type PipelineErrorCode =
	| 'invalid_request'
	| 'payload_too_large'
	| 'fetch_failed'
	| 'unsupported_format'
	| 'extraction_failed'
	| 'provider_failed'
	| 'generation_failed'
	| 'synthesis_failed';

/**
 * Base class for every failure the generate pipeline reports to a client.
 * `status` is the HTTP status the route responds with.
 */
export abstract class PipelineError extends Error {
	abstract readonly code: PipelineErrorCode;
	abstract readonly status: number;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class InvalidRequestError extends PipelineError {
	readonly code = 'invalid_request';
	readonly status = 400;
}

export class PayloadTooLargeError extends PipelineError {
	readonly code = 'payload_too_large';
	readonly status = 413;
}

export class FetchError extends PipelineError {
	readonly code = 'fetch_failed';
	readonly status = 502;
}

export class UnsupportedFormatError extends PipelineError {
	readonly code = 'unsupported_format';
	readonly status = 415;
}

export class ExtractionError extends PipelineError {
	readonly code = 'extraction_failed';
	readonly status = 422;
}

/** An AI provider was unreachable, timed out or refused the request. */
export class ProviderError extends PipelineError {
	readonly code = 'provider_failed';
	readonly status = 502;
}

export class GenerationError extends PipelineError {
	readonly code = 'generation_failed';
	readonly status = 502;
}

/** Recoverable: the orchestrator turns this into an "audio unavailable" result. */
export class SynthesisError extends PipelineError {
	readonly code = 'synthesis_failed';
	readonly status = 502;
}

export class ConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

function providerStatus(err: unknown): number | undefined {
	return typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number'
		? err.statusCode
		: undefined;
}

/**
 * True when a provider call failed for reasons outside the submitted document:
 * transport errors, timeouts, auth, rate limits and 5xx responses.
 */
export function isProviderFailure(err: unknown): boolean {
	const status = providerStatus(err);
	if (status !== undefined) {
		return status === 401 || status === 403 || status === 408 || status === 429 || status >= 500;
	}
	return err instanceof Error && /timeout|abort|connection/i.test(err.name);
}

export function describeProviderError(err: unknown): string {
	const status = providerStatus(err);
	if (status === 429) return 'the AI provider rate limited the request';
	if (err instanceof Error && /timeout/i.test(err.name)) return 'the AI provider timed out';
	if (status !== undefined) return `the AI provider responded with status ${status}`;
	return errorMessage(err);
}
