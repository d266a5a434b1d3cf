import { NextResponse } from 'next/server';
import { z } from 'zod';
import type { AppConfig } from './config';
import { InvalidRequestError, PayloadTooLargeError, PipelineError, errorMessage } from './errors';
import type { PodcastPipeline } from './podcastPipeline';
import type { GenerateResponseBody, GenerationResult, SourceDescriptor } from '@/types/podcast';

type Limits = Pick<AppConfig['limits'], 'maxUploadBytes'>;

const UrlBodySchema = z.object({
	source: z
		.string({ required_error: 'No URL provided', invalid_type_error: 'source must be a string' })
		.trim()
		.min(1, 'No URL provided')
});

// Multipart framing adds a little on top of the file itself.
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

function formatMegabytes(bytes: number): string {
	return `${Math.round((bytes / (1024 * 1024)) * 10) / 10} MB`;
}

async function readUpload(request: Request, limits: Limits): Promise<SourceDescriptor> {
	const declaredLength = Number(request.headers.get('content-length') ?? NaN);
	if (Number.isFinite(declaredLength) && declaredLength > limits.maxUploadBytes + MULTIPART_OVERHEAD_BYTES) {
		throw new PayloadTooLargeError(`Uploaded file exceeds the ${formatMegabytes(limits.maxUploadBytes)} limit.`);
	}

	let form: FormData;
	try {
		form = await request.formData();
	} catch (err) {
		throw new InvalidRequestError('Malformed multipart body.', { cause: err });
	}

	const file = form.get('file');
	if (file === null || typeof file === 'string') {
		throw new InvalidRequestError('No file provided');
	}
	if (!file.name || file.size === 0) {
		throw new InvalidRequestError('No selected file');
	}
	if (file.size > limits.maxUploadBytes) {
		throw new PayloadTooLargeError(`Uploaded file exceeds the ${formatMegabytes(limits.maxUploadBytes)} limit.`);
	}

	return {
		kind: 'uploaded_file',
		bytes: new Uint8Array(await file.arrayBuffer()),
		filename: file.name
	};
}

async function readUrl(request: Request): Promise<SourceDescriptor> {
	let body: unknown;
	try {
		body = await request.json();
	} catch {
		throw new InvalidRequestError('Invalid JSON body.');
	}

	const parsed = UrlBodySchema.safeParse(body);
	if (!parsed.success) {
		throw new InvalidRequestError(parsed.error.issues[0]?.message ?? 'No URL provided');
	}

	let url: URL;
	try {
		url = new URL(parsed.data.source);
	} catch {
		throw new InvalidRequestError('source must be a valid URL.');
	}
	if (url.protocol !== 'http:' && url.protocol !== 'https:') {
		throw new InvalidRequestError('source must be an http or https URL.');
	}

	return { kind: 'remote_url', url: url.toString() };
}

/**
 * Decides, once, which kind of source the request carries.
 */
export async function readSourceDescriptor(request: Request, limits: Limits): Promise<SourceDescriptor> {
	const contentType = (request.headers.get('content-type') ?? '').toLowerCase();
	if (contentType.startsWith('multipart/form-data')) return readUpload(request, limits);
	if (contentType.startsWith('application/json')) return readUrl(request);
	throw new InvalidRequestError(
		'Send JSON with a "source" URL or a multipart form with a "file" field.'
	);
}

export function toResponseBody(result: GenerationResult): GenerateResponseBody {
	return result.audio.available
		? { script: result.script.rawText, audio_url: result.audio.url }
		: { script: result.script.rawText, warning: result.audio.warning };
}

export async function respondToGenerate(
	request: Request,
	context: { pipeline: PodcastPipeline; limits: Limits }
): Promise<NextResponse<GenerateResponseBody>> {
	try {
		const descriptor = await readSourceDescriptor(request, context.limits);
		const result = await context.pipeline.handle(descriptor);
		return NextResponse.json<GenerateResponseBody>(toResponseBody(result));
	} catch (err) {
		if (err instanceof PipelineError) {
			console.warn('[generate] Request failed', {
				code: err.code,
				status: err.status,
				error: err.message,
				cause: err.cause === undefined ? undefined : errorMessage(err.cause)
			});
			return NextResponse.json<GenerateResponseBody>({ error: err.message }, { status: err.status });
		}

		console.error('An unexpected error occurred in generate', err);
		return NextResponse.json<GenerateResponseBody>(
			{ error: 'An internal server error occurred.' },
			{ status: 500 }
		);
	}
}
