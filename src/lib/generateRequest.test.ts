import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createDocumentAcquirer } from './acquireDocument';
import { createTextExtractor, type PdfPageReader } from './extractText';
import { createScriptGenerator, type ScriptModel } from './generateScript';
import { respondToGenerate } from './generateRequest';
import { AUDIO_UNAVAILABLE_WARNING, createPodcastPipeline, type PodcastPipeline } from './podcastPipeline';
import { createAudioSynthesizer, type AudioStore, type SpeechProvider } from './synthesizeAudio';

const PAPER_URL = 'https://papers.example.com/sparse-attention.pdf';
const AUDIO_URL = 'https://storage.test/podcast-audio/episodes/episode.mp3';
const limits = { maxUploadBytes: 1024 * 1024 };

const pdfBytes = new TextEncoder().encode('%PDF-1.7\n1 0 obj\n<<>>\nendobj\n');

const dialogue = JSON.stringify({
	turns: [
		{ speaker: 'Host A', text: 'Welcome to the show.' },
		{ speaker: 'Host B', text: 'Today we read about sparse attention.' }
	]
});
const expectedScript = 'Host A: Welcome to the show.\n\nHost B: Today we read about sparse attention.';

function harness() {
	const fetchMock = vi
		.fn<typeof fetch>()
		.mockImplementation(
			async () => new Response(pdfBytes, { status: 200, headers: { 'content-type': 'application/pdf' } })
		);
	const readPages = vi.fn<PdfPageReader['readPages']>().mockResolvedValue([
		{ index: 2, text: 'Results show a 3x speedup.' },
		{ index: 0, text: 'Abstract. We introduce sparse attention.' },
		{ index: 1, text: 'Method. Attend to a few tokens.' }
	]);
	const complete = vi.fn<ScriptModel['complete']>().mockResolvedValue(dialogue);
	const speak = vi.fn<SpeechProvider['speak']>().mockResolvedValue(Buffer.from('mp3'));
	const save = vi.fn<AudioStore['save']>().mockResolvedValue(AUDIO_URL);

	const pipeline = createPodcastPipeline(
		{
			acquirer: createDocumentAcquirer({
				fetchTimeoutMs: 1000,
				maxBytes: limits.maxUploadBytes,
				fetch: fetchMock,
				resolveHost: async () => ['93.184.215.14']
			}),
			extractor: createTextExtractor({ pdf: { readPages } }),
			generator: createScriptGenerator({ model: { complete }, maxInputChars: 15_000 }),
			synthesizer: createAudioSynthesizer({
				speech: { speak },
				store: { save },
				voices: { hostA: 'voice-a', hostB: 'voice-b' }
			})
		},
		{ requestBudgetMs: 60_000, synthesisTimeoutMs: 30_000 }
	);

	return { pipeline, fetchMock, readPages, complete, speak, save };
}

function jsonRequest(body: string) {
	return new Request('http://localhost/generate', {
		method: 'POST',
		headers: { 'content-type': 'application/json' },
		body
	});
}

function uploadRequest(bytes: Uint8Array, filename: string) {
	const form = new FormData();
	form.append('file', new Blob([bytes], { type: 'application/pdf' }), filename);
	return new Request('http://localhost/generate', { method: 'POST', body: form });
}

async function send(request: Request, pipeline: PodcastPipeline) {
	const response = await respondToGenerate(request, { pipeline, limits });
	return { status: response.status, body: await response.json() };
}

describe('POST /generate', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
		vi.spyOn(console, 'warn').mockImplementation(() => {});
		vi.spyOn(console, 'error').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe('happy path', () => {
		it('turns a PDF URL into a script and an audio URL', async () => {
			const { pipeline, fetchMock, complete, speak } = harness();

			const { status, body } = await send(jsonRequest(JSON.stringify({ source: PAPER_URL })), pipeline);

			expect(status).toBe(200);
			expect(body).toEqual({ script: expectedScript, audio_url: AUDIO_URL });
			expect(fetchMock).toHaveBeenCalledTimes(1);
			expect(complete.mock.calls[0][0].prompt).toContain(
				'Abstract. We introduce sparse attention.\n\nMethod. Attend to a few tokens.\n\nResults show a 3x speedup.'
			);
			expect(speak.mock.calls.map(([text, voiceId]) => [text, voiceId])).toEqual([
				['Welcome to the show.', 'voice-a'],
				['Today we read about sparse attention.', 'voice-b']
			]);
		});

		it('accepts an uploaded PDF', async () => {
			const { pipeline, fetchMock, readPages } = harness();

			const { status, body } = await send(uploadRequest(pdfBytes, 'paper.pdf'), pipeline);

			expect(status).toBe(200);
			expect(body).toEqual({ script: expectedScript, audio_url: AUDIO_URL });
			expect(fetchMock).not.toHaveBeenCalled();
			expect(Array.from(readPages.mock.calls[0][0])).toEqual(Array.from(pdfBytes));
		});

		it('returns the script with a warning when speech synthesis fails', async () => {
			const { pipeline, speak, save } = harness();
			speak.mockRejectedValue(new Error('quota exceeded'));

			const { status, body } = await send(jsonRequest(JSON.stringify({ source: PAPER_URL })), pipeline);

			expect(status).toBe(200);
			expect(body).toEqual({ script: expectedScript, warning: AUDIO_UNAVAILABLE_WARNING });
			expect(save).not.toHaveBeenCalled();
		});
	});

	describe('pipeline failures', () => {
		it('rejects an upload whose bytes are not a document, whatever its name', async () => {
			const { pipeline, readPages, complete } = harness();

			const { status, body } = await send(uploadRequest(new Uint8Array([0x13, 0x37, 0x00, 0xff]), 'paper.pdf'), pipeline);

			expect(status).toBe(415);
			expect(body).toEqual({
				error: 'Could not extract text from the source: unsupported document format. Please provide a PDF or a web page.'
			});
			expect(readPages).not.toHaveBeenCalled();
			expect(complete).not.toHaveBeenCalled();
		});

		it('reports 422 when the PDF cannot be read', async () => {
			const { pipeline, readPages, complete } = harness();
			readPages.mockRejectedValue(new Error('document is encrypted'));

			const { status, body } = await send(uploadRequest(pdfBytes, 'paper.pdf'), pipeline);

			expect(status).toBe(422);
			expect(body).toEqual({ error: 'Could not extract text from the source: the PDF could not be read.' });
			expect(complete).not.toHaveBeenCalled();
		});

		it('reports 502, not a bad document, when the OCR provider is down', async () => {
			const { pipeline, readPages, complete } = harness();
			readPages.mockRejectedValue(Object.assign(new Error('Service unavailable'), { statusCode: 503 }));

			const { status, body } = await send(uploadRequest(pdfBytes, 'paper.pdf'), pipeline);

			expect(status).toBe(502);
			expect(body).toEqual({
				error: 'Could not extract text from the source: the AI provider responded with status 503.'
			});
			expect(complete).not.toHaveBeenCalled();
		});

		it('refuses URLs that resolve to a private address', async () => {
			const { pipeline, fetchMock } = harness();

			const { status, body } = await send(
				jsonRequest(JSON.stringify({ source: 'http://127.0.0.1:8080/admin' })),
				pipeline
			);

			expect(status).toBe(400);
			expect(body).toEqual({
				error: 'Refusing to fetch http://127.0.0.1:8080/admin: it points to a private or local address.'
			});
			expect(fetchMock).not.toHaveBeenCalled();
		});

		it('reports 502 when the source URL cannot be fetched', async () => {
			const { pipeline, fetchMock, readPages } = harness();
			fetchMock.mockResolvedValue(new Response('not found', { status: 404 }));

			const { status, body } = await send(jsonRequest(JSON.stringify({ source: PAPER_URL })), pipeline);

			expect(status).toBe(502);
			expect(body).toEqual({ error: `Failed to fetch URL (404): ${PAPER_URL}` });
			expect(readPages).not.toHaveBeenCalled();
		});

		it('reports 502 and no script when the model returns an empty completion', async () => {
			const { pipeline, complete, speak } = harness();
			complete.mockResolvedValue('');

			const { status, body } = await send(jsonRequest(JSON.stringify({ source: PAPER_URL })), pipeline);

			expect(status).toBe(502);
			expect(body).toEqual({
				error: 'Failed to generate podcast script: the model returned an empty completion.'
			});
			expect(speak).not.toHaveBeenCalled();
		});

		it('hides unexpected errors behind a generic 500', async () => {
			const pipeline: PodcastPipeline = {
				handle: vi.fn<PodcastPipeline['handle']>().mockRejectedValue(new TypeError('undefined is not a function'))
			};

			const { status, body } = await send(jsonRequest(JSON.stringify({ source: PAPER_URL })), pipeline);

			expect(status).toBe(500);
			expect(body).toEqual({ error: 'An internal server error occurred.' });
		});
	});

	describe('request validation', () => {
		it.each([
			['{}', 'No URL provided'],
			['{"source":"   "}', 'No URL provided'],
			['{"source":', 'Invalid JSON body.'],
			['{"source":"not a url"}', 'source must be a valid URL.'],
			['{"source":"ftp://example.com/paper.pdf"}', 'source must be an http or https URL.']
		])('answers 400 for the JSON body %s', async (raw, message) => {
			const { pipeline, fetchMock } = harness();

			const { status, body } = await send(jsonRequest(raw), pipeline);

			expect(status).toBe(400);
			expect(body).toEqual({ error: message });
			expect(fetchMock).not.toHaveBeenCalled();
		});

		it('answers 400 for a body that is neither JSON nor multipart', async () => {
			const { pipeline } = harness();
			const request = new Request('http://localhost/generate', {
				method: 'POST',
				headers: { 'content-type': 'text/plain' },
				body: PAPER_URL
			});

			const { status, body } = await send(request, pipeline);

			expect(status).toBe(400);
			expect(body).toEqual({
				error: 'Send JSON with a "source" URL or a multipart form with a "file" field.'
			});
		});

		it('answers 400 when the form has no file field', async () => {
			const { pipeline } = harness();
			const form = new FormData();
			form.append('source', PAPER_URL);

			const { status, body } = await send(
				new Request('http://localhost/generate', { method: 'POST', body: form }),
				pipeline
			);

			expect(status).toBe(400);
			expect(body).toEqual({ error: 'No file provided' });
		});

		it('answers 400 for an empty upload', async () => {
			const { pipeline } = harness();

			const { status, body } = await send(uploadRequest(new Uint8Array(0), 'paper.pdf'), pipeline);

			expect(status).toBe(400);
			expect(body).toEqual({ error: 'No selected file' });
		});

		it('answers 413 for an upload over the size limit', async () => {
			const { pipeline, readPages } = harness();

			const { status, body } = await send(
				uploadRequest(new Uint8Array(limits.maxUploadBytes + 1), 'huge.pdf'),
				pipeline
			);

			expect(status).toBe(413);
			expect(body).toEqual({ error: 'Uploaded file exceeds the 1 MB limit.' });
			expect(readPages).not.toHaveBeenCalled();
		});
	});
});
