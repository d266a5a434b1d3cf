import { Mistral } from '@mistralai/mistralai';
import type { AppConfig } from './config';
import type { PdfPage, PdfPageReader } from './extractText';
import type { ScriptModel } from './generateScript';

type CompletionContent = string | ReadonlyArray<{ type?: string; text?: unknown }> | null | undefined;

type MistralOptions = NonNullable<ConstructorParameters<typeof Mistral>[0]>;

/** The part of the OCR API the PDF reader uses. */
export type OcrApi = {
	process(request: {
		model: string;
		document: { type: 'document_url'; documentUrl: string };
		includeImageBase64: boolean;
	}): Promise<{ pages: ReadonlyArray<{ index: number; markdown: string }> }>;
};

/** The part of the chat API the script model uses. */
export type ChatApi = {
	complete(request: {
		model: string;
		messages: Array<{ role: 'system' | 'user'; content: string }>;
		responseFormat: { type: 'json_object' };
		temperature: number;
	}): Promise<{
		choices?: ReadonlyArray<{ finishReason?: string | null; message?: { content?: CompletionContent } }>;
		usage?: { promptTokens?: number; completionTokens?: number };
	}>;
};

// SDK retries are disabled: every generation attempt is billed, so a failed call is
// reported rather than repeated.
export function mistralClientOptions(config: AppConfig['mistral']): MistralOptions {
	return {
		apiKey: config.apiKey,
		timeoutMs: config.timeoutMs,
		retryConfig: { strategy: 'none' }
	};
}

/** One client per process. */
export function createMistralClient(config: AppConfig['mistral']): Mistral {
	return new Mistral(mistralClientOptions(config));
}

/** Reduces OCR markdown to plain prose. */
export function markdownToPlainText(markdown: string): string {
	return markdown
		.replace(/!\[[^\]]*\]\([^)]*\)/g, '')
		.replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
		.replace(/^#{1,6}\s+/gm, '')
		.replace(/(\*\*|__)(.*?)\1/g, '$2')
		.replace(/[ \t]+\n/g, '\n')
		.replace(/\n{3,}/g, '\n\n')
		.trim();
}

export function createMistralPdfReader(client: { ocr: OcrApi }, model: string): PdfPageReader {
	return {
		async readPages(bytes) {
			const startedAt = Date.now();
			const documentUrl = `data:application/pdf;base64,${Buffer.from(bytes).toString('base64')}`;

			const ocrResponse = await client.ocr.process({
				model,
				document: {
					type: 'document_url',
					documentUrl
				},
				includeImageBase64: false
			});

			console.log('[extract] Mistral OCR complete', {
				model,
				pages: ocrResponse.pages.length,
				elapsedMs: Date.now() - startedAt
			});

			return ocrResponse.pages.map(
				(page): PdfPage => ({ index: page.index, text: markdownToPlainText(page.markdown) })
			);
		}
	};
}

/** Flattens a chat completion message body into text. */
export function readCompletionText(content: CompletionContent): string {
	if (typeof content === 'string') return content;
	if (!content) return '';
	return content
		.map((chunk) => (typeof chunk.text === 'string' ? chunk.text : ''))
		.join('');
}

export function createMistralScriptModel(client: { chat: ChatApi }, model: string): ScriptModel {
	return {
		async complete({ system, prompt }) {
			const startedAt = Date.now();
			const response = await client.chat.complete({
				model,
				messages: [
					{ role: 'system', content: system },
					{ role: 'user', content: prompt }
				],
				responseFormat: { type: 'json_object' },
				temperature: 0.7
			});

			const choice = response.choices?.[0];
			console.log('[script] Mistral completion', {
				model,
				finishReason: choice?.finishReason,
				promptTokens: response.usage?.promptTokens,
				completionTokens: response.usage?.completionTokens,
				elapsedMs: Date.now() - startedAt
			});

			return readCompletionText(choice?.message?.content);
		}
	};
}
