import {
	ExtractionError,
	ProviderError,
	UnsupportedFormatError,
	describeProviderError,
	errorMessage,
	isProviderFailure
} from './errors';
import { decodeHtml, extractVisibleText } from './htmlText';
import type { ContentType, ExtractedDocument } from '@/types/podcast';

export type PdfPage = {
	/** Zero-based page number. */
	index: number;
	text: string;
};

/** Reads a PDF into per-page text. Implemented in production by Mistral OCR. */
export interface PdfPageReader {
	readPages(bytes: Uint8Array): Promise<PdfPage[]>;
}

export type ExtractOptions = {
	/** Charset declared by the server, if any. */
	charset?: string;
};

export type TextExtractor = {
	extract(bytes: Uint8Array, contentType: ContentType, options?: ExtractOptions): Promise<ExtractedDocument>;
};

type PageFold = {
	texts: string[];
	failedPages: number;
};

/**
 * Folds per-page results in page order. Pages without text are counted as failed
 * and skipped.
 */
export function foldPages(pages: PdfPage[]): PageFold {
	return [...pages]
		.sort((a, b) => a.index - b.index)
		.reduce<PageFold>(
			(acc, page) => {
				const text = page.text.trim();
				return text
					? { texts: [...acc.texts, text], failedPages: acc.failedPages }
					: { texts: acc.texts, failedPages: acc.failedPages + 1 };
			},
			{ texts: [], failedPages: 0 }
		);
}

export function createTextExtractor(deps: { pdf: PdfPageReader }): TextExtractor {
	async function extractPdf(bytes: Uint8Array): Promise<ExtractedDocument> {
		let pages: PdfPage[];
		try {
			pages = await deps.pdf.readPages(bytes);
		} catch (err) {
			const providerFailure = isProviderFailure(err);
			console.error('[extract] PDF reader failed', {
				bytes: bytes.byteLength,
				providerFailure,
				error: errorMessage(err)
			});
			if (providerFailure) {
				throw new ProviderError(`Could not extract text from the source: ${describeProviderError(err)}.`, {
					cause: err
				});
			}
			throw new ExtractionError('Could not extract text from the source: the PDF could not be read.', {
				cause: err
			});
		}

		const { texts, failedPages } = foldPages(pages);
		console.log('[extract] PDF pages read', {
			pageCount: pages.length,
			textPages: texts.length,
			failedPages
		});

		if (texts.length === 0) {
			throw new ExtractionError('Could not extract text from the source: no page of the PDF contained text.');
		}

		return {
			text: texts.join('\n\n'),
			contentType: 'pdf',
			pageCount: pages.length,
			failedPages
		};
	}

	async function extractHtml(bytes: Uint8Array, charset: string | undefined): Promise<ExtractedDocument> {
		let text: string;
		try {
			text = await extractVisibleText(decodeHtml(bytes, charset));
		} catch (err) {
			console.error('[extract] HTML parsing failed', { bytes: bytes.byteLength, error: errorMessage(err) });
			throw new ExtractionError('Could not extract text from the source: the page could not be parsed.', {
				cause: err
			});
		}

		console.log('[extract] HTML text extracted', { textLength: text.length });
		return { text, contentType: 'html', pageCount: 1, failedPages: 0 };
	}

	return {
		async extract(bytes, contentType, options = {}) {
			switch (contentType) {
				case 'pdf':
					return extractPdf(bytes);
				case 'html':
					return extractHtml(bytes, options.charset);
				case 'unknown':
					throw new UnsupportedFormatError(
						'Could not extract text from the source: unsupported document format. Please provide a PDF or a web page.'
					);
			}
		}
	};
}
