import type { ContentType } from '@/types/podcast';

// A PDF header may be preceded by junk; readers accept it within the first 1024 bytes.
// It must still open a line, so prose that mentions the signature is not a PDF.
const PDF_SIGNATURE = /(?:^|[\r\n])[\t\f ]*%PDF-/;
const PDF_HEADER_WINDOW = 1024;

// Tags from the WHATWG MIME sniffing algorithm ("text/html" patterns).
const HTML_PREFIXES = [
	'<!doctype html',
	'<html',
	'<head',
	'<script',
	'<iframe',
	'<h1',
	'<div',
	'<font',
	'<table',
	'<a',
	'<style',
	'<title',
	'<b',
	'<body',
	'<br',
	'<p',
	'<!--'
];

/**
 * Detects a document type from its leading bytes. Filenames are never consulted.
 */
export function sniffContentType(bytes: Uint8Array): ContentType {
	const head = Buffer.from(bytes.subarray(0, PDF_HEADER_WINDOW)).toString('latin1');

	const trimmed = head.replace(/^\u00EF\u00BB\u00BF/, '').replace(/^[\t\n\f\r ]+/, '');
	const lower = trimmed.toLowerCase();
	for (const prefix of HTML_PREFIXES) {
		if (!lower.startsWith(prefix)) continue;
		const terminator = lower.charAt(prefix.length);
		if (terminator === ' ' || terminator === '>') return 'html';
	}

	return PDF_SIGNATURE.test(head) ? 'pdf' : 'unknown';
}

/** Maps a Content-Type header value to a document type. */
export function contentTypeFromHeader(header: string | null): ContentType {
	if (!header) return 'unknown';
	const mime = header.split(';')[0].trim().toLowerCase();
	if (mime === 'application/pdf' || mime === 'application/x-pdf') return 'pdf';
	if (mime === 'text/html' || mime === 'application/xhtml+xml') return 'html';
	return 'unknown';
}

/** The `charset` parameter of a Content-Type header value. */
export function charsetFromHeader(header: string | null): string | undefined {
	const match = header?.match(/;\s*charset\s*=\s*"?([^";\s]+)"?/i);
	return match?.[1]?.toLowerCase();
}

/** Maps the path suffix of a URL to a document type. */
export function contentTypeFromUrl(url: string): ContentType {
	let pathname: string;
	try {
		pathname = new URL(url).pathname.toLowerCase();
	} catch {
		return 'unknown';
	}
	if (pathname.endsWith('.pdf')) return 'pdf';
	if (pathname.endsWith('.html') || pathname.endsWith('.htm')) return 'html';
	return 'unknown';
}
