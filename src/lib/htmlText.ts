import { Window, type Node } from 'happy-dom';

const HIDDEN_SELECTOR = [
	'head',
	'script',
	'style',
	'noscript',
	'template',
	'svg',
	'iframe',
	'[hidden]',
	'[aria-hidden="true"]'
].join(', ');

const BLOCK_ELEMENTS = new Set([
	'ADDRESS',
	'ARTICLE',
	'ASIDE',
	'BLOCKQUOTE',
	'BR',
	'CAPTION',
	'DD',
	'DIV',
	'DL',
	'DT',
	'FIGCAPTION',
	'FIGURE',
	'FOOTER',
	'H1',
	'H2',
	'H3',
	'H4',
	'H5',
	'H6',
	'HEADER',
	'HR',
	'LI',
	'MAIN',
	'NAV',
	'OL',
	'P',
	'PRE',
	'SECTION',
	'TABLE',
	'TD',
	'TH',
	'TR',
	'UL'
]);

const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?\s*([\w:.-]+)/i;
const UTF8_BOM = [0xef, 0xbb, 0xbf];
// Browsers look for a <meta> charset within the first 1024 bytes.
const META_PRESCAN_BYTES = 1024;

/** The charset a page declares in a `<meta>` tag, if any. */
export function charsetFromMeta(bytes: Uint8Array): string | undefined {
	const head = Buffer.from(bytes.subarray(0, META_PRESCAN_BYTES)).toString('latin1');
	return head.match(META_CHARSET)?.[1]?.toLowerCase();
}

/**
 * Decodes page bytes using, in order, a UTF-8 byte order mark, the charset the server
 * declared, a `<meta>` charset and finally UTF-8. Unknown labels fall back to UTF-8.
 */
export function decodeHtml(bytes: Uint8Array, declaredCharset?: string): string {
	const hasBom = UTF8_BOM.every((byte, i) => bytes[i] === byte);
	const label = hasBom ? 'utf-8' : (declaredCharset ?? charsetFromMeta(bytes) ?? 'utf-8');

	let decoder: TextDecoder;
	try {
		decoder = new TextDecoder(label);
	} catch (err) {
		if (!(err instanceof RangeError)) throw err;
		console.warn('[extract] Unknown charset, decoding as UTF-8', { charset: label });
		decoder = new TextDecoder('utf-8');
	}
	return decoder.decode(bytes);
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

function collectText(node: Node, out: string[]): void {
	if (node.nodeType === TEXT_NODE) {
		out.push(node.textContent ?? '');
		return;
	}
	if (node.nodeType !== ELEMENT_NODE) return;

	const isBlock = BLOCK_ELEMENTS.has(node.nodeName);
	if (isBlock) out.push(' ');
	for (const child of Array.from(node.childNodes)) {
		collectText(child, out);
	}
	if (isBlock) out.push(' ');
}

/**
 * Returns the visible text of an HTML page: script, style and hidden content are
 * dropped, block elements are separated by a space and whitespace is collapsed.
 */
export async function extractVisibleText(html: string): Promise<string> {
	const window = new Window({
		settings: {
			disableJavaScriptFileLoading: true,
			disableCSSFileLoading: true,
			disableIframePageLoading: true
		}
	});

	try {
		const parser = new window.DOMParser();
		const doc = parser.parseFromString(html, 'text/html');
		for (const element of Array.from(doc.querySelectorAll(HIDDEN_SELECTOR))) {
			element.remove();
		}

		const root = doc.body ?? doc.documentElement;
		if (!root) return '';

		const parts: string[] = [];
		collectText(root, parts);
		return parts.join('').replace(/\s+/g, ' ').trim();
	} finally {
		await window.happyDOM.close();
	}
}
