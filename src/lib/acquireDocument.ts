import { charsetFromHeader, contentTypeFromHeader, contentTypeFromUrl, sniffContentType } from './contentType';
import { FetchError, InvalidRequestError, errorMessage } from './errors';
import { addressesOf, isNonPublicAddress, resolveHost, type HostResolver } from './hostGuard';
import type { AcquiredDocument, ContentType, SourceDescriptor } from '@/types/podcast';

type AcquirerOptions = {
	fetchTimeoutMs: number;
	maxBytes: number;
	fetch?: typeof fetch;
	resolveHost?: HostResolver;
};

export type DocumentAcquirer = {
	acquire(descriptor: SourceDescriptor): Promise<AcquiredDocument>;
};

const REQUEST_HEADERS = {
	'User-Agent': 'Mozilla/5.0 (compatible; PaperPodcastBot/1.0)',
	Accept: 'application/pdf,text/html,application/xhtml+xml;q=0.9,*/*;q=0.8'
};

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export function createDocumentAcquirer(options: AcquirerOptions): DocumentAcquirer {
	const fetchImpl = options.fetch ?? fetch;
	const resolver = options.resolveHost ?? resolveHost;

	function tooLarge(url: string): FetchError {
		return new FetchError(`Document at ${url} exceeds the ${options.maxBytes} byte limit.`);
	}

	async function assertPublicTarget(target: URL, requested: string): Promise<void> {
		let addresses: string[];
		try {
			addresses = await addressesOf(target, resolver);
		} catch (err) {
			console.error('[acquire] Host lookup failed', { host: target.hostname, error: errorMessage(err) });
			throw new FetchError(`Could not reach ${requested}.`, { cause: err });
		}
		if (addresses.length === 0 || addresses.some(isNonPublicAddress)) {
			console.warn('[acquire] Refusing non-public host', { host: target.hostname, addresses });
			throw new InvalidRequestError(`Refusing to fetch ${requested}: it points to a private or local address.`);
		}
	}

	// Follows redirects itself so every hop is checked before it is requested.
	async function request(url: string, signal: AbortSignal): Promise<Response> {
		let target = new URL(url);
		for (let hop = 0; ; hop++) {
			await assertPublicTarget(target, url);

			let response: Response;
			try {
				response = await fetchImpl(target.toString(), {
					headers: REQUEST_HEADERS,
					redirect: 'manual',
					signal
				});
			} catch (err) {
				const timedOut = err instanceof Error && err.name === 'TimeoutError';
				console.error('[acquire] Fetch failed', { url: target.toString(), timedOut, error: errorMessage(err) });
				throw new FetchError(
					timedOut ? `Timed out fetching ${url} after ${options.fetchTimeoutMs} ms.` : `Could not reach ${url}.`,
					{ cause: err }
				);
			}

			const location = response.headers.get('location');
			if (!REDIRECT_STATUSES.has(response.status) || !location) return response;
			if (hop >= MAX_REDIRECTS) {
				throw new FetchError(`Too many redirects fetching ${url}.`);
			}
			await response.body?.cancel();

			const next = new URL(location, target);
			if (next.protocol !== 'http:' && next.protocol !== 'https:') {
				throw new FetchError(`Redirect from ${url} left http(s).`);
			}
			target = next;
		}
	}

	// Reads the body chunk by chunk and stops as soon as it passes the cap.
	async function readCapped(response: Response, url: string): Promise<Uint8Array> {
		if (!response.body) return new Uint8Array(0);
		const reader = response.body.getReader();
		const chunks: Uint8Array[] = [];
		let received = 0;

		while (true) {
			const { done, value } = await reader.read();
			if (done) break;
			received += value.byteLength;
			if (received > options.maxBytes) {
				await reader.cancel();
				throw tooLarge(url);
			}
			chunks.push(value);
		}
		return Buffer.concat(chunks);
	}

	async function fetchRemote(url: string): Promise<AcquiredDocument> {
		const startedAt = Date.now();
		const signal = AbortSignal.timeout(options.fetchTimeoutMs);
		const response = await request(url, signal);

		if (!response.ok) {
			console.error('[acquire] Non-2xx response', { url, status: response.status });
			await response.body?.cancel();
			throw new FetchError(`Failed to fetch URL (${response.status}): ${url}`);
		}

		const declaredLength = Number(response.headers.get('content-length') ?? NaN);
		if (Number.isFinite(declaredLength) && declaredLength > options.maxBytes) {
			await response.body?.cancel();
			throw tooLarge(url);
		}

		let bytes: Uint8Array;
		try {
			bytes = await readCapped(response, url);
		} catch (err) {
			if (err instanceof FetchError) throw err;
			const timedOut = err instanceof Error && err.name === 'TimeoutError';
			throw new FetchError(
				timedOut
					? `Timed out fetching ${url} after ${options.fetchTimeoutMs} ms.`
					: `Failed to read the response body from ${url}.`,
				{ cause: err }
			);
		}

		const contentTypeHeader = response.headers.get('content-type');
		const contentType = resolveRemoteContentType(contentTypeHeader, url, bytes);
		const charset = charsetFromHeader(contentTypeHeader);
		console.log('[acquire] Fetched remote document', {
			url,
			status: response.status,
			bytes: bytes.byteLength,
			contentType,
			charset,
			elapsedMs: Date.now() - startedAt
		});

		return { bytes, contentType, origin: url, charset };
	}

	return {
		async acquire(descriptor) {
			switch (descriptor.kind) {
				case 'remote_url':
					return fetchRemote(descriptor.url);
				case 'uploaded_file': {
					const contentType = sniffContentType(descriptor.bytes);
					console.log('[acquire] Received upload', {
						filename: descriptor.filename,
						bytes: descriptor.bytes.byteLength,
						contentType
					});
					return { bytes: descriptor.bytes, contentType, origin: descriptor.filename };
				}
			}
		}
	};
}

/** Header first, then the URL suffix, then the bytes themselves. */
export function resolveRemoteContentType(
	header: string | null,
	url: string,
	bytes: Uint8Array
): ContentType {
	const fromHeader = contentTypeFromHeader(header);
	if (fromHeader !== 'unknown') return fromHeader;
	const fromUrl = contentTypeFromUrl(url);
	if (fromUrl !== 'unknown') return fromUrl;
	return sniffContentType(bytes);
}
