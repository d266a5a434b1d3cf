// src/lib/supabaseServer.ts
import { StorageClient } from '@supabase/storage-js';
import type { AppConfig } from './config';

/** Wraps `fetchImpl` so no request outlives `timeoutMs`, whatever signal the caller passes. */
export function fetchWithTimeout(timeoutMs: number, fetchImpl: typeof fetch = fetch): typeof fetch {
	return (input, init) => {
		const timeout = AbortSignal.timeout(timeoutMs);
		const signal = init?.signal ? AbortSignal.any([init.signal, timeout]) : timeout;
		return fetchImpl(input, { ...init, signal });
	};
}

// Service-role Storage client; the app only writes episode audio, so no auth session
// or realtime socket is opened.
export function createSupabaseStorage(
	config: AppConfig['supabase'],
	fetchImpl: typeof fetch = fetch
): StorageClient {
	const serviceKey = config.serviceKey;
	return new StorageClient(
		`${config.url.replace(/\/+$/, '')}/storage/v1`,
		{
			apikey: serviceKey,
			Authorization: `Bearer ${serviceKey}`
		},
		fetchWithTimeout(config.uploadTimeoutMs, fetchImpl)
	);
}
