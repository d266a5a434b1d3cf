import crypto from 'crypto';
import type { StorageClient } from '@supabase/storage-js';
import type { AudioStore } from './synthesizeAudio';

const EPISODE_PREFIX = 'episodes';

export function episodePath(now: Date = new Date(), id: string = crypto.randomUUID()): string {
	const timestamp = now.toISOString().replace(/[-:]/g, '').replace(/\..*$/, '');
	return `${EPISODE_PREFIX}/${timestamp}-${id}.mp3`;
}

/**
 * Stores finished episodes in a public Supabase Storage bucket and hands back the
 * public URL the page plays from.
 */
export function createSupabaseAudioStore(storage: StorageClient, bucket: string): AudioStore {
	return {
		async save(audio) {
			const path = episodePath();

			const { error: uploadError } = await storage.from(bucket).upload(path, audio, {
				contentType: 'audio/mpeg',
				upsert: false
			});

			if (uploadError) {
				console.error('Supabase storage upload error (episode audio):', uploadError);
				throw new Error(uploadError.message ?? 'Failed to upload audio to Supabase Storage');
			}

			const {
				data: { publicUrl }
			} = storage.from(bucket).getPublicUrl(path);

			return publicUrl;
		}
	};
}
