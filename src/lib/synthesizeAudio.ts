import { SynthesisError, errorMessage } from './errors';
import type { AudioArtifact, HostLabel, PodcastScript } from '@/types/podcast';

export interface SpeechProvider {
	/** Returns MP3 bytes for `text` spoken by `voiceId`. */
	speak(text: string, voiceId: string, signal?: AbortSignal): Promise<Buffer>;
}

export interface AudioStore {
	/** Stores an episode and returns a URL a browser can play. */
	save(audio: Buffer): Promise<string>;
}

export type SynthesizeOptions = {
	/** Aborts the whole synthesis, including the upload, once it fires. */
	signal: AbortSignal;
};

export type AudioSynthesizer = {
	synthesize(script: PodcastScript, options: SynthesizeOptions): Promise<Extract<AudioArtifact, { available: true }>>;
};

type Segment = { voiceId: string; text: string };

export const MAX_CHARS_PER_REQUEST = 3000;

/**
 * Splits text into pieces of at most `maxChars`, preferring sentence boundaries.
 */
export function splitForSpeech(text: string, maxChars: number = MAX_CHARS_PER_REQUEST): string[] {
	const sentences = text.trim().split(/(?<=[.!?])\s+/).filter(Boolean);
	const chunks: string[] = [];
	let current = '';

	for (const sentence of sentences) {
		if (sentence.length > maxChars) {
			if (current) chunks.push(current);
			current = '';
			for (let i = 0; i < sentence.length; i += maxChars) {
				chunks.push(sentence.slice(i, i + maxChars));
			}
			continue;
		}
		const candidate = current ? `${current} ${sentence}` : sentence;
		if (candidate.length > maxChars) {
			chunks.push(current);
			current = sentence;
		} else {
			current = candidate;
		}
	}
	if (current) chunks.push(current);
	return chunks;
}

/**
 * Plans the TTS requests for a script. With two distinct voices each turn is voiced by
 * its host; with a single voice the whole script is read by it.
 */
export function planSegments(
	script: PodcastScript,
	voices: Record<'hostA' | 'hostB', string>,
	maxChars: number = MAX_CHARS_PER_REQUEST
): Segment[] {
	if (voices.hostA === voices.hostB) {
		return splitForSpeech(script.rawText.replace(/\s+/g, ' '), maxChars).map((text) => ({
			voiceId: voices.hostA,
			text
		}));
	}

	const voiceFor = (speaker: HostLabel) => (speaker === 'Host A' ? voices.hostA : voices.hostB);
	return script.turns.flatMap((turn) =>
		splitForSpeech(turn.text, maxChars).map((text) => ({ voiceId: voiceFor(turn.speaker), text }))
	);
}

/** Settles with `work`, or rejects with the abort reason as soon as `signal` fires. */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
	if (signal.aborted) return Promise.reject(signal.reason);
	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(signal.reason);
		signal.addEventListener('abort', onAbort, { once: true });
		void work.then(
			(value) => {
				signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(err: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(err);
			}
		);
	});
}

export function createAudioSynthesizer(deps: {
	speech: SpeechProvider;
	store: AudioStore;
	voices: Record<'hostA' | 'hostB', string>;
}): AudioSynthesizer {
	return {
		async synthesize(script, { signal }) {
			const segments = planSegments(script, deps.voices);
			if (segments.length === 0) {
				throw new SynthesisError('The script has no text to synthesize.');
			}

			const startedAt = Date.now();
			console.log('[tts] Starting synthesis', {
				segments: segments.length,
				multiVoice: deps.voices.hostA !== deps.voices.hostB
			});

			const outOfTime = (err: unknown, stage: string) => {
				console.error('[tts] Deadline reached', { stage, elapsedMs: Date.now() - startedAt });
				return new SynthesisError('Text-to-speech ran out of time.', { cause: err });
			};

			// Sequential: segment order is the episode order.
			const audio: Buffer[] = [];
			for (const [i, segment] of segments.entries()) {
				try {
					audio.push(await untilAborted(deps.speech.speak(segment.text, segment.voiceId, signal), signal));
				} catch (err) {
					if (signal.aborted) throw outOfTime(err, `segment ${i + 1} of ${segments.length}`);
					console.error('[tts] Segment failed', {
						segment: i + 1,
						of: segments.length,
						voiceId: segment.voiceId,
						textLength: segment.text.length,
						error: errorMessage(err)
					});
					throw new SynthesisError('Text-to-speech request failed.', { cause: err });
				}
			}

			const episode = Buffer.concat(audio);
			if (episode.byteLength === 0) {
				throw new SynthesisError('Text-to-speech returned no audio.');
			}

			let url: string;
			try {
				url = await untilAborted(deps.store.save(episode), signal);
			} catch (err) {
				if (signal.aborted) throw outOfTime(err, 'upload');
				console.error('[tts] Upload failed', { bytes: episode.byteLength, error: errorMessage(err) });
				throw new SynthesisError('Failed to store the synthesized audio.', { cause: err });
			}

			console.log('[tts] Episode ready', {
				bytes: episode.byteLength,
				elapsedMs: Date.now() - startedAt
			});
			return { available: true, url };
		}
	};
}
