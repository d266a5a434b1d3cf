import { ElevenLabsClient } from '@elevenlabs/elevenlabs-js';
import type { AppConfig } from './config';
import type { SpeechProvider } from './synthesizeAudio';

/** The part of the ElevenLabs client the speech provider uses. */
export type TextToSpeechApi = {
	convert(
		voiceId: string,
		request: {
			text: string;
			modelId: string;
			voiceSettings: { stability: number; similarityBoost: number };
		},
		requestOptions: { timeoutInSeconds: number; maxRetries: number; abortSignal?: AbortSignal }
	): Promise<ReadableStream<Uint8Array> | Uint8Array>;
};

const VOICE_SETTINGS = {
	stability: 0.5,
	similarityBoost: 0.75
};

async function toBuffer(audioResult: ReadableStream<Uint8Array> | Uint8Array): Promise<Buffer> {
	if (audioResult instanceof ReadableStream) {
		// SDK returned a web ReadableStream – consume it fully into a Buffer
		const arrayBuffer = await new Response(audioResult).arrayBuffer();
		return Buffer.from(arrayBuffer);
	}
	return Buffer.from(audioResult);
}

export function createElevenLabsSpeech(
	config: AppConfig['elevenLabs'],
	client: { textToSpeech: TextToSpeechApi } = new ElevenLabsClient({ apiKey: config.apiKey })
): SpeechProvider {
	return {
		async speak(text, voiceId, signal) {
			const startedAt = Date.now();
			// SDK retries are off; a failed segment fails the episode.
			const audioResult = await client.textToSpeech.convert(
				voiceId,
				{
					text,
					modelId: config.modelId,
					voiceSettings: VOICE_SETTINGS
				},
				{ timeoutInSeconds: config.timeoutSeconds, maxRetries: 0, abortSignal: signal }
			);

			const audioBuffer = await toBuffer(audioResult);
			console.log('[tts] ElevenLabs TTS success', {
				voiceId,
				textLength: text.length,
				textPreview: text.slice(0, 80),
				audioBytes: audioBuffer.length,
				elapsedMs: Date.now() - startedAt
			});
			return audioBuffer;
		}
	};
}
