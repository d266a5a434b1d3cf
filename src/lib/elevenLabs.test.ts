import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createElevenLabsSpeech, type TextToSpeechApi } from './elevenLabs';

const config = {
	apiKey: 'test-secret',
	modelId: 'eleven_flash_v2_5',
	voices: { hostA: 'voice-a', hostB: 'voice-b' },
	timeoutSeconds: 60
};

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
	const encoder = new TextEncoder();
	return new ReadableStream<Uint8Array>({
		start(controller) {
			for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
			controller.close();
		}
	});
}

describe('createElevenLabsSpeech', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('requests one segment with retries off and the configured timeout', async () => {
		const convert = vi.fn<TextToSpeechApi['convert']>().mockResolvedValue(streamOf('mp3'));
		const speech = createElevenLabsSpeech(config, { textToSpeech: { convert } });
		const signal = new AbortController().signal;

		await speech.speak('Welcome to the show.', 'voice-a', signal);

		expect(convert).toHaveBeenCalledWith(
			'voice-a',
			{
				text: 'Welcome to the show.',
				modelId: 'eleven_flash_v2_5',
				voiceSettings: { stability: 0.5, similarityBoost: 0.75 }
			},
			{ timeoutInSeconds: 60, maxRetries: 0, abortSignal: signal }
		);
	});

	it('reads a streamed response into one buffer', async () => {
		const convert = vi.fn<TextToSpeechApi['convert']>().mockResolvedValue(streamOf('ID3', '-frame-1', '-frame-2'));
		const speech = createElevenLabsSpeech(config, { textToSpeech: { convert } });

		const audio = await speech.speak('Hello.', 'voice-b');

		expect(audio.toString()).toBe('ID3-frame-1-frame-2');
	});

	it('accepts a byte array response', async () => {
		const convert = vi.fn<TextToSpeechApi['convert']>().mockResolvedValue(new Uint8Array([0xff, 0xfb, 0x90]));
		const speech = createElevenLabsSpeech(config, { textToSpeech: { convert } });

		const audio = await speech.speak('Hello.', 'voice-b');

		expect(Buffer.isBuffer(audio)).toBe(true);
		expect(Array.from(audio)).toEqual([0xff, 0xfb, 0x90]);
	});

	it('lets provider errors propagate', async () => {
		const convert = vi.fn<TextToSpeechApi['convert']>().mockRejectedValue(new Error('quota exceeded'));
		const speech = createElevenLabsSpeech(config, { textToSpeech: { convert } });

		await expect(speech.speak('Hello.', 'voice-b')).rejects.toThrow('quota exceeded');
	});
});
