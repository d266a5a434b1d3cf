import type { DocumentAcquirer } from './acquireDocument';
import { SynthesisError, errorMessage } from './errors';
import type { TextExtractor } from './extractText';
import type { ScriptGenerator } from './generateScript';
import type { AudioSynthesizer } from './synthesizeAudio';
import type { AppConfig } from './config';
import type { AudioArtifact, GenerationResult, SourceDescriptor } from '@/types/podcast';

export type PipelineStages = {
	acquirer: DocumentAcquirer;
	extractor: TextExtractor;
	generator: ScriptGenerator;
	synthesizer: AudioSynthesizer;
};

export type PipelineBudget = Pick<AppConfig['limits'], 'requestBudgetMs' | 'synthesisTimeoutMs'>;

export type PodcastPipeline = {
	handle(descriptor: SourceDescriptor): Promise<GenerationResult>;
};

export const AUDIO_UNAVAILABLE_WARNING =
	'Failed to generate audio. The script is shown without an audio version.';

/**
 * Acquire → Extract → Generate → Synthesize, strictly in order. The first three stages
 * abort the request on failure; synthesis failures only leave the audio out.
 *
 * Synthesis gets whatever is left of `requestBudgetMs`, capped at `synthesisTimeoutMs`,
 * so a slow TTS provider or storage upload cannot outlive the request.
 */
export function createPodcastPipeline(stages: PipelineStages, budget: PipelineBudget): PodcastPipeline {
	async function synthesizeBestEffort(
		script: GenerationResult['script'],
		elapsedMs: number
	): Promise<AudioArtifact> {
		const allowanceMs = Math.min(budget.synthesisTimeoutMs, budget.requestBudgetMs - elapsedMs);
		if (allowanceMs <= 0) {
			console.warn('[generate] No time left for audio', { elapsedMs, requestBudgetMs: budget.requestBudgetMs });
			return { available: false, warning: AUDIO_UNAVAILABLE_WARNING };
		}

		try {
			return await stages.synthesizer.synthesize(script, { signal: AbortSignal.timeout(allowanceMs) });
		} catch (err) {
			console.warn('[generate] Continuing without audio', {
				expected: err instanceof SynthesisError,
				error: errorMessage(err)
			});
			return { available: false, warning: AUDIO_UNAVAILABLE_WARNING };
		}
	}

	return {
		async handle(descriptor) {
			const startedAt = Date.now();
			const elapsed = () => Date.now() - startedAt;

			const document = await stages.acquirer.acquire(descriptor);
			console.log('[generate] Acquired', {
				origin: document.origin,
				contentType: document.contentType,
				elapsedMs: elapsed()
			});

			const extracted = await stages.extractor.extract(document.bytes, document.contentType, {
				charset: document.charset
			});
			console.log('[generate] Extracted', {
				textLength: extracted.text.length,
				pageCount: extracted.pageCount,
				failedPages: extracted.failedPages,
				elapsedMs: elapsed()
			});

			const script = await stages.generator.generate(extracted.text);
			console.log('[generate] Script generated', { scriptLength: script.rawText.length, elapsedMs: elapsed() });

			const audio = await synthesizeBestEffort(script, elapsed());
			console.log('[generate] Done', { audioAvailable: audio.available, elapsedMs: elapsed() });

			return { script, audio };
		}
	};
}
