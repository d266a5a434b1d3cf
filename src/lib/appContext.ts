import { createDocumentAcquirer } from './acquireDocument';
import { loadConfig, type AppConfig } from './config';
import { createElevenLabsSpeech } from './elevenLabs';
import { createTextExtractor } from './extractText';
import { createScriptGenerator } from './generateScript';
import { createMistralClient, createMistralPdfReader, createMistralScriptModel } from './mistral';
import { createPodcastPipeline, type PodcastPipeline } from './podcastPipeline';
import { createSupabaseStorage } from './supabaseServer';
import { createAudioSynthesizer } from './synthesizeAudio';
import { createSupabaseAudioStore } from './uploadToStorage';

export type AppContext = {
	config: AppConfig;
	pipeline: PodcastPipeline;
};

export function buildAppContext(config: AppConfig): AppContext {
	const mistral = createMistralClient(config.mistral);
	const storage = createSupabaseStorage(config.supabase);

	const pipeline = createPodcastPipeline(
		{
			acquirer: createDocumentAcquirer({
				fetchTimeoutMs: config.limits.fetchTimeoutMs,
				maxBytes: config.limits.maxUploadBytes
			}),
			extractor: createTextExtractor({
				pdf: createMistralPdfReader(mistral, config.mistral.ocrModel)
			}),
			generator: createScriptGenerator({
				model: createMistralScriptModel(mistral, config.mistral.scriptModel),
				maxInputChars: config.limits.scriptMaxInputChars
			}),
			synthesizer: createAudioSynthesizer({
				speech: createElevenLabsSpeech(config.elevenLabs),
				store: createSupabaseAudioStore(storage, config.supabase.audioBucket),
				voices: config.elevenLabs.voices
			})
		},
		config.limits
	);

	return { config, pipeline };
}

let context: AppContext | undefined;

/** Built on first use (normally from instrumentation at startup) and reused after. */
export function getAppContext(): AppContext {
	if (!context) {
		context = buildAppContext(loadConfig());
		console.log('[config] Application context ready', {
			scriptModel: context.config.mistral.scriptModel,
			ocrModel: context.config.mistral.ocrModel,
			ttsModel: context.config.elevenLabs.modelId,
			audioBucket: context.config.supabase.audioBucket
		});
	}
	return context;
}
