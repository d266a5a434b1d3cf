import { z } from 'zod';
import { ConfigError } from './errors';

const optionalString = z
	.string()
	.trim()
	.transform((value) => (value === '' ? undefined : value))
	.optional();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
	.object({
		MISTRAL_API_KEY: z
			.string({ required_error: 'MISTRAL_API_KEY is required' })
			.trim()
			.min(1, 'MISTRAL_API_KEY is required'),
		MISTRAL_SCRIPT_MODEL: z.string().trim().min(1).default('mistral-large-latest'),
		MISTRAL_OCR_MODEL: z.string().trim().min(1).default('mistral-ocr-latest'),
		MISTRAL_TIMEOUT_MS: positiveInt(120_000),

		ELEVENLABS_API_KEY: z
			.string({ required_error: 'ELEVENLABS_API_KEY is required' })
			.trim()
			.min(1, 'ELEVENLABS_API_KEY is required'),
		ELEVENLABS_HOST_A_VOICE_ID: optionalString,
		ELEVENLABS_HOST_B_VOICE_ID: optionalString,
		ELEVENLABS_DEFAULT_VOICE_ID: optionalString,
		ELEVENLABS_MODEL_ID: z.string().trim().min(1).default('eleven_flash_v2_5'),
		ELEVENLABS_TIMEOUT_SECONDS: positiveInt(60),

		NEXT_PUBLIC_SUPABASE_URL: z
			.string({ required_error: 'NEXT_PUBLIC_SUPABASE_URL is required' })
			.trim()
			.url('NEXT_PUBLIC_SUPABASE_URL must be a URL'),
		// Prefer secret key (new format) but fall back to service role key (legacy)
		SUPABASE_SECRET_KEY: optionalString,
		SUPABASE_SERVICE_ROLE_KEY: optionalString,
		PODCAST_AUDIO_BUCKET: z.string().trim().min(1).default('podcast-audio'),
		SUPABASE_UPLOAD_TIMEOUT_MS: positiveInt(30_000),

		FETCH_TIMEOUT_MS: positiveInt(10_000),
		MAX_UPLOAD_BYTES: positiveInt(16 * 1024 * 1024),
		SCRIPT_MAX_INPUT_CHARS: positiveInt(15_000),
		SYNTHESIS_TIMEOUT_MS: positiveInt(120_000),
		// Keep below maxDuration in src/app/generate/route.ts.
		REQUEST_BUDGET_MS: positiveInt(280_000)
	})
	.superRefine((env, ctx) => {
		if (!env.SUPABASE_SECRET_KEY && !env.SUPABASE_SERVICE_ROLE_KEY) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['SUPABASE_SECRET_KEY'],
				message: 'SUPABASE_SECRET_KEY (or SUPABASE_SERVICE_ROLE_KEY) is required'
			});
		}
		if (!env.ELEVENLABS_HOST_A_VOICE_ID && !env.ELEVENLABS_DEFAULT_VOICE_ID) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['ELEVENLABS_HOST_A_VOICE_ID'],
				message: 'ELEVENLABS_HOST_A_VOICE_ID (or ELEVENLABS_DEFAULT_VOICE_ID) is required'
			});
		}
		if (!env.ELEVENLABS_HOST_B_VOICE_ID && !env.ELEVENLABS_DEFAULT_VOICE_ID) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['ELEVENLABS_HOST_B_VOICE_ID'],
				message: 'ELEVENLABS_HOST_B_VOICE_ID (or ELEVENLABS_DEFAULT_VOICE_ID) is required'
			});
		}
	});

export type AppConfig = {
	mistral: {
		apiKey: string;
		scriptModel: string;
		ocrModel: string;
		timeoutMs: number;
	};
	elevenLabs: {
		apiKey: string;
		modelId: string;
		voices: { hostA: string; hostB: string };
		timeoutSeconds: number;
	};
	supabase: {
		url: string;
		serviceKey: string;
		audioBucket: string;
		uploadTimeoutMs: number;
	};
	limits: {
		fetchTimeoutMs: number;
		maxUploadBytes: number;
		scriptMaxInputChars: number;
		synthesisTimeoutMs: number;
		requestBudgetMs: number;
	};
};

/**
 * Validates the environment into an {@link AppConfig}. Throws a {@link ConfigError}
 * naming every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const parsed = EnvSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(
			parsed.error.issues.map((issue) =>
				issue.path.length > 0 && !issue.message.startsWith(String(issue.path[0]))
					? `${issue.path.join('.')}: ${issue.message}`
					: issue.message
			)
		);
	}

	const e = parsed.data;
	const hostA = e.ELEVENLABS_HOST_A_VOICE_ID ?? e.ELEVENLABS_DEFAULT_VOICE_ID;
	const hostB = e.ELEVENLABS_HOST_B_VOICE_ID ?? e.ELEVENLABS_DEFAULT_VOICE_ID;
	const serviceKey = e.SUPABASE_SECRET_KEY ?? e.SUPABASE_SERVICE_ROLE_KEY;
	// superRefine already rejected these; the check narrows the types.
	if (!hostA || !hostB || !serviceKey) {
		throw new ConfigError(['Voice ids and Supabase key must be set']);
	}

	return {
		mistral: {
			apiKey: e.MISTRAL_API_KEY,
			scriptModel: e.MISTRAL_SCRIPT_MODEL,
			ocrModel: e.MISTRAL_OCR_MODEL,
			timeoutMs: e.MISTRAL_TIMEOUT_MS
		},
		elevenLabs: {
			apiKey: e.ELEVENLABS_API_KEY,
			modelId: e.ELEVENLABS_MODEL_ID,
			voices: { hostA, hostB },
			timeoutSeconds: e.ELEVENLABS_TIMEOUT_SECONDS
		},
		supabase: {
			url: e.NEXT_PUBLIC_SUPABASE_URL,
			serviceKey,
			audioBucket: e.PODCAST_AUDIO_BUCKET,
			uploadTimeoutMs: e.SUPABASE_UPLOAD_TIMEOUT_MS
		},
		limits: {
			fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
			maxUploadBytes: e.MAX_UPLOAD_BYTES,
			scriptMaxInputChars: e.SCRIPT_MAX_INPUT_CHARS,
			synthesisTimeoutMs: e.SYNTHESIS_TIMEOUT_MS,
			requestBudgetMs: e.REQUEST_BUDGET_MS
		}
	};
}
