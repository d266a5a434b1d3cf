// src/types/podcast.ts
export type SourceDescriptor =
	| { kind: 'remote_url'; url: string }
	| { kind: 'uploaded_file'; bytes: Uint8Array; filename: string };

export type ContentType = 'pdf' | 'html' | 'unknown';

export type AcquiredDocument = {
	bytes: Uint8Array;
	contentType: ContentType;
	/** Source URL or uploaded filename, for logging. */
	origin: string;
	/** Charset from the response's Content-Type, when it named one. */
	charset?: string;
};

export type ExtractedDocument = {
	text: string;
	contentType: ContentType;
	pageCount: number;
	failedPages: number;
};

export type HostLabel = 'Host A' | 'Host B';

export type DialogueTurn = {
	speaker: HostLabel;
	text: string;
};

export type PodcastScript = {
	rawText: string;
	turns: DialogueTurn[];
};

export type AudioArtifact =
	| { available: true; url: string }
	| { available: false; warning: string };

export type GenerationResult = {
	script: PodcastScript;
	audio: AudioArtifact;
};

export type GenerateResponseBody =
	| {
			script: string;
			audio_url?: string;
			warning?: string;
	  }
	| {
			error: string;
	  };
