import { PodcastDialogueSchema } from './dialogueSchema';
import { GenerationError, describeProviderError, errorMessage } from './errors';
import type { DialogueTurn, HostLabel, PodcastScript } from '@/types/podcast';

/** A single prompt-in, text-out call to a chat model. */
export interface ScriptModel {
	complete(request: { system: string; prompt: string }): Promise<string>;
}

export type ScriptGenerator = {
	generate(text: string): Promise<PodcastScript>;
};

// How far back from the budget a truncation may move to land on whitespace.
const TRUNCATION_BACKTRACK = 200;

export const SCRIPT_SYSTEM_PROMPT =
	'You are a professional podcast writer. You turn research papers into engaging, ' +
	'accurate conversations between two hosts, and you always answer with JSON.';

export function truncateForPrompt(
	text: string,
	maxChars: number
): { text: string; truncated: boolean } {
	if (text.length <= maxChars) return { text, truncated: false };

	const slice = text.slice(0, maxChars);
	const lastSpace = slice.search(/\s\S*$/);
	const cut = lastSpace > 0 && lastSpace >= maxChars - TRUNCATION_BACKTRACK ? slice.slice(0, lastSpace) : slice;
	return { text: cut.trimEnd(), truncated: true };
}

export function buildScriptPrompt(paperText: string, truncated: boolean): string {
	return [
		'Write the script for a two-host podcast episode that explains the research paper below ' +
			'to a curious, technically literate audience.',
		'',
		'Hosts:',
		'- Host A leads the episode, introduces the paper and asks the questions a listener would ask.',
		'- Host B has read the paper closely and explains it in plain language.',
		'',
		'Cover, in order:',
		'1. An engaging opening that hooks the listener and says why the paper matters.',
		'2. The problem and motivation behind the work.',
		'3. The method, simplified without losing what makes it work.',
		'4. The key findings, with concrete numbers where the paper gives them.',
		'5. Implications, limitations and a thought-provoking close.',
		'',
		'Rules:',
		'- Alternate speakers on every turn, starting with Host A.',
		'- Write only spoken words: no sound effects, stage directions or markdown.',
		'- Stay faithful to the paper and never invent results.',
		'',
		'Respond with JSON only, shaped as {"turns":[{"speaker":"Host A","text":"..."},{"speaker":"Host B","text":"..."}]}.',
		...(truncated
			? ['', 'The paper text was cut to its opening sections to fit; do not speculate about the missing part.']
			: []),
		'',
		'Paper text:',
		'"""',
		paperText,
		'"""'
	].join('\n');
}

export function normalizeSpeaker(raw: string): HostLabel | null {
	const key = raw.toLowerCase().replace(/[^a-z]/g, '');
	if (key === 'hosta' || key === 'a') return 'Host A';
	if (key === 'hostb' || key === 'b') return 'Host B';
	return null;
}

function stripCodeFence(content: string): string {
	const trimmed = content.trim();
	const fenced = trimmed.match(/^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/);
	return fenced ? fenced[1] : trimmed;
}

const SPEAKER_LINE = /^\s*[*_]*\s*(host[\s_-]*[ab])\s*[*_]*\s*[:：]\s*[*_]*\s*(.*)$/i;

/** Parses `Host A: ...` lines; unlabelled lines continue the previous turn. */
export function parseSpeakerLines(content: string): DialogueTurn[] {
	const turns: DialogueTurn[] = [];
	for (const line of content.split('\n')) {
		const match = line.match(SPEAKER_LINE);
		const speaker = match ? normalizeSpeaker(match[1]) : null;
		if (match && speaker) {
			turns.push({ speaker, text: match[2].trim() });
			continue;
		}
		const last = turns[turns.length - 1];
		if (last && line.trim()) {
			last.text = `${last.text} ${line.trim()}`.trim();
		}
	}
	return turns.filter((turn) => turn.text.length > 0);
}

/**
 * Reads the model's reply as `{ turns: [...] }` JSON, falling back to labelled lines.
 * Returns null when neither shape is present.
 */
export function parseDialogue(content: string): DialogueTurn[] | null {
	const body = stripCodeFence(content);

	let json: unknown;
	try {
		json = JSON.parse(body);
	} catch {
		const turns = parseSpeakerLines(body);
		return turns.length > 0 ? turns : null;
	}

	const parsed = PodcastDialogueSchema.safeParse(json);
	if (!parsed.success) return null;

	const turns: DialogueTurn[] = [];
	for (const turn of parsed.data.turns) {
		const speaker = normalizeSpeaker(turn.speaker);
		const text = turn.text.trim();
		if (!speaker) {
			console.warn('[script] Dropping turn with unknown speaker', { speaker: turn.speaker });
			continue;
		}
		if (text) turns.push({ speaker, text });
	}
	return turns;
}

/** Merges consecutive turns by the same host so speakers strictly alternate. */
export function alternateTurns(turns: DialogueTurn[]): DialogueTurn[] {
	return turns.reduce<DialogueTurn[]>((acc, turn) => {
		const last = acc[acc.length - 1];
		if (last && last.speaker === turn.speaker) {
			return [...acc.slice(0, -1), { speaker: last.speaker, text: `${last.text} ${turn.text}` }];
		}
		return [...acc, turn];
	}, []);
}

export function renderScript(turns: DialogueTurn[]): string {
	return turns.map((turn) => `${turn.speaker}: ${turn.text}`).join('\n\n');
}

export function createScriptGenerator(deps: {
	model: ScriptModel;
	maxInputChars: number;
}): ScriptGenerator {
	return {
		async generate(text) {
			const paperText = text.trim();
			if (!paperText) {
				throw new GenerationError('Failed to generate podcast script: the document contained no text.');
			}

			const excerpt = truncateForPrompt(paperText, deps.maxInputChars);
			if (excerpt.truncated) {
				console.warn('[script] Paper text truncated for the prompt', {
					originalLength: paperText.length,
					keptLength: excerpt.text.length
				});
			}

			let content: string;
			try {
				content = await deps.model.complete({
					system: SCRIPT_SYSTEM_PROMPT,
					prompt: buildScriptPrompt(excerpt.text, excerpt.truncated)
				});
			} catch (err) {
				console.error('[script] Model call failed', { error: errorMessage(err) });
				throw new GenerationError(`Failed to generate podcast script: ${describeProviderError(err)}.`, {
					cause: err
				});
			}

			if (!content.trim()) {
				throw new GenerationError('Failed to generate podcast script: the model returned an empty completion.');
			}

			const parsed = parseDialogue(content);
			if (!parsed || parsed.length === 0) {
				console.error('[script] Unusable completion', {
					contentLength: content.length,
					contentPreview: content.slice(0, 80)
				});
				throw new GenerationError('Failed to generate podcast script: the model returned a malformed script.');
			}

			const turns = alternateTurns(parsed);
			const speakers = new Set(turns.map((turn) => turn.speaker));
			if (!speakers.has('Host A') || !speakers.has('Host B')) {
				throw new GenerationError('Failed to generate podcast script: the dialogue needs both hosts.');
			}

			console.log('[script] Script ready', { turns: turns.length, truncatedInput: excerpt.truncated });
			return { rawText: renderScript(turns), turns };
		}
	};
}
