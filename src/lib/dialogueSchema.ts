import { z } from 'zod';

export const HostTurnSchema = z.object({
	speaker: z.string().min(1).describe("Which host is speaking: 'Host A' or 'Host B'."),
	text: z.string().min(1).describe('Only the words spoken aloud, without the speaker label.')
});

export const PodcastDialogueSchema = z.object({
	turns: z.array(HostTurnSchema).min(1).describe('Every turn of the episode, strictly in order.')
});

export type HostTurn = z.infer<typeof HostTurnSchema>;
export type PodcastDialogue = z.infer<typeof PodcastDialogueSchema>;
