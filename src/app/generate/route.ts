import { getAppContext } from '@/lib/appContext';
import { respondToGenerate } from '@/lib/generateRequest';

export const runtime = 'nodejs';
export const maxDuration = 300; // OCR, script generation and TTS run back to back

export async function POST(request: Request) {
	const { pipeline, config } = getAppContext();
	return respondToGenerate(request, { pipeline, limits: config.limits });
}
