// Runs once when the Next.js server starts. A missing API key or malformed setting
// stops the server here instead of failing the first request.
export async function register() {
	if (process.env.NEXT_RUNTIME !== 'nodejs') return;

	const { getAppContext } = await import('./lib/appContext');
	try {
		getAppContext();
	} catch (err) {
		console.error('[config] Startup aborted', err instanceof Error ? err.message : err);
		throw err;
	}
}
