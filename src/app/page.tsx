'use client';

import { useState, type FormEvent } from 'react';
import type { GenerateResponseBody } from '@/types/podcast';

type SourceMode = 'url' | 'file';

type ViewState =
	| { status: 'idle' }
	| { status: 'loading' }
	| { status: 'error'; message: string }
	| { status: 'done'; script: string; audioUrl?: string; warning?: string };

const palette = {
	background: '#F8F5F2',
	ink: '#3B2F2F',
	muted: '#7A6A62',
	accent: '#C4622D',
	card: '#FFFFFF',
	error: '#A4262C'
};

export default function Home() {
	const [mode, setMode] = useState<SourceMode>('url');
	const [url, setUrl] = useState('');
	const [file, setFile] = useState<File | null>(null);
	const [view, setView] = useState<ViewState>({ status: 'idle' });

	const canSubmit = view.status !== 'loading' && (mode === 'url' ? url.trim() !== '' : file !== null);

	async function handleSubmit(event: FormEvent<HTMLFormElement>) {
		event.preventDefault();
		if (!canSubmit) return;
		setView({ status: 'loading' });

		try {
			let response: Response;
			if (mode === 'file' && file) {
				const formData = new FormData();
				formData.append('file', file);
				response = await fetch('/generate', { method: 'POST', body: formData });
			} else {
				response = await fetch('/generate', {
					method: 'POST',
					headers: { 'Content-Type': 'application/json' },
					body: JSON.stringify({ source: url.trim() })
				});
			}

			const body: GenerateResponseBody = await response.json();
			if ('error' in body) {
				setView({ status: 'error', message: body.error });
				return;
			}
			setView({ status: 'done', script: body.script, audioUrl: body.audio_url, warning: body.warning });
		} catch (err) {
			console.error(err);
			setView({ status: 'error', message: 'Something went wrong. Please try again.' });
		}
	}

	return (
		<main
			style={{
				minHeight: '100vh',
				backgroundColor: palette.background,
				color: palette.ink,
				display: 'flex',
				flexDirection: 'column',
				alignItems: 'center',
				padding: '48px 16px'
			}}
		>
			<h1 style={{ fontSize: '2.5rem', fontWeight: 600, margin: '0 0 8px' }}>Paper to Podcast</h1>
			<p style={{ color: palette.muted, margin: '0 0 32px' }}>
				Paste a link to a research paper or upload a PDF to get a two-host episode.
			</p>

			<form
				onSubmit={handleSubmit}
				style={{
					width: '100%',
					maxWidth: 640,
					backgroundColor: palette.card,
					borderRadius: 16,
					padding: 24,
					boxShadow: '0 2px 12px rgba(59, 47, 47, 0.08)',
					display: 'flex',
					flexDirection: 'column',
					gap: 16
				}}
			>
				<div style={{ display: 'flex', gap: 8 }}>
					{(['url', 'file'] as const).map((option) => (
						<button
							key={option}
							type="button"
							onClick={() => setMode(option)}
							style={{
								padding: '8px 16px',
								borderRadius: 30,
								border: `1px solid ${palette.ink}`,
								backgroundColor: mode === option ? palette.ink : 'transparent',
								color: mode === option ? palette.background : palette.ink,
								cursor: 'pointer'
							}}
						>
							{option === 'url' ? 'Paper URL' : 'Upload PDF'}
						</button>
					))}
				</div>

				{mode === 'url' ? (
					<input
						type="url"
						placeholder="https://example.com/paper.pdf"
						value={url}
						onChange={(event) => setUrl(event.target.value)}
						style={{ padding: 12, borderRadius: 8, border: '1px solid #D8CFC8', fontSize: '1rem' }}
					/>
				) : (
					<input
						type="file"
						accept="application/pdf,.pdf"
						onChange={(event) => setFile(event.target.files?.[0] ?? null)}
					/>
				)}

				<button
					type="submit"
					disabled={!canSubmit}
					style={{
						padding: '12px 20px',
						borderRadius: 30,
						border: 'none',
						backgroundColor: canSubmit ? palette.accent : '#D8CFC8',
						color: '#FFFFFF',
						fontSize: '1rem',
						fontWeight: 500,
						cursor: canSubmit ? 'pointer' : 'not-allowed'
					}}
				>
					{view.status === 'loading' ? 'Generating…' : 'Generate podcast'}
				</button>
			</form>

			{view.status === 'loading' && (
				<div style={{ marginTop: 32, display: 'flex', alignItems: 'center', gap: 12 }}>
					<div
						aria-label="Loading"
						style={{
							width: 24,
							height: 24,
							borderRadius: '50%',
							border: `3px solid #D8CFC8`,
							borderTopColor: palette.accent,
							animation: 'spin 0.8s linear infinite'
						}}
					/>
					<span style={{ color: palette.muted }}>Reading the paper and writing the episode…</span>
					<style>{'@keyframes spin { to { transform: rotate(360deg); } }'}</style>
				</div>
			)}

			{view.status === 'error' && (
				<div
					role="alert"
					style={{
						marginTop: 32,
						maxWidth: 640,
						width: '100%',
						padding: 16,
						borderRadius: 12,
						backgroundColor: '#FBEAEA',
						color: palette.error
					}}
				>
					{view.message}
				</div>
			)}

			{view.status === 'done' && (
				<section style={{ marginTop: 32, maxWidth: 640, width: '100%' }}>
					{view.audioUrl ? (
						<audio controls src={view.audioUrl} style={{ width: '100%', marginBottom: 16 }} />
					) : (
						<p style={{ color: palette.muted, fontStyle: 'italic' }}>
							Audio unavailable{view.warning ? `: ${view.warning}` : '.'}
						</p>
					)}
					<pre
						style={{
							whiteSpace: 'pre-wrap',
							fontFamily: 'inherit',
							lineHeight: 1.6,
							backgroundColor: palette.card,
							padding: 24,
							borderRadius: 16
						}}
					>
						{view.script}
					</pre>
				</section>
			)}
		</main>
	);
}
