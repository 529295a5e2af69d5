/**
 * Tests for the HTTP surface: client log intake, web search and the
 * shared envelope, request ID and error handling.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { ApiServer } from '../server.js';
import { ClientEventRecorder } from '../../../core/client-events/recorder.js';
import type { ClientLogLevel, EventSink } from '../../../core/client-events/types.js';
import { BaseProvider } from '../../../core/web-search/engine/base.js';
import { WebSearchManager } from '../../../core/web-search/manager.js';
import type { ProviderOutcome } from '../../../core/web-search/types.js';

// Mock the logger
vi.mock('../../../core/logger/index.js', () => ({
	logger: {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	},
}));

class MemorySink implements EventSink {
	lines: Array<{ level: ClientLogLevel; line: string }> = [];
	failing = false;

	write(level: ClientLogLevel, line: string): void {
		if (this.failing) {
			throw new Error('sink closed');
		}
		this.lines.push({ level, line });
	}
}

class FakeDuckDuckGo extends BaseProvider {
	readonly name = 'duckduckgo' as const;
	readonly displayName = 'DuckDuckGo';
	calls: Array<{ query: string; maxResults: number }> = [];

	async search(query: string, maxResults: number): Promise<ProviderOutcome> {
		this.calls.push({ query, maxResults });
		return {
			kind: 'results',
			hits: [{ title: 'Hit', url: 'https://hit.example', summary: 'Found it' }],
		};
	}
}

describe('ApiServer', () => {
	let app: express.Application;
	let sink: MemorySink;
	let provider: FakeDuckDuckGo;

	beforeEach(() => {
		vi.clearAllMocks();
		sink = new MemorySink();
		provider = new FakeDuckDuckGo();
		const server = new ApiServer(
			{
				recorder: new ClientEventRecorder(sink),
				webSearch: new WebSearchManager({
					providers: { duckduckgo: provider },
					reader: { fetchText: async () => null },
				}),
				searchDefaults: { provider: 'duckduckgo', maxResults: 5, fullContentResults: 0 },
			},
			{ port: 0 }
		);
		app = server.getApp();
	});

	describe('GET /health', () => {
		it('reports healthy with a request ID header', async () => {
			const response = await request(app).get('/health');

			expect(response.status).toBe(200);
			expect(response.body.status).toBe('healthy');
			expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
		});
	});

	describe('POST /api/logs/frontend', () => {
		it('records a valid event with the client IP', async () => {
			const response = await request(app)
				.post('/api/logs/frontend')
				.set('X-Forwarded-For', '203.0.113.7')
				.send({
					level: 'error',
					message: 'Widget crashed',
					component: 'Widget',
					metadata: { password: 'test-secret', retry: true },
				});

			expect(response.status).toBe(200);
			expect(response.body.success).toBe(true);
			expect(response.body.data).toEqual({ logged: true });
			expect(response.body.meta.requestId).toBe(response.headers['x-request-id']);
			expect(sink.lines).toEqual([
				{
					level: 'error',
					line: '[Widget] Widget crashed | ip=203.0.113.7 | metadata={"retry":true}',
				},
			]);
		});

		it('rejects an unknown level', async () => {
			const response = await request(app)
				.post('/api/logs/frontend')
				.send({ level: 'critical', message: 'nope' });

			expect(response.status).toBe(400);
			expect(response.body.error.code).toBe('VALIDATION_ERROR');
			expect(sink.lines).toHaveLength(0);
		});

		it('rejects a message over 10000 characters', async () => {
			const response = await request(app)
				.post('/api/logs/frontend')
				.send({ level: 'info', message: 'm'.repeat(10001) });

			expect(response.status).toBe(400);
		});

		it('answers logged: false when the sink fails', async () => {
			sink.failing = true;
			const response = await request(app)
				.post('/api/logs/frontend')
				.send({ level: 'info', message: 'lost' });

			expect(response.status).toBe(200);
			expect(response.body.data).toEqual({ logged: false });
		});
	});

	describe('POST /api/logs/frontend/batch', () => {
		it('records every entry in order', async () => {
			const response = await request(app)
				.post('/api/logs/frontend/batch')
				.send({
					entries: [
						{ level: 'info', message: 'first' },
						{ level: 'debug', message: 'second', url: null },
					],
				});

			expect(response.status).toBe(200);
			expect(response.body.data).toEqual({ logged: 2, failed: 0 });
			expect(sink.lines.map(entry => entry.level)).toEqual(['info', 'debug']);
		});

		it('rejects an empty batch', async () => {
			const response = await request(app).post('/api/logs/frontend/batch').send({ entries: [] });

			expect(response.status).toBe(400);
			expect(response.body.error.code).toBe('VALIDATION_ERROR');
		});
	});

	describe('POST /api/web-search', () => {
		it('returns the formatted text for the default provider', async () => {
			const response = await request(app).post('/api/web-search').send({ query: 'hit' });

			expect(response.status).toBe(200);
			expect(response.body.data).toEqual({
				provider: 'duckduckgo',
				text: 'Result 1:\nTitle: Hit\nURL: https://hit.example\nSummary: Found it',
			});
			expect(provider.calls).toEqual([{ query: 'hit', maxResults: 5 }]);
		});

		it('passes max_results through as a number', async () => {
			await request(app)
				.post('/api/web-search')
				.send({ query: 'hit', provider: 'DuckDuckGo', max_results: 3 });

			expect(provider.calls).toEqual([{ query: 'hit', maxResults: 3 }]);
		});

		it.each(['tavily', 'exa'])('answers 400 for the deferred provider %s', async name => {
			const response = await request(app)
				.post('/api/web-search')
				.send({ query: 'q', provider: name });

			expect(response.status).toBe(400);
			expect(response.body.error).toEqual({
				code: 'BAD_REQUEST',
				message: 'tavily/exa are handled via the tools layer',
			});
			expect(provider.calls).toHaveLength(0);
		});

		it('answers 400 for an unknown provider', async () => {
			const response = await request(app)
				.post('/api/web-search')
				.send({ query: 'q', provider: 'bing' });

			expect(response.status).toBe(400);
			expect(response.body.error.message).toBe('Unknown web search provider: bing');
		});

		it('validates the query and limits', async () => {
			const missingQuery = await request(app).post('/api/web-search').send({});
			const tooMany = await request(app)
				.post('/api/web-search')
				.send({ query: 'q', max_results: 21 });

			expect(missingQuery.status).toBe(400);
			expect(missingQuery.body.error.code).toBe('VALIDATION_ERROR');
			expect(tooMany.status).toBe(400);
			expect(provider.calls).toHaveLength(0);
		});
	});

	describe('error handling', () => {
		it('answers 404 for unknown routes', async () => {
			const response = await request(app).get('/api/unknown');

			expect(response.status).toBe(404);
			expect(response.body.error.code).toBe('NOT_FOUND');
		});

		it('answers 400 for malformed JSON', async () => {
			const response = await request(app)
				.post('/api/logs/frontend')
				.set('Content-Type', 'application/json')
				.send('{"level": ');

			expect(response.status).toBe(400);
			expect(response.body.error.code).toBe('BAD_REQUEST');
		});
	});
});
