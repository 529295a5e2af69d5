import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DuckDuckGoProvider, type DuckDuckGoClient, type DuckDuckGoHit } from '../duckduckgo.js';
import { WebSearchManager } from '../../manager.js';

// Mock logger
vi.mock('../../../logger/index.js', () => ({
	logger: {
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	},
}));

const clientReturning = (hits: DuckDuckGoHit[]): DuckDuckGoClient => ({
	text: vi.fn(async (_query: string, _maxResults: number) => hits),
});

describe('DuckDuckGoProvider', () => {
	beforeEach(() => {
		vi.clearAllMocks();
	});

	it('returns the unavailable note when the client library is missing', async () => {
		const provider = new DuckDuckGoProvider({ loadClient: async () => null });

		expect(await provider.isAvailable()).toBe(false);
		expect(await provider.search('anything', 5)).toEqual({
			kind: 'note',
			note: '[System Note: DuckDuckGo search is unavailable (missing duck-duck-scrape dependency).]',
		});
	});

	it('surfaces the note through the manager without throwing', async () => {
		const manager = new WebSearchManager({
			providers: { duckduckgo: new DuckDuckGoProvider({ loadClient: async () => null }) },
		});
		expect(await manager.search('anything', 'duckduckgo')).toBe(
			'[System Note: DuckDuckGo search is unavailable (missing duck-duck-scrape dependency).]'
		);
	});

	it('normalizes hits and applies field fallbacks', async () => {
		const provider = new DuckDuckGoProvider({
			loadClient: async () =>
				clientReturning([
					{ title: 'Primary', url: 'https://a.example', body: 'Body text' },
					{ title: null, href: 'https://b.example', excerpt: 'Excerpt text' },
					{},
				]),
		});

		expect(await provider.search('query', 5)).toEqual({
			kind: 'results',
			hits: [
				{ title: 'Primary', url: 'https://a.example', summary: 'Body text' },
				{ title: 'No Title', url: 'https://b.example', summary: 'Excerpt text' },
				{ title: 'No Title', url: '', summary: 'No description available.' },
			],
		});
	});

	it('caps the hits at maxResults', async () => {
		const client = clientReturning([
			{ title: 'One', url: 'https://1.example' },
			{ title: 'Two', url: 'https://2.example' },
			{ title: 'Three', url: 'https://3.example' },
		]);
		const provider = new DuckDuckGoProvider({ loadClient: async () => client });

		const outcome = await provider.search('query', 2);

		expect(client.text).toHaveBeenCalledWith('query', 2);
		expect(outcome.kind === 'results' ? outcome.hits.map(hit => hit.title) : []).toEqual([
			'One',
			'Two',
		]);
	});

	it('loads the client only once', async () => {
		const loadClient = vi.fn(async () => clientReturning([]));
		const provider = new DuckDuckGoProvider({ loadClient });

		await provider.search('first', 5);
		await provider.search('second', 5);

		expect(loadClient).toHaveBeenCalledTimes(1);
	});

	it('lets client failures propagate to the caller', async () => {
		const provider = new DuckDuckGoProvider({
			loadClient: async () => ({
				text: async () => {
					throw new Error('anomaly detected');
				},
			}),
		});
		await expect(provider.search('query', 5)).rejects.toThrow('anomaly detected');
	});
});
