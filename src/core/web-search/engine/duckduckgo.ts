import type { Logger } from '../../logger/index.js';
import { LOG_PREFIXES, SYSTEM_NOTES } from '../constants.js';
import type { ProviderOutcome } from '../types.js';
import { BaseProvider } from './base.js';

/**
 * One text-search hit. Field names vary between client versions, so both
 * spellings are accepted.
 */
export interface DuckDuckGoHit {
	title?: string | null;
	url?: string | null;
	href?: string | null;
	body?: string | null;
	excerpt?: string | null;
}

export interface DuckDuckGoClient {
	text(query: string, maxResults: number): Promise<DuckDuckGoHit[]>;
}

/**
 * Resolves to a client, or null when the client library is not installed
 */
export type DuckDuckGoClientLoader = () => Promise<DuckDuckGoClient | null>;

type DuckDuckScrape = typeof import('duck-duck-scrape');

/**
 * Build a loader around `importLibrary`. A module-not-found failure means the
 * optional dependency is absent and resolves to null; anything else rejects.
 */
export function createDuckDuckScrapeLoader(
	importLibrary: () => Promise<DuckDuckScrape> = () => import('duck-duck-scrape')
): DuckDuckGoClientLoader {
	return async () => {
		let library: DuckDuckScrape;
		try {
			library = await importLibrary();
		} catch (error) {
			if (error instanceof Error && 'code' in error && error.code === 'ERR_MODULE_NOT_FOUND') {
				return null;
			}
			throw error;
		}

		return {
			async text(query: string, maxResults: number): Promise<DuckDuckGoHit[]> {
				const response = await library.search(query);
				if (response.noResults) {
					return [];
				}
				return response.results.slice(0, maxResults).map(result => ({
					title: result.title,
					url: result.url,
					body: result.description,
				}));
			},
		};
	};
}

/**
 * Load `duck-duck-scrape`, an optional dependency, on first use.
 */
export const loadDuckDuckScrape: DuckDuckGoClientLoader = createDuckDuckScrapeLoader();

export interface DuckDuckGoProviderOptions {
	loadClient?: DuckDuckGoClientLoader;
	logger?: Logger;
}

export class DuckDuckGoProvider extends BaseProvider {
	readonly name = 'duckduckgo' as const;
	readonly displayName = 'DuckDuckGo';

	private readonly loadClient: DuckDuckGoClientLoader;
	private client: DuckDuckGoClient | null = null;

	constructor(options: DuckDuckGoProviderOptions = {}) {
		super(options.logger);
		this.loadClient = options.loadClient ?? loadDuckDuckScrape;
	}

	/**
	 * Whether the client library can be loaded
	 */
	async isAvailable(): Promise<boolean> {
		return (await this.getClient()) !== null;
	}

	async search(query: string, maxResults: number): Promise<ProviderOutcome> {
		const client = await this.getClient();
		if (!client) {
			this.logger.warn(`${LOG_PREFIXES.DUCKDUCKGO} Client library not installed`);
			return this.note(SYSTEM_NOTES.DUCKDUCKGO_UNAVAILABLE);
		}

		const raw = await client.text(query, maxResults);
		this.logger.debug(`${LOG_PREFIXES.DUCKDUCKGO} Search returned ${raw.length} results`, {
			query,
		});

		return this.results(
			this.toHits(
				raw.map(hit => ({
					title: hit.title,
					url: hit.url || hit.href,
					summary: hit.body || hit.excerpt,
				})),
				maxResults
			)
		);
	}

	private async getClient(): Promise<DuckDuckGoClient | null> {
		if (!this.client) {
			this.client = await this.loadClient();
		}
		return this.client;
	}
}
