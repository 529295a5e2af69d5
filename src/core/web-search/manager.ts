import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { DEFAULTS, LOG_PREFIXES, providerFailedNote } from './constants.js';
import { enrichResults } from './enrichment.js';
import { BaseProvider } from './engine/base.js';
import { BraveProvider } from './engine/brave.js';
import { DuckDuckGoProvider } from './engine/duckduckgo.js';
import { DeferredProviderError, UnknownProviderError } from './errors.js';
import { formatResults } from './formatter.js';
import { JinaReaderClient, type ReaderClient } from './reader.js';
import {
	isWebSearchProvider,
	type ProviderOutcome,
	type SearchEngineName,
	type SearchResult,
} from './types.js';

export interface WebSearchManagerOptions {
	providers?: Partial<Record<SearchEngineName, BaseProvider>>;
	reader?: ReaderClient;
	/** Millisecond clock used for the enrichment budget */
	now?: () => number;
	logger?: Logger;
}

/**
 * Map a caller-supplied provider string to a provider that runs here.
 *
 * @throws {DeferredProviderError} for tavily and exa
 * @throws {UnknownProviderError} for anything unrecognized
 */
export function resolveSearchEngine(provider: string): SearchEngineName {
	const normalized = provider.trim().toLowerCase();
	if (!isWebSearchProvider(normalized)) {
		throw new UnknownProviderError(provider);
	}

	switch (normalized) {
		case 'duckduckgo':
		case 'brave':
			return normalized;
		case 'tavily':
		case 'exa':
			throw new DeferredProviderError(normalized);
		default: {
			const unhandled: never = normalized;
			throw new UnknownProviderError(String(unhandled));
		}
	}
}

/**
 * Runs a search against exactly one provider, optionally fetches full text
 * for the top results, and renders everything as one bounded text block.
 */
export class WebSearchManager {
	private readonly providers: Partial<Record<SearchEngineName, BaseProvider>>;
	private readonly reader: ReaderClient;
	private readonly now: () => number;
	private readonly logger: Logger;

	constructor(options: WebSearchManagerOptions = {}) {
		this.logger = options.logger ?? defaultLogger;
		this.providers = { ...options.providers };
		this.reader = options.reader ?? new JinaReaderClient(DEFAULTS.READER_BASE_URL, this.logger);
		this.now = options.now ?? Date.now;
	}

	/**
	 * Perform a web search. Provider trouble comes back as an inline
	 * `[System Note: ...]` string; only a bad provider name throws.
	 */
	async search(
		query: string,
		provider: string,
		maxResults: number = DEFAULTS.MAX_RESULTS,
		fullContentResults: number = DEFAULTS.FULL_CONTENT_RESULTS
	): Promise<string> {
		const engine = this.getProvider(resolveSearchEngine(provider));
		const limit = Math.max(0, Math.floor(maxResults));

		this.logger.debug(`${LOG_PREFIXES.MANAGER} Starting search`, {
			provider: engine.name,
			maxResults: limit,
			fullContentResults,
		});

		const startedAt = this.now();
		let outcome: ProviderOutcome;
		try {
			outcome = await engine.search(query, limit);
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			this.logger.warn(`${LOG_PREFIXES.MANAGER} Search failed`, {
				provider: engine.name,
				error: reason,
			});
			return providerFailedNote(engine.displayName, reason);
		}

		if (outcome.kind === 'note') {
			return outcome.note;
		}

		const results: SearchResult[] = outcome.hits.slice(0, limit).map((hit, position) => ({
			index: position + 1,
			...hit,
			content: null,
		}));

		const enriched = await enrichResults(results, fullContentResults, {
			reader: this.reader,
			startedAt,
			now: this.now,
			logger: this.logger,
		});

		this.logger.debug(`${LOG_PREFIXES.MANAGER} Search completed`, {
			provider: engine.name,
			results: enriched.length,
			enriched: enriched.filter(result => result.content !== null).length,
			executionTime: this.now() - startedAt,
		});

		return formatResults(enriched);
	}

	/**
	 * Get the provider instance for an engine, creating it on first use
	 */
	getProvider(name: SearchEngineName): BaseProvider {
		const existing = this.providers[name];
		if (existing) {
			return existing;
		}

		const created = this.createProvider(name);
		this.providers[name] = created;
		return created;
	}

	private createProvider(name: SearchEngineName): BaseProvider {
		switch (name) {
			case 'duckduckgo':
				return new DuckDuckGoProvider({ logger: this.logger });
			case 'brave':
				return new BraveProvider({ logger: this.logger });
		}
	}
}
