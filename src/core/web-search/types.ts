/**
 * Providers that run a search here
 */
export const SEARCH_ENGINES = ['duckduckgo', 'brave'] as const;

/**
 * Providers that are recognized but served by another layer
 */
export const DEFERRED_PROVIDERS = ['tavily', 'exa'] as const;

export const WEB_SEARCH_PROVIDERS = [...SEARCH_ENGINES, ...DEFERRED_PROVIDERS] as const;

export type SearchEngineName = (typeof SEARCH_ENGINES)[number];
export type DeferredProviderName = (typeof DEFERRED_PROVIDERS)[number];
export type WebSearchProvider = (typeof WEB_SEARCH_PROVIDERS)[number];

export function isWebSearchProvider(value: string): value is WebSearchProvider {
	return WEB_SEARCH_PROVIDERS.some(provider => provider === value);
}

/**
 * A provider hit after field fallbacks have been applied
 */
export interface SearchHit {
	title: string;
	url: string;
	summary: string;
}

/**
 * A ranked result, optionally carrying fetched article text
 */
export interface SearchResult extends SearchHit {
	/** 1-based, contiguous in provider order */
	index: number;
	content: string | null;
}

/**
 * What a provider hands back: hits, or a note to return verbatim
 */
export type ProviderOutcome = { kind: 'results'; hits: SearchHit[] } | { kind: 'note'; note: string };
