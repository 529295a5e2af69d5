/**
 * Web Search Module Constants
 *
 * Log prefixes, size limits, time budgets and the inline notes returned
 * in place of results.
 *
 * @module web-search/constants
 */

/**
 * Log prefixes for consistent logging across the web search module
 */
export const LOG_PREFIXES = {
	MANAGER: '[WebSearch:Manager]',
	DUCKDUCKGO: '[WebSearch:DuckDuckGo]',
	BRAVE: '[WebSearch:Brave]',
	READER: '[WebSearch:Reader]',
	ENRICHMENT: '[WebSearch:Enrichment]',
} as const;

/**
 * Text size limits, in characters
 */
export const LIMITS = {
	CONTENT: 2000,
	SUMMARY: 800,
	SHORT_CONTENT: 500,
	EXTRA_SNIPPETS: 2,
	LOGGED_ERROR_BODY: 300,
} as const;

export const TRUNCATION_SUFFIX = '...';

/**
 * Timeouts and budgets, in milliseconds
 */
export const TIMEOUTS = {
	SEARCH_BUDGET: 60000,
	// Enrichment stops once the remaining budget is at or below this
	BUDGET_FLOOR: 5000,
	READER_FETCH: 25000,
	BRAVE_REQUEST: 30000,
} as const;

export const DEFAULTS = {
	MAX_RESULTS: 5,
	FULL_CONTENT_RESULTS: 0,
	READER_BASE_URL: 'https://r.jina.ai',
} as const;

export const BRAVE_API_URL = 'https://api.search.brave.com/res/v1/web/search';

export const NO_RESULTS_MESSAGE = 'No web search results found.';

export const FALLBACK_TITLE = 'No Title';

export const FALLBACK_SUMMARY = 'No description available.';

/**
 * Notes returned inline instead of results when a provider cannot answer
 */
export const SYSTEM_NOTES = {
	DUCKDUCKGO_UNAVAILABLE:
		'[System Note: DuckDuckGo search is unavailable (missing duck-duck-scrape dependency).]',
	BRAVE_NOT_CONFIGURED:
		'[System Note: Brave search is not configured. Set ENABLE_BRAVE=true and BRAVE_API_KEY.]',
	BRAVE_FAILED: '[System Note: Brave search failed. Please check your API key.]',
	SHORT_CONTENT: '[System Note: Full content fetch yielded limited text. Appending original summary.]',
} as const;

export const providerFailedNote = (displayName: string, reason: string): string =>
	`[System Note: ${displayName} search failed: ${reason}]`;
