/**
 * Web Search Module
 *
 * Single-provider web search with optional full-text enrichment, rendered
 * as a bounded text block.
 *
 * @module WebSearch
 */

export { WebSearchManager, resolveSearchEngine } from './manager.js';
export type { WebSearchManagerOptions } from './manager.js';
export { createWebSearchManagerFromEnv, getWebSearchDefaultsFromEnv } from './factory.js';
export type { WebSearchDefaults } from './factory.js';
export { BaseProvider } from './engine/base.js';
export { DuckDuckGoProvider, loadDuckDuckScrape } from './engine/duckduckgo.js';
export type {
	DuckDuckGoClient,
	DuckDuckGoClientLoader,
	DuckDuckGoHit,
	DuckDuckGoProviderOptions,
} from './engine/duckduckgo.js';
export { BraveProvider } from './engine/brave.js';
export type { BraveProviderOptions, BraveSettings } from './engine/brave.js';
export { JinaReaderClient } from './reader.js';
export type { ReaderClient } from './reader.js';
export { enrichResults } from './enrichment.js';
export { formatResults, truncate, withSummaryFallback } from './formatter.js';
export { WebSearchError, UnknownProviderError, DeferredProviderError } from './errors.js';
export type { WebSearchErrorCode } from './errors.js';
export {
	SEARCH_ENGINES,
	DEFERRED_PROVIDERS,
	WEB_SEARCH_PROVIDERS,
	isWebSearchProvider,
} from './types.js';
export type {
	SearchEngineName,
	DeferredProviderName,
	WebSearchProvider,
	SearchHit,
	SearchResult,
	ProviderOutcome,
} from './types.js';
export { DEFAULTS, LIMITS, NO_RESULTS_MESSAGE, SYSTEM_NOTES, TIMEOUTS } from './constants.js';
