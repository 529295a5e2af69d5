import { readEnv } from '../env.js';
import type { Logger } from '../logger/index.js';
import { JinaReaderClient } from './reader.js';
import { WebSearchManager } from './manager.js';

export interface WebSearchDefaults {
	provider: string;
	maxResults: number;
	fullContentResults: number;
}

/**
 * Request defaults taken from the environment
 */
export function getWebSearchDefaultsFromEnv(): WebSearchDefaults {
	const env = readEnv();
	return {
		provider: env.WEB_SEARCH_PROVIDER,
		maxResults: env.WEB_SEARCH_MAX_RESULTS,
		fullContentResults: env.WEB_SEARCH_FULL_CONTENT_RESULTS,
	};
}

/**
 * Build a manager whose reader points at `READER_BASE_URL`.
 */
export function createWebSearchManagerFromEnv(logger?: Logger): WebSearchManager {
	const env = readEnv();
	const reader = new JinaReaderClient(env.READER_BASE_URL, logger);
	return new WebSearchManager({ reader, logger });
}
