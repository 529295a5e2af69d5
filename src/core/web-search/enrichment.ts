import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { LOG_PREFIXES, TIMEOUTS } from './constants.js';
import { withSummaryFallback } from './formatter.js';
import type { ReaderClient } from './reader.js';
import type { SearchResult } from './types.js';

export interface EnrichmentContext {
	reader: ReaderClient;
	/** Clock reading taken when the provider call started */
	startedAt: number;
	now: () => number;
	logger?: Logger;
}

/**
 * Fetch full text for the first `count` results, one at a time, while the
 * search budget allows.
 *
 * Each fetch gets `min(READER_FETCH, remaining)`; once the remaining budget
 * drops to `BUDGET_FLOOR` or below, the rest keep their summaries. Returns
 * new result objects and leaves the input untouched.
 */
export async function enrichResults(
	results: ReadonlyArray<SearchResult>,
	count: number,
	context: EnrichmentContext
): Promise<SearchResult[]> {
	const logger = context.logger ?? defaultLogger;
	const enriched = results.map(result => ({ ...result }));
	if (count <= 0) {
		return enriched;
	}

	for (const result of enriched.slice(0, count)) {
		if (!result.url) {
			continue;
		}

		const elapsed = context.now() - context.startedAt;
		const remaining = TIMEOUTS.SEARCH_BUDGET - elapsed;
		if (remaining <= TIMEOUTS.BUDGET_FLOOR) {
			logger.debug(`${LOG_PREFIXES.ENRICHMENT} Search budget exhausted`, {
				elapsed,
				nextIndex: result.index,
			});
			break;
		}

		const content = await context.reader.fetchText(
			result.url,
			Math.min(TIMEOUTS.READER_FETCH, remaining)
		);
		if (content) {
			result.content = withSummaryFallback(content, result.summary);
		}
	}

	return enriched;
}
