import {
	LIMITS,
	NO_RESULTS_MESSAGE,
	SYSTEM_NOTES,
	TRUNCATION_SUFFIX,
} from './constants.js';
import type { SearchResult } from './types.js';

// Lengths and cuts are in code points, so astral characters stay whole
function codePoints(text: string): string[] {
	return Array.from(text);
}

export function truncate(text: string, limit: number): string {
	if (text.length <= limit) {
		return text;
	}
	const chars = codePoints(text);
	if (chars.length <= limit) {
		return text;
	}
	return chars.slice(0, limit).join('') + TRUNCATION_SUFFIX;
}

/**
 * Append the original summary to fetched content that came back too short
 * to stand on its own.
 */
export function withSummaryFallback(content: string, summary: string): string {
	if (codePoints(content).length >= LIMITS.SHORT_CONTENT) {
		return content;
	}
	return `${content}\n\n${SYSTEM_NOTES.SHORT_CONTENT}\nOriginal Summary: ${summary}`;
}

function formatResult(result: SearchResult): string {
	const header = `Result ${result.index}:\nTitle: ${result.title}\nURL: ${result.url}`;
	if (result.content) {
		return `${header}\nContent:\n${truncate(result.content, LIMITS.CONTENT)}`;
	}
	return `${header}\nSummary: ${truncate(result.summary, LIMITS.SUMMARY)}`;
}

/**
 * Render results as one text block, separated by blank lines.
 */
export function formatResults(results: ReadonlyArray<SearchResult>): string {
	if (results.length === 0) {
		return NO_RESULTS_MESSAGE;
	}
	return results.map(formatResult).join('\n\n');
}
