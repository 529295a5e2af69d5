import { SENSITIVE_METADATA_KEYS } from './constants.js';
import type { ClientLogEntry } from './types.js';

/**
 * Drop denylisted keys from event metadata. Only exact key matches are
 * removed; nested values are kept as sent.
 */
export function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
	const safe: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(metadata)) {
		if (!SENSITIVE_METADATA_KEYS.has(key)) {
			safe[key] = value;
		}
	}
	return safe;
}

/**
 * Render a client event as a single log message.
 *
 * Segment order: component, message, url, client ip, stack trace, metadata.
 * Absent segments are skipped.
 */
export function formatClientEvent(entry: ClientLogEntry, clientIp?: string): string {
	const parts: string[] = [];

	if (entry.component) {
		parts.push(`[${entry.component}]`);
	}

	parts.push(entry.message);

	if (entry.url) {
		parts.push(`| url=${entry.url}`);
	}

	if (clientIp) {
		parts.push(`| ip=${clientIp}`);
	}

	if (entry.stack_trace) {
		parts.push(`\nStack trace:\n${entry.stack_trace}`);
	}

	if (entry.metadata) {
		const safeMetadata = redactMetadata(entry.metadata);
		if (Object.keys(safeMetadata).length > 0) {
			parts.push(`| metadata=${JSON.stringify(safeMetadata)}`);
		}
	}

	return parts.filter(part => part.length > 0).join(' ');
}
