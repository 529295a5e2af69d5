/**
 * Client Events Module Constants
 *
 * Field limits, severity names and the metadata denylist for
 * browser-originated diagnostic events.
 *
 * @module client-events/constants
 */

export const LOG_PREFIXES = {
	RECORDER: '[ClientEvents:Recorder]',
	SINK: '[ClientEvents:Sink]',
} as const;

/**
 * Severities a client may report, ordered from most to least severe
 */
export const CLIENT_LOG_LEVELS = ['fatal', 'error', 'warning', 'info', 'debug'] as const;

/**
 * Maximum lengths of the inbound event fields
 */
export const FIELD_LIMITS = {
	MESSAGE: 10000,
	URL: 2000,
	USER_AGENT: 500,
	STACK_TRACE: 50000,
	COMPONENT: 100,
	BATCH_ENTRIES: 100,
} as const;

/**
 * Metadata keys dropped before an event is written. Matched exactly and
 * case-sensitively.
 */
export const SENSITIVE_METADATA_KEYS: ReadonlySet<string> = new Set([
	'password',
	'token',
	'secret',
	'key',
]);

export const DEFAULT_CLIENT_LOG_FILE = 'logs/frontend.log';

export const SINK_TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// Level names as they appear in the log file
export const SINK_LEVEL_LABELS = {
	fatal: 'CRITICAL',
	error: 'ERROR',
	warning: 'WARNING',
	info: 'INFO',
	debug: 'DEBUG',
} as const;
