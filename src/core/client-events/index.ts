/**
 * Client Events Module
 *
 * Intake of browser-originated diagnostic events into a dedicated log file.
 *
 * @module ClientEvents
 */

import path from 'path';
import { readEnv } from '../env.js';
import type { Logger } from '../logger/index.js';
import { ClientEventSink } from './sink.js';

export { ClientEventRecorder } from './recorder.js';
export { ClientEventSink } from './sink.js';
export type { ClientEventSinkOptions } from './sink.js';
export { formatClientEvent, redactMetadata } from './formatter.js';
export {
	ClientLogLevelSchema,
	ClientLogEntrySchema,
	ClientLogBatchSchema,
} from './types.js';
export type {
	ClientLogLevel,
	ClientLogEntry,
	ClientLogBatch,
	BatchRecordResult,
	EventSink,
} from './types.js';
export {
	CLIENT_LOG_LEVELS,
	FIELD_LIMITS,
	SENSITIVE_METADATA_KEYS,
	DEFAULT_CLIENT_LOG_FILE,
} from './constants.js';

/**
 * Create and open the client event sink at `CLIENT_LOG_FILE`
 * (relative paths resolve against the working directory).
 */
export function openClientEventSinkFromEnv(operationalLogger?: Logger): ClientEventSink {
	const filePath = path.resolve(process.cwd(), readEnv().CLIENT_LOG_FILE);
	const sink = new ClientEventSink({ filePath, operationalLogger });
	sink.open();
	return sink;
}
