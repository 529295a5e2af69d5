import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { LOG_PREFIXES } from './constants.js';
import { formatClientEvent } from './formatter.js';
import type { BatchRecordResult, ClientLogEntry, EventSink } from './types.js';

/**
 * Writes validated client events to an injected sink.
 *
 * Recording never throws: a failure is reported to the operational logger
 * and surfaces as a `false` return value.
 */
export class ClientEventRecorder {
	private readonly sink: EventSink;
	private readonly logger: Logger;

	constructor(sink: EventSink, operationalLogger: Logger = defaultLogger) {
		this.sink = sink;
		this.logger = operationalLogger;
	}

	record(entry: ClientLogEntry, clientIp?: string): boolean {
		try {
			const line = formatClientEvent(entry, clientIp);
			this.sink.write(entry.level, line);
			return true;
		} catch (error) {
			this.logger.error(`${LOG_PREFIXES.RECORDER} Failed to log client event`, {
				level: entry.level,
				error: error instanceof Error ? error.message : String(error),
			});
			return false;
		}
	}

	recordBatch(entries: ReadonlyArray<ClientLogEntry>, clientIp?: string): BatchRecordResult {
		let logged = 0;
		for (const entry of entries) {
			if (this.record(entry, clientIp)) {
				logged++;
			}
		}
		return { logged, failed: entries.length - logged };
	}
}
