import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { LOG_PREFIXES, SINK_LEVEL_LABELS, SINK_TIMESTAMP_FORMAT } from './constants.js';
import { ClientLogLevelSchema, type ClientLogLevel, type EventSink } from './types.js';

const sinkLevels: Record<ClientLogLevel, number> = {
	fatal: 0,
	error: 1,
	warning: 2,
	info: 3,
	debug: 4,
};

function levelLabel(level: string): string {
	const known = ClientLogLevelSchema.safeParse(level);
	return known.success ? SINK_LEVEL_LABELS[known.data] : level.toUpperCase();
}

const lineFormat = winston.format.printf(({ level, message, timestamp }) => {
	return `${String(timestamp)} | ${levelLabel(level)} | ${String(message)}`;
});

export interface ClientEventSinkOptions {
	/** Log file the events are appended to */
	filePath: string;
	/** Where sink failures are reported */
	operationalLogger?: Logger;
}

/**
 * Append-only file sink for client events.
 *
 * Owns a private winston instance with a single file transport, so nothing
 * written here reaches the operational logger's console or files. Must be
 * opened once before use and closed on shutdown.
 */
export class ClientEventSink implements EventSink {
	readonly filePath: string;
	private readonly operationalLogger: Logger;
	private stream: winston.Logger | null = null;

	constructor(options: ClientEventSinkOptions) {
		this.filePath = path.resolve(options.filePath);
		this.operationalLogger = options.operationalLogger ?? defaultLogger;
	}

	open(): void {
		if (this.stream) return;

		fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

		const stream = winston.createLogger({
			levels: sinkLevels,
			level: 'debug',
			format: winston.format.combine(
				winston.format.timestamp({ format: SINK_TIMESTAMP_FORMAT }),
				lineFormat
			),
			transports: [new winston.transports.File({ filename: this.filePath })],
			exitOnError: false,
		});

		stream.on('error', (error: Error) => {
			this.operationalLogger.error(`${LOG_PREFIXES.SINK} Failed to write client event`, {
				file: this.filePath,
				error: error.message,
			});
		});

		this.stream = stream;
		this.operationalLogger.debug(`${LOG_PREFIXES.SINK} Opened client event log`, {
			file: this.filePath,
		});
	}

	isOpen(): boolean {
		return this.stream !== null;
	}

	write(level: ClientLogLevel, line: string): void {
		if (!this.stream) {
			throw new Error('Client event sink is not open');
		}
		this.stream.log(level, line);
	}

	async close(): Promise<void> {
		const stream = this.stream;
		if (!stream) return;
		this.stream = null;

		await new Promise<void>(resolve => {
			stream.on('finish', () => resolve());
			stream.end();
		});
	}
}
