import winston from 'winston';
import chalk from 'chalk';
import { readLoggingEnv } from '../env.js';

// ===== 1. Foundation Layer: Winston Configuration =====

const logLevels = {
	error: 0, // Highest priority
	warn: 1,
	info: 2,
	debug: 3, // Lowest priority
};

export type LogLevel = keyof typeof logLevels;

export type LogMeta = Record<string, unknown>;

function isLogLevel(value: string): value is LogLevel {
	return Object.keys(logLevels).includes(value);
}

// ===== 2. Security Layer: Data Redaction =====

const SENSITIVE_KEYS = ['apiKey', 'password', 'secret', 'token', 'auth', 'key', 'credential'];
// key, separator, then either a quoted value or a bare token
const MASK_REGEX = new RegExp(
	`(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(?:(["'])[^"']*\\3|[^\\s,;&"']+)`,
	'gi'
);

export const redactSensitiveData = (message: string): string => {
	if (!readLoggingEnv().REDACT_SECRETS) return message;

	return message.replace(MASK_REGEX, (_match, key: string, separator: string, quote?: string) => {
		const quoteMark = quote || '';
		return `${key}${separator}${quoteMark}***REDACTED***${quoteMark}`;
	});
};

// ===== 3. Visual Formatting Layer =====

const levelColorMap: Record<string, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	debug: chalk.gray,
};

const maskFormat = winston.format(info => {
	if (typeof info.message === 'string') {
		info.message = redactSensitiveData(info.message);
	}
	return info;
});

const consoleFormat = winston.format.printf(({ level, message, timestamp }) => {
	const colorize = levelColorMap[level] || chalk.white;
	return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${String(message)}`;
});

// ===== 4. Configuration Layer =====

const getDefaultLogLevel = (): LogLevel => readLoggingEnv().RELAY_LOG_LEVEL;

export interface LoggerOptions {
	level?: string;
	silent?: boolean;
}

// ===== 5. Core Logger Class =====

/**
 * Operational logger for the service itself.
 *
 * Client-originated events never go through this class; they have their own
 * sink (see `ClientEventSink`).
 */
export class Logger {
	private logger: winston.Logger;

	constructor(options: LoggerOptions = {}) {
		const requested = options.level?.toLowerCase();
		const level = requested && isLogLevel(requested) ? requested : getDefaultLogLevel();

		this.logger = winston.createLogger({
			levels: logLevels,
			level,
			transports: [
				new winston.transports.Console({
					format: winston.format.combine(
						winston.format.timestamp({ format: 'HH:mm:ss' }),
						maskFormat(),
						consoleFormat
					),
					stderrLevels: Object.keys(logLevels), // stdout stays free for CLI output
				}),
			],
			silent: options.silent || false,
		});
	}

	// ===== Core Logging Methods =====

	error(message: string, meta?: LogMeta): void {
		this.logger.error(message, { ...meta });
	}

	warn(message: string, meta?: LogMeta): void {
		this.logger.warn(message, { ...meta });
	}

	info(message: string, meta?: LogMeta): void {
		this.logger.info(message, { ...meta });
	}

	debug(message: string, meta?: LogMeta): void {
		this.logger.debug(message, { ...meta });
	}

	// ===== Runtime Configuration Management =====

	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (isLogLevel(normalized)) {
			this.logger.level = normalized;
		} else {
			this.error(`Invalid log level: ${level}. Valid levels: ${Object.keys(logLevels).join(', ')}`);
		}
	}

	getLevel(): string {
		return this.logger.level;
	}
}

// ===== 6. Shared instance =====

export const logger = new Logger();

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};

export const setGlobalLogLevel = (level: string): void => {
	logger.setLevel(level);
};

