export {
	Logger,
	logger,
	createLogger,
	setGlobalLogLevel,
	redactSensitiveData,
} from './logger.js';
export type { LoggerOptions, LogLevel, LogMeta } from './logger.js';
