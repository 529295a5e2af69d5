import { config } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CLIENT_LOG_FILE } from './client-events/constants.js';
import { DEFAULTS } from './web-search/constants.js';

// Variables already present in the process environment win over .env
config({ override: false });

const booleanFlag = (defaultValue: boolean) =>
	z
		.string()
		.optional()
		.transform(value => {
			if (value === undefined || value.trim() === '') return defaultValue;
			const normalized = value.trim().toLowerCase();
			return normalized === 'true' || normalized === '1' || normalized === 'yes';
		});

// Read while serving requests; every field falls back instead of failing
const loggingEnvSchema = z.object({
	RELAY_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).catch('info'),
	REDACT_SECRETS: booleanFlag(true),
});

const braveEnvSchema = z.object({
	ENABLE_BRAVE: booleanFlag(false),
	BRAVE_API_KEY: z.string().optional().catch(undefined),
});

const envSchema = loggingEnvSchema.merge(braveEnvSchema).extend({
	NODE_ENV: z.enum(['development', 'production', 'test']).catch('development'),
	// Web search
	WEB_SEARCH_PROVIDER: z.string().default('duckduckgo'),
	WEB_SEARCH_MAX_RESULTS: z.coerce.number().int().positive().default(5),
	WEB_SEARCH_FULL_CONTENT_RESULTS: z.coerce.number().int().nonnegative().default(0),
	READER_BASE_URL: z.string().url().default(DEFAULTS.READER_BASE_URL),
	// Client event log
	CLIENT_LOG_FILE: z.string().default(DEFAULT_CLIENT_LOG_FILE),
	// API server
	API_PORT: z.coerce.number().int().positive().default(3001),
	API_HOST: z.string().default('localhost'),
	CORS_ORIGINS: z
		.string()
		.default('http://localhost:3000')
		.transform(value =>
			value
				.split(',')
				.map(origin => origin.trim())
				.filter(origin => origin.length > 0)
		),
});

export type Env = z.infer<typeof envSchema>;
export type LoggingEnv = z.infer<typeof loggingEnvSchema>;
export type BraveEnv = z.infer<typeof braveEnvSchema>;

// Empty strings count as unset
function rawEnv(source: NodeJS.ProcessEnv) {
	return {
		NODE_ENV: source.NODE_ENV || undefined,
		RELAY_LOG_LEVEL: source.RELAY_LOG_LEVEL?.toLowerCase(),
		REDACT_SECRETS: source.REDACT_SECRETS,
		ENABLE_BRAVE: source.ENABLE_BRAVE,
		BRAVE_API_KEY: source.BRAVE_API_KEY || undefined,
		WEB_SEARCH_PROVIDER: source.WEB_SEARCH_PROVIDER || undefined,
		WEB_SEARCH_MAX_RESULTS: source.WEB_SEARCH_MAX_RESULTS || undefined,
		WEB_SEARCH_FULL_CONTENT_RESULTS: source.WEB_SEARCH_FULL_CONTENT_RESULTS || undefined,
		READER_BASE_URL: source.READER_BASE_URL || undefined,
		CLIENT_LOG_FILE: source.CLIENT_LOG_FILE || undefined,
		API_PORT: source.API_PORT || undefined,
		API_HOST: source.API_HOST || undefined,
		CORS_ORIGINS: source.CORS_ORIGINS || undefined,
	};
}

/**
 * Validate the whole environment. Throws a `ZodError` on any invalid value;
 * call it at start-up.
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
	return envSchema.parse(rawEnv(source));
}

/**
 * Log level and redaction switch. Never throws, whatever else the
 * environment holds.
 */
export function readLoggingEnv(source: NodeJS.ProcessEnv = process.env): LoggingEnv {
	return loggingEnvSchema.parse(rawEnv(source));
}

/**
 * Brave feature flag and key, read per search. Never throws.
 */
export function readBraveEnv(source: NodeJS.ProcessEnv = process.env): BraveEnv {
	return braveEnvSchema.parse(rawEnv(source));
}

/**
 * One line per invalid variable, e.g. `API_PORT: Expected number, received nan`.
 */
export function describeEnvError(error: z.ZodError): string[] {
	return error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`);
}
