import { z } from 'zod';
import { describeEnvError, readEnv, type Env } from '../../../core/env.js';
import { logger } from '../../../core/logger/index.js';

const integerOption = (name: string, min: number, max: number) =>
	z.coerce
		.number({ invalid_type_error: `${name} must be a number` })
		.int(`${name} must be an integer`)
		.min(min, `${name} must be at least ${min}`)
		.max(max, `${name} must be at most ${max}`);

export const ServeOptionsSchema = z.object({
	port: integerOption('Port', 1, 65535),
	host: z.string().min(1),
	apiPrefix: z.string(),
});

export type ServeOptions = z.infer<typeof ServeOptionsSchema>;

export const SearchOptionsSchema = z.object({
	provider: z.string().trim().min(1, 'Provider must not be empty'),
	maxResults: integerOption('Max results', 1, 20),
	fullContent: integerOption('Full content results', 0, 20),
});

export type SearchOptions = z.infer<typeof SearchOptionsSchema>;

/**
 * Validate raw commander options against a schema.
 *
 * @throws {z.ZodError} when an option is out of range
 */
export function validateCliOptions<T extends z.ZodTypeAny>(schema: T, opts: unknown): z.infer<T> {
	const result = schema.safeParse(opts);
	if (!result.success) {
		throw result.error;
	}
	return result.data;
}

export function handleCliOptionsError(error: unknown): never {
	if (error instanceof z.ZodError) {
		logger.error('Invalid command-line options detected:');
		error.errors.forEach(err => {
			const fieldName = err.path.join('.') || 'Unknown Option';
			logger.error(`- Option '${fieldName}': ${err.message}`);
		});
		logger.error('Please check your command-line arguments or run with --help for usage details.');
	} else {
		logger.error(`Validation error: ${error instanceof Error ? error.message : String(error)}`);
	}
	process.exit(1);
}

/**
 * Validate options, exiting with a readable report when they are invalid.
 */
export function parseCliOptions<T extends z.ZodTypeAny>(schema: T, opts: unknown): z.infer<T> {
	try {
		return validateCliOptions(schema, opts);
	} catch (error) {
		return handleCliOptionsError(error);
	}
}

export function handleEnvError(error: unknown): never {
	if (error instanceof z.ZodError) {
		logger.error('Invalid environment configuration detected:');
		describeEnvError(error).forEach(line => logger.error(`- ${line}`));
		logger.error('Please check your environment variables or .env file.');
	} else {
		logger.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
	}
	process.exit(1);
}

/**
 * Validate the environment once at start-up, exiting with a readable report
 * when a variable is invalid.
 */
export function loadEnvOrExit(source: NodeJS.ProcessEnv = process.env): Env {
	try {
		return readEnv(source);
	} catch (error) {
		return handleEnvError(error);
	}
}
