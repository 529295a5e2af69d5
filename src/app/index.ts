#!/usr/bin/env node

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { logger, setGlobalLogLevel } from '../core/logger/index.js';
import { ClientEventRecorder, openClientEventSinkFromEnv } from '../core/client-events/index.js';
import {
	createWebSearchManagerFromEnv,
	getWebSearchDefaultsFromEnv,
	WebSearchError,
} from '../core/web-search/index.js';
import { ApiServer } from './api/server.js';
import {
	loadEnvOrExit,
	parseCliOptions,
	SearchOptionsSchema,
	ServeOptionsSchema,
} from './cli/utils/options.js';

// Walk up from this file to the nearest package.json (works from src/ and dist/)
function readPackageVersion(): string {
	let dir = path.dirname(fileURLToPath(import.meta.url));
	while (true) {
		const candidate = path.join(dir, 'package.json');
		if (existsSync(candidate)) {
			const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
			if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
				return String(parsed.version);
			}
			return 'unknown';
		}
		const parent = path.dirname(dir);
		if (parent === dir) return 'unknown';
		dir = parent;
	}
}

const env = loadEnvOrExit();
const program = new Command();

program
	.name('search-relay')
	.description('Client event logging and single-provider web search for a chat front end')
	.version(readPackageVersion(), '-v, --version', 'output the current version')
	.option('--log-level <level>', 'Operational log level (error, warn, info, debug)')
	.hook('preAction', command => {
		const { logLevel } = command.opts<{ logLevel?: string }>();
		if (logLevel) {
			setGlobalLogLevel(logLevel);
		}
	});

program
	.command('serve')
	.description('Start the HTTP API (client log intake and web search)')
	.option('--port <port>', 'Port for the API server', String(env.API_PORT))
	.option('--host <host>', 'Host for the API server', env.API_HOST)
	.option('--api-prefix <prefix>', 'API prefix for routes (use empty string to disable)', '/api')
	.action(async (rawOptions: unknown) => {
		const options = parseCliOptions(ServeOptionsSchema, rawOptions);

		const sink = openClientEventSinkFromEnv();
		const server = new ApiServer(
			{
				recorder: new ClientEventRecorder(sink),
				webSearch: createWebSearchManagerFromEnv(),
				searchDefaults: getWebSearchDefaultsFromEnv(),
			},
			{
				port: options.port,
				host: options.host,
				apiPrefix: options.apiPrefix,
				corsOrigins: env.CORS_ORIGINS,
			}
		);

		const shutdown = (signal: string) => {
			logger.info(`${signal} received, shutting down API server gracefully`);
			Promise.all([server.stop(), sink.close()])
				.then(() => process.exit(0))
				.catch((error: unknown) => {
					logger.error('Failed to shut down cleanly', {
						error: error instanceof Error ? error.message : String(error),
					});
					process.exit(1);
				});
		};
		process.once('SIGTERM', () => shutdown('SIGTERM'));
		process.once('SIGINT', () => shutdown('SIGINT'));

		try {
			await server.start();
			logger.info(`Client events are written to ${sink.filePath}`);
		} catch (error) {
			await sink.close();
			logger.error('Failed to start API server', {
				error: error instanceof Error ? error.message : String(error),
			});
			process.exit(1);
		}
	});

program
	.command('search')
	.description('Run one web search and print the formatted results')
	.argument('<query...>', 'Search query')
	.option(
		'-p, --provider <provider>',
		'Search provider (duckduckgo, brave)',
		env.WEB_SEARCH_PROVIDER
	)
	.option(
		'-n, --max-results <count>',
		'Maximum number of results',
		String(env.WEB_SEARCH_MAX_RESULTS)
	)
	.option(
		'-f, --full-content <count>',
		'Fetch full article text for the top N results',
		String(env.WEB_SEARCH_FULL_CONTENT_RESULTS)
	)
	.action(async (queryWords: string[], rawOptions: unknown) => {
		const options = parseCliOptions(SearchOptionsSchema, rawOptions);

		const manager = createWebSearchManagerFromEnv();
		try {
			const text = await manager.search(
				queryWords.join(' '),
				options.provider,
				options.maxResults,
				options.fullContent
			);
			process.stdout.write(`${text}\n`);
		} catch (error) {
			if (error instanceof WebSearchError) {
				logger.error(error.message, { code: error.code });
				process.exitCode = 1;
				return;
			}
			throw error;
		}
	});

program.parseAsync(process.argv).catch((error: unknown) => {
	logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
	process.exit(1);
});
