import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { DEFAULTS, LOG_PREFIXES } from './constants.js';

/**
 * Fetches the readable text of a web page
 */
export interface ReaderClient {
	/** Resolves to the page text, or null on any failure */
	fetchText(url: string, timeoutMs: number): Promise<string | null>;
}

/**
 * Reader backed by a Jina-style service: `GET <base>/<target url>` returns
 * the article as plain text.
 */
export class JinaReaderClient implements ReaderClient {
	private readonly baseUrl: string;
	private readonly logger: Logger;

	constructor(baseUrl: string = DEFAULTS.READER_BASE_URL, logger: Logger = defaultLogger) {
		this.baseUrl = baseUrl.replace(/\/+$/, '');
		this.logger = logger;
	}

	async fetchText(url: string, timeoutMs: number): Promise<string | null> {
		if (!url) {
			return null;
		}

		try {
			const response = await fetch(`${this.baseUrl}/${url}`, {
				headers: { Accept: 'text/plain' },
				signal: AbortSignal.timeout(timeoutMs),
			});

			if (response.status !== 200) {
				this.logger.info(`${LOG_PREFIXES.READER} Reader returned ${response.status}`, { url });
				return null;
			}

			return await response.text();
		} catch (error) {
			if (error instanceof Error && error.name === 'TimeoutError') {
				this.logger.info(`${LOG_PREFIXES.READER} Reader timed out`, { url, timeoutMs });
			} else {
				this.logger.info(`${LOG_PREFIXES.READER} Reader fetch failed`, {
					url,
					error: error instanceof Error ? error.message : String(error),
				});
			}
			return null;
		}
	}
}
