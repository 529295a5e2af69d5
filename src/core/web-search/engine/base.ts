import { logger as defaultLogger, type Logger } from '../../logger/index.js';
import { FALLBACK_SUMMARY, FALLBACK_TITLE } from '../constants.js';
import type { ProviderOutcome, SearchEngineName, SearchHit } from '../types.js';

/**
 * Raw fields a provider may return for one hit
 */
export interface RawHit {
	title?: string | null;
	url?: string | null;
	summary?: string | null;
}

/**
 * Abstract base class for web search providers
 */
export abstract class BaseProvider {
	/** Provider name identifier */
	abstract readonly name: SearchEngineName;
	/** Name used in notes shown to the caller */
	abstract readonly displayName: string;

	protected readonly logger: Logger;

	constructor(logger: Logger = defaultLogger) {
		this.logger = logger;
	}

	/**
	 * Run one search. Expected conditions (missing dependency, disabled
	 * provider, rejected key) come back as a note; anything else throws.
	 */
	abstract search(query: string, maxResults: number): Promise<ProviderOutcome>;

	protected toHits(raw: ReadonlyArray<RawHit>, maxResults: number): SearchHit[] {
		return raw.slice(0, maxResults).map(hit => ({
			title: hit.title || FALLBACK_TITLE,
			url: hit.url || '',
			summary: hit.summary || FALLBACK_SUMMARY,
		}));
	}

	protected note(note: string): ProviderOutcome {
		return { kind: 'note', note };
	}

	protected results(hits: SearchHit[]): ProviderOutcome {
		return { kind: 'results', hits };
	}
}
