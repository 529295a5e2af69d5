export type WebSearchErrorCode = 'UNKNOWN_PROVIDER' | 'DEFERRED_PROVIDER';

/**
 * Raised for caller mistakes; provider trouble is reported inline instead
 */
export class WebSearchError extends Error {
	constructor(
		message: string,
		public readonly code: WebSearchErrorCode,
		public readonly provider?: string
	) {
		super(message);
		this.name = 'WebSearchError';
	}
}

export class UnknownProviderError extends WebSearchError {
	constructor(provider: string) {
		super(`Unknown web search provider: ${provider}`, 'UNKNOWN_PROVIDER', provider);
		this.name = 'UnknownProviderError';
	}
}

export class DeferredProviderError extends WebSearchError {
	constructor(provider: string) {
		super('tavily/exa are handled via the tools layer', 'DEFERRED_PROVIDER', provider);
		this.name = 'DeferredProviderError';
	}
}
