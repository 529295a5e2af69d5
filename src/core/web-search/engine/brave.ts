import { z } from 'zod';
import { readBraveEnv } from '../../env.js';
import type { Logger } from '../../logger/index.js';
import { BRAVE_API_URL, FALLBACK_SUMMARY, LIMITS, LOG_PREFIXES, SYSTEM_NOTES, TIMEOUTS } from '../constants.js';
import type { ProviderOutcome } from '../types.js';
import { BaseProvider, type RawHit } from './base.js';

export interface BraveSettings {
	enabled: boolean;
	apiKey?: string | undefined;
}

const BraveResponseSchema = z.object({
	web: z
		.object({
			results: z
				.array(
					z.object({
						title: z.string().nullish(),
						url: z.string().nullish(),
						description: z.string().nullish(),
						extra_snippets: z.array(z.string()).nullish(),
					})
				)
				.nullish(),
		})
		.nullish(),
});

type BraveWebResult = NonNullable<
	NonNullable<z.infer<typeof BraveResponseSchema>['web']>['results']
>[number];

function readBraveSettings(): BraveSettings {
	const env = readBraveEnv();
	return { enabled: env.ENABLE_BRAVE, apiKey: env.BRAVE_API_KEY };
}

export interface BraveProviderOptions {
	/** Read on every search so that flag and key changes apply without a restart */
	getSettings?: () => BraveSettings;
	logger?: Logger;
}

/**
 * Brave Search API provider. Requires the feature flag and a key.
 */
export class BraveProvider extends BaseProvider {
	readonly name = 'brave' as const;
	readonly displayName = 'Brave';

	private readonly getSettings: () => BraveSettings;

	constructor(options: BraveProviderOptions = {}) {
		super(options.logger);
		this.getSettings = options.getSettings ?? readBraveSettings;
	}

	async search(query: string, maxResults: number): Promise<ProviderOutcome> {
		const settings = this.getSettings();
		const apiKey = (settings.apiKey ?? '').trim();
		if (!settings.enabled || !apiKey) {
			return this.note(SYSTEM_NOTES.BRAVE_NOT_CONFIGURED);
		}

		const params = new URLSearchParams({ q: query, count: String(maxResults) });
		const response = await fetch(`${BRAVE_API_URL}?${params.toString()}`, {
			headers: {
				Accept: 'application/json',
				'X-Subscription-Token': apiKey,
			},
			signal: AbortSignal.timeout(TIMEOUTS.BRAVE_REQUEST),
		});

		if (response.status !== 200) {
			const body = await response.text().catch(() => '');
			this.logger.warn(`${LOG_PREFIXES.BRAVE} Brave returned ${response.status}`, {
				body: body.slice(0, LIMITS.LOGGED_ERROR_BODY),
			});
			return this.note(SYSTEM_NOTES.BRAVE_FAILED);
		}

		const data = BraveResponseSchema.parse(await response.json());
		const webResults = data.web?.results ?? [];
		this.logger.debug(`${LOG_PREFIXES.BRAVE} Search returned ${webResults.length} results`, {
			query,
		});

		return this.results(this.toHits(webResults.map(toRawHit), maxResults));
	}
}

function toRawHit(result: BraveWebResult): RawHit {
	const extra = (result.extra_snippets ?? []).slice(0, LIMITS.EXTRA_SNIPPETS);
	const description = result.description || FALLBACK_SUMMARY;
	const summary = extra.length > 0 ? `${description}\n${extra.join('\n')}` : description;
	return {
		title: result.title,
		url: result.url,
		summary,
	};
}
