/**
 * Web Search Routes
 */

import { Router, Request, Response, NextFunction } from 'express';
import { matchedData } from 'express-validator';
import { logger } from '../../../core/logger/index.js';
import {
	WebSearchError,
	WebSearchManager,
	type WebSearchDefaults,
} from '../../../core/web-search/index.js';
import { errorResponse, successResponse, ERROR_CODES } from '../utils/response.js';
import { validateWebSearchRequest } from '../middleware/validation.js';

export function createWebSearchRoutes(
	manager: WebSearchManager,
	defaults: WebSearchDefaults
): Router {
	const router = Router();

	/**
	 * POST /api/web-search
	 *
	 * Body:
	 * - query: search text (required)
	 * - provider: duckduckgo | brave (optional, default from WEB_SEARCH_PROVIDER)
	 * - max_results: 1..20 (optional)
	 * - full_content_results: 0..20 (optional)
	 */
	router.post(
		'/',
		validateWebSearchRequest,
		async (req: Request, res: Response, next: NextFunction) => {
			const data = matchedData(req);
			const query = String(data.query);
			const provider =
				typeof data.provider === 'string' && data.provider ? data.provider : defaults.provider;
			const maxResults =
				typeof data.max_results === 'number' ? data.max_results : defaults.maxResults;
			const fullContentResults =
				typeof data.full_content_results === 'number'
					? data.full_content_results
					: defaults.fullContentResults;

			try {
				const text = await manager.search(query, provider, maxResults, fullContentResults);
				successResponse(res, { provider, text }, 200, req.requestId);
			} catch (error) {
				if (error instanceof WebSearchError) {
					logger.warn('Web search request rejected', {
						requestId: req.requestId,
						provider,
						code: error.code,
					});
					errorResponse(res, ERROR_CODES.BAD_REQUEST, error.message, 400, undefined, req.requestId);
					return;
				}
				next(error);
			}
		}
	);

	return router;
}
