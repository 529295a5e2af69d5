/**
 * Client Log Routes
 *
 * Intake for diagnostic events reported by the browser client.
 */

import { Router, Request, Response } from 'express';
import {
	ClientEventRecorder,
	ClientLogBatchSchema,
	ClientLogEntrySchema,
} from '../../../core/client-events/index.js';
import { successResponse } from '../utils/response.js';
import { parseBody } from '../middleware/validation.js';

export function createClientLogRoutes(recorder: ClientEventRecorder): Router {
	const router = Router();

	/**
	 * POST /api/logs/frontend
	 * Record one client event
	 */
	router.post('/frontend', (req: Request, res: Response) => {
		const entry = parseBody(ClientLogEntrySchema, req, res);
		if (!entry) return;

		const logged = recorder.record(entry, req.ip);
		successResponse(res, { logged }, 200, req.requestId);
	});

	/**
	 * POST /api/logs/frontend/batch
	 * Record up to 100 client events in order
	 */
	router.post('/frontend/batch', (req: Request, res: Response) => {
		const batch = parseBody(ClientLogBatchSchema, req, res);
		if (!batch) return;

		const result = recorder.recordBatch(batch.entries, req.ip);
		successResponse(res, result, 200, req.requestId);
	});

	return router;
}
