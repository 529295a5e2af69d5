import { Request, Response, NextFunction } from 'express';
import { body, validationResult } from 'express-validator';
import type { z } from 'zod';
import { errorResponse, ERROR_CODES } from '../utils/response.js';

/**
 * Middleware to check validation results and return error if validation failed
 */
export function handleValidationErrors(req: Request, res: Response, next: NextFunction): void {
	const errors = validationResult(req);

	if (!errors.isEmpty()) {
		errorResponse(
			res,
			ERROR_CODES.VALIDATION_ERROR,
			'Validation failed',
			400,
			errors.array(),
			req.requestId
		);
		return;
	}

	next();
}

/**
 * Parse the request body against a schema. On failure the 400 response is
 * sent here and `null` is returned.
 */
export function parseBody<T extends z.ZodTypeAny>(
	schema: T,
	req: Request,
	res: Response
): z.infer<T> | null {
	const result = schema.safeParse(req.body);
	if (!result.success) {
		errorResponse(
			res,
			ERROR_CODES.VALIDATION_ERROR,
			'Validation failed',
			400,
			result.error.issues,
			req.requestId
		);
		return null;
	}
	return result.data;
}

/**
 * Web search request validation
 */
export const validateWebSearchRequest = [
	body('query')
		.isString()
		.withMessage('Query must be a string')
		.bail()
		.trim()
		.isLength({ min: 1, max: 1000 })
		.withMessage('Query must be between 1 and 1000 characters'),
	body('provider')
		.optional()
		.isString()
		.withMessage('Provider must be a string')
		.bail()
		.trim()
		.isLength({ min: 1, max: 50 })
		.withMessage('Provider must be between 1 and 50 characters'),
	body('max_results')
		.optional()
		.isInt({ min: 1, max: 20 })
		.withMessage('max_results must be an integer between 1 and 20')
		.toInt(),
	body('full_content_results')
		.optional()
		.isInt({ min: 0, max: 20 })
		.withMessage('full_content_results must be an integer between 0 and 20')
		.toInt(),
	handleValidationErrors,
];
