import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../../core/logger/index.js';

// Extend Express Request interface to include requestId
declare global {
	namespace Express {
		interface Request {
			requestId: string;
			startTime: number;
		}
	}
}

/**
 * Request ID middleware - adds unique request ID to each request
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
	req.requestId = uuidv4();
	req.startTime = Date.now();

	// Add request ID to response headers
	res.setHeader('X-Request-ID', req.requestId);

	next();
}

/**
 * Request logging middleware - logs incoming requests and completed responses
 */
export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
	const { method, originalUrl, ip, headers } = req;

	logger.info('API Request', {
		requestId: req.requestId,
		method,
		url: originalUrl,
		ip,
		userAgent: headers['user-agent'] || 'unknown',
		contentType: headers['content-type'],
	});

	res.on('finish', () => {
		logger.info('API Response', {
			requestId: req.requestId,
			method,
			url: originalUrl,
			statusCode: res.statusCode,
			duration: `${Date.now() - req.startTime}ms`,
			responseSize: res.get('content-length') || 'unknown',
		});
	});

	next();
}

/**
 * Error logging middleware - logs errors with request context
 */
export function errorLoggingMiddleware(
	err: Error,
	req: Request,
	_res: Response,
	next: NextFunction
): void {
	logger.error('API Error', {
		requestId: req.requestId,
		method: req.method,
		url: req.originalUrl,
		error: err.message,
		stack: err.stack,
		userAgent: req.headers['user-agent'],
	});

	next(err);
}
