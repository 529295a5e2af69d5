import { Response } from 'express';

// Standard API response structure
export interface ApiResponse<T = unknown> {
	success: boolean;
	data?: T;
	error?: {
		code: string;
		message: string;
		details?: unknown;
	};
	meta?: {
		timestamp: string;
		requestId?: string;
	};
}

// Success response helper
export function successResponse<T>(
	res: Response,
	data: T,
	statusCode: number = 200,
	requestId?: string
): void {
	const response: ApiResponse<T> = {
		success: true,
		data,
		meta: {
			timestamp: new Date().toISOString(),
			...(requestId && { requestId }),
		},
	};

	res.status(statusCode).json(response);
}

/**
 * Reduce error details to plain JSON so that errors and circular values
 * never reach the client as `[object Object]`.
 */
function sanitizeDetails(details: unknown): unknown {
	if (details === undefined || details === null) {
		return undefined;
	}

	if (details instanceof Error) {
		return {
			message: details.message,
			name: details.name,
			...(details.stack && { stack: details.stack.split('\n').slice(0, 3).join('\n') }),
		};
	}

	if (typeof details !== 'object') {
		return String(details);
	}

	try {
		const serialized = JSON.stringify(details, (_key, value: unknown) => {
			if (typeof value === 'function') return '[Function]';
			if (typeof value === 'symbol') return '[Symbol]';
			if (value instanceof Error) return { message: value.message, name: value.name };
			return value;
		});
		const parsed: unknown = JSON.parse(serialized);
		return parsed;
	} catch {
		return { message: String(details), serializationError: true };
	}
}

// Error response helper
export function errorResponse(
	res: Response,
	code: string,
	message: string,
	statusCode: number = 500,
	details?: unknown,
	requestId?: string
): void {
	const sanitizedDetails = sanitizeDetails(details);

	const response: ApiResponse = {
		success: false,
		error: {
			code,
			message,
			...(sanitizedDetails !== undefined && { details: sanitizedDetails }),
		},
		meta: {
			timestamp: new Date().toISOString(),
			...(requestId && { requestId }),
		},
	};

	res.status(statusCode).json(response);
}

// Common error codes
export const ERROR_CODES = {
	VALIDATION_ERROR: 'VALIDATION_ERROR',
	NOT_FOUND: 'NOT_FOUND',
	INTERNAL_ERROR: 'INTERNAL_ERROR',
	BAD_REQUEST: 'BAD_REQUEST',
	RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
} as const;
