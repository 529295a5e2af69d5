import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import http from 'http';
import { logger } from '../../core/logger/index.js';
import type { ClientEventRecorder } from '../../core/client-events/index.js';
import type { WebSearchDefaults, WebSearchManager } from '../../core/web-search/index.js';
import { errorResponse, ERROR_CODES } from './utils/response.js';
import {
	requestIdMiddleware,
	requestLoggingMiddleware,
	errorLoggingMiddleware,
} from './middleware/logging.js';
import { createClientLogRoutes } from './routes/logs.js';
import { createWebSearchRoutes } from './routes/web-search.js';

export interface ApiServerConfig {
	port: number;
	host?: string;
	corsOrigins?: string[];
	rateLimitWindowMs?: number;
	rateLimitMaxRequests?: number;
	// API prefix configuration
	apiPrefix?: string;
}

export interface ApiServices {
	recorder: ClientEventRecorder;
	webSearch: WebSearchManager;
	searchDefaults: WebSearchDefaults;
}

export class ApiServer {
	private app: Application;
	private services: ApiServices;
	private config: ApiServerConfig;
	private apiPrefix: string;
	private httpServer?: http.Server;

	constructor(services: ApiServices, config: ApiServerConfig) {
		this.services = services;
		this.config = config;

		// Validate and set API prefix
		this.apiPrefix = this.validateAndNormalizeApiPrefix(config.apiPrefix);

		this.app = express();
		this.setupMiddleware();
		this.setupRoutes();
		this.setup404Handler();
		this.setupErrorHandling();
	}

	/**
	 * Validate and normalize API prefix configuration
	 */
	private validateAndNormalizeApiPrefix(prefix?: string): string {
		if (prefix === undefined) {
			return '/api';
		}

		// Allow empty string to disable prefix
		if (prefix === '') {
			return '';
		}

		let normalized = prefix.startsWith('/') ? prefix : `/${prefix}`;
		if (normalized.endsWith('/') && normalized !== '/') {
			normalized = normalized.slice(0, -1);
		}

		logger.debug(`[API Server] Using API prefix: '${normalized}'`);
		return normalized;
	}

	/**
	 * Helper method to construct API route paths
	 */
	private buildApiRoute(route: string): string {
		if (!this.apiPrefix || this.apiPrefix === '/') {
			return route;
		}
		return `${this.apiPrefix}${route}`;
	}

	private setupMiddleware(): void {
		// Client IPs for event logs come from X-Forwarded-For behind a proxy
		this.app.set('trust proxy', true);

		// Request ID and logging precede body parsing
		this.app.use(requestIdMiddleware);
		this.app.use(requestLoggingMiddleware);

		// Security middleware
		this.app.use(
			helmet({
				contentSecurityPolicy: false, // Disable CSP for API
				crossOriginEmbedderPolicy: false,
			})
		);

		const allowedOrigins = this.config.corsOrigins || ['http://localhost:3000'];
		this.app.use(
			cors({
				origin: (origin, callback) => {
					if (!origin || allowedOrigins.includes(origin)) {
						callback(null, true);
					} else {
						callback(new Error('Not allowed by CORS'));
					}
				},
				methods: ['GET', 'POST', 'OPTIONS'],
				allowedHeaders: ['Content-Type', 'X-Request-ID'],
			})
		);

		// Rate limiting
		const limiter = rateLimit({
			windowMs: this.config.rateLimitWindowMs || 15 * 60 * 1000, // 15 minutes
			limit: this.config.rateLimitMaxRequests || 600,
			message: {
				success: false,
				error: {
					code: ERROR_CODES.RATE_LIMIT_EXCEEDED,
					message: 'Too many requests from this IP, please try again later.',
				},
			},
			standardHeaders: true,
			legacyHeaders: false,
		});
		if (this.apiPrefix) {
			this.app.use(`${this.apiPrefix}/`, limiter);
		}

		// Body parsing middleware; a batch of 100 events with stack traces can be large
		this.app.use(express.json({ limit: '10mb' }));
	}

	private setupRoutes(): void {
		// Health check endpoint
		this.app.get('/health', (_req: Request, res: Response) => {
			res.json({
				status: 'healthy',
				timestamp: new Date().toISOString(),
				uptime: process.uptime(),
			});
		});

		// API routes
		this.app.use(this.buildApiRoute('/logs'), createClientLogRoutes(this.services.recorder));
		this.app.use(
			this.buildApiRoute('/web-search'),
			createWebSearchRoutes(this.services.webSearch, this.services.searchDefaults)
		);
	}

	private setup404Handler(): void {
		// 404 handler for unknown routes - must be registered AFTER all other routes
		this.app.use((req: Request, res: Response) => {
			errorResponse(
				res,
				ERROR_CODES.NOT_FOUND,
				`Route ${req.method} ${req.originalUrl} not found`,
				404,
				undefined,
				req.requestId
			);
		});
	}

	private setupErrorHandling(): void {
		// Error logging middleware
		this.app.use(errorLoggingMiddleware);

		// Global error handler
		this.app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
			// If response already sent, delegate to default Express error handler
			if (res.headersSent) {
				return next(err);
			}

			// body-parser marks malformed JSON with a 4xx status
			const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
			const isClientError = status >= 400 && status < 500;

			errorResponse(
				res,
				isClientError ? ERROR_CODES.BAD_REQUEST : ERROR_CODES.INTERNAL_ERROR,
				err.message || 'An unexpected error occurred',
				isClientError ? status : 500,
				process.env.NODE_ENV === 'development' ? err.stack : undefined,
				req.requestId
			);
		});
	}

	public async start(): Promise<void> {
		const host = this.config.host || 'localhost';

		return new Promise((resolve, reject) => {
			const server = http.createServer(this.app);
			this.httpServer = server;

			server.once('error', err => {
				logger.error('[API Server] Failed to start API server', { error: err.message });
				reject(err);
			});

			server.listen(this.config.port, host, () => {
				logger.info(`[API Server] Listening on ${host}:${this.config.port}`);
				resolve();
			});
		});
	}

	public async stop(): Promise<void> {
		const server = this.httpServer;
		if (!server) return;
		this.httpServer = undefined;

		await new Promise<void>((resolve, reject) => {
			server.close(err => (err ? reject(err) : resolve()));
		});
		logger.info('[API Server] Stopped');
	}

	public getApp(): Application {
		return this.app;
	}
}
