import { z } from 'zod';
import { CLIENT_LOG_LEVELS, FIELD_LIMITS } from './constants.js';

export const ClientLogLevelSchema = z.enum(CLIENT_LOG_LEVELS);

export type ClientLogLevel = z.infer<typeof ClientLogLevelSchema>;

/**
 * One diagnostic event as sent by the browser client. Optional fields may
 * arrive as `null`.
 */
export const ClientLogEntrySchema = z.object({
	level: ClientLogLevelSchema,
	message: z.string().max(FIELD_LIMITS.MESSAGE),
	timestamp: z.string().nullish(),
	url: z.string().max(FIELD_LIMITS.URL).nullish(),
	user_agent: z.string().max(FIELD_LIMITS.USER_AGENT).nullish(),
	stack_trace: z.string().max(FIELD_LIMITS.STACK_TRACE).nullish(),
	component: z.string().max(FIELD_LIMITS.COMPONENT).nullish(),
	metadata: z.record(z.unknown()).nullish(),
});

export type ClientLogEntry = z.infer<typeof ClientLogEntrySchema>;

export const ClientLogBatchSchema = z.object({
	entries: z.array(ClientLogEntrySchema).min(1).max(FIELD_LIMITS.BATCH_ENTRIES),
});

export type ClientLogBatch = z.infer<typeof ClientLogBatchSchema>;

export interface BatchRecordResult {
	logged: number;
	failed: number;
}

/**
 * Destination for formatted client event lines.
 */
export interface EventSink {
	write(level: ClientLogLevel, line: string): void;
}
