import { describe, it, expect } from 'vitest';
import { formatClientEvent, redactMetadata } from '../formatter.js';
import type { ClientLogEntry } from '../types.js';

describe('redactMetadata', () => {
	it('drops denylisted keys and keeps the rest', () => {
		expect(
			redactMetadata({ password: 'test-secret', token: 't', secret: 's', key: 'k', userId: 42 })
		).toEqual({ userId: 42 });
	});

	it('matches keys exactly and case-sensitively', () => {
		expect(redactMetadata({ Password: 'a', apiKey: 'b', tokens: 'c' })).toEqual({
			Password: 'a',
			apiKey: 'b',
			tokens: 'c',
		});
	});

	it('does not descend into nested values', () => {
		expect(redactMetadata({ auth: { password: 'test-secret' } })).toEqual({
			auth: { password: 'test-secret' },
		});
	});
});

describe('formatClientEvent', () => {
	it('renders a bare message', () => {
		const entry: ClientLogEntry = { level: 'info', message: 'Page loaded' };
		expect(formatClientEvent(entry)).toBe('Page loaded');
	});

	it('renders every segment in order', () => {
		const entry: ClientLogEntry = {
			level: 'error',
			message: 'Render failed',
			component: 'Chart',
			url: 'http://localhost:3000/dashboard',
			stack_trace: 'Error: boom\n    at Chart',
			metadata: { attempt: 2 },
		};
		expect(formatClientEvent(entry, '127.0.0.1')).toBe(
			'[Chart] Render failed | url=http://localhost:3000/dashboard | ip=127.0.0.1 ' +
				'\nStack trace:\nError: boom\n    at Chart | metadata={"attempt":2}'
		);
	});

	it('omits the metadata segment when every key is redacted', () => {
		const entry: ClientLogEntry = {
			level: 'warning',
			message: 'Login retry',
			metadata: { password: 'test-secret', token: 'test-token' },
		};
		expect(formatClientEvent(entry)).toBe('Login retry');
	});

	it('never renders redacted values', () => {
		const entry: ClientLogEntry = {
			level: 'info',
			message: 'Form submitted',
			metadata: { password: 'test-secret', form: 'signup' },
		};
		expect(formatClientEvent(entry)).toBe('Form submitted | metadata={"form":"signup"}');
	});

	it('treats null optional fields as absent', () => {
		const entry: ClientLogEntry = {
			level: 'debug',
			message: 'Tick',
			component: null,
			url: null,
			stack_trace: null,
			metadata: null,
		};
		expect(formatClientEvent(entry)).toBe('Tick');
	});
});
