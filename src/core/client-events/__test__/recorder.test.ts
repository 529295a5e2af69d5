import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger } from '../../logger/index.js';
import { ClientEventRecorder } from '../recorder.js';
import type { ClientLogLevel, EventSink } from '../types.js';

class MemorySink implements EventSink {
	readonly lines: Array<{ level: ClientLogLevel; line: string }> = [];

	write(level: ClientLogLevel, line: string): void {
		this.lines.push({ level, line });
	}
}

class BrokenSink implements EventSink {
	write(): void {
		throw new Error('disk full');
	}
}

describe('ClientEventRecorder', () => {
	const opsLogger = createLogger({ silent: true });

	beforeEach(() => {
		vi.restoreAllMocks();
	});

	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('writes one formatted line with the entry level', () => {
		const errorSpy = vi.spyOn(opsLogger, 'error');
		const sink = new MemorySink();
		const recorder = new ClientEventRecorder(sink, opsLogger);

		const ok = recorder.record(
			{
				level: 'warning',
				message: 'Slow response',
				component: 'Api',
				metadata: { password: 'test-secret', ms: 1200 },
			},
			'10.0.0.5'
		);

		expect(ok).toBe(true);
		expect(sink.lines).toEqual([
			{ level: 'warning', line: '[Api] Slow response | ip=10.0.0.5 | metadata={"ms":1200}' },
		]);
		expect(errorSpy).not.toHaveBeenCalled();
	});

	it('returns false on a failing sink even when the environment holds invalid values', () => {
		vi.stubEnv('API_PORT', 'abc');
		const recorder = new ClientEventRecorder(new BrokenSink(), createLogger({ level: 'error' }));

		expect(recorder.record({ level: 'error', message: 'Boom' })).toBe(false);
	});

	it('returns false and reports to the operational logger when the sink fails', () => {
		const errorSpy = vi.spyOn(opsLogger, 'error');
		const recorder = new ClientEventRecorder(new BrokenSink(), opsLogger);

		const ok = recorder.record({ level: 'error', message: 'Boom' });

		expect(ok).toBe(false);
		expect(errorSpy).toHaveBeenCalledWith('[ClientEvents:Recorder] Failed to log client event', {
			level: 'error',
			error: 'disk full',
		});
	});

	it('counts logged and failed entries of a batch', () => {
		const sink = new MemorySink();
		let calls = 0;
		const flakySink: EventSink = {
			write(level, line) {
				calls++;
				if (calls === 2) throw new Error('transient');
				sink.write(level, line);
			},
		};
		const recorder = new ClientEventRecorder(flakySink, opsLogger);

		const result = recorder.recordBatch([
			{ level: 'info', message: 'one' },
			{ level: 'info', message: 'two' },
			{ level: 'debug', message: 'three' },
		]);

		expect(result).toEqual({ logged: 2, failed: 1 });
		expect(sink.lines.map(entry => entry.line)).toEqual(['one', 'three']);
	});
});
