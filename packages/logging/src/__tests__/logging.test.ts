import { Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { createChildLogger, createLogger, createSilentLogger } from '../index.js';

function captureStream(): { stream: Writable; lines: () => Record<string, unknown>[] } {
	const chunks: string[] = [];
	const stream = new Writable({
		write(chunk: Buffer, _encoding, callback) {
			chunks.push(chunk.toString('utf8'));
			callback();
		},
	});
	return {
		stream,
		lines: () =>
			chunks
				.join('')
				.split('\n')
				.filter((line) => line.length > 0)
				.map((line): Record<string, unknown> => JSON.parse(line)),
	};
}

describe('createLogger', () => {
	it('should write structured JSON with service and level label', () => {
		const capture = captureStream();
		const logger = createLogger({ level: 'info', serviceName: 'identity', destination: capture.stream });

		logger.info({ grantId: 'ugr_1' }, 'grant added');

		const [line] = capture.lines();
		expect(line).toMatchObject({ level: 'info', service: 'identity', grantId: 'ugr_1', msg: 'grant added' });
		expect(typeof line?.['time']).toBe('string');
	});

	it('should drop entries below the configured level', () => {
		const capture = captureStream();
		const logger = createLogger({ level: 'warn', serviceName: 'identity', destination: capture.stream });

		logger.info('ignored');
		logger.warn('kept');

		expect(capture.lines().map((l) => l['msg'])).toEqual(['kept']);
	});

	it('should include child bindings', () => {
		const capture = captureStream();
		const logger = createLogger({ level: 'debug', serviceName: 'identity', destination: capture.stream });

		createChildLogger(logger, { operation: 'RemoveUserGrant' }).debug('dispatching');

		expect(capture.lines()[0]).toMatchObject({ operation: 'RemoveUserGrant', msg: 'dispatching' });
	});
});

describe('createSilentLogger', () => {
	it('should not be enabled for any level', () => {
		const logger = createSilentLogger();
		expect(logger.isLevelEnabled('fatal')).toBe(false);
	});
});
