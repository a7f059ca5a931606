/**
 * Logger tests.
 *
 * Events are emitted on an isolated observer and captured through
 * mock streams.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Writable } from 'node:stream';

import { Logger } from '../../../src/core/logger/logger.js';
import { DEFAULT_LOGGER_CONFIG } from '../../../src/core/logger/types.js';
import { createObserver, type PatchworkObserver } from '../../../src/core/observer.js';
import { Orchestrator } from '../../../src/core/orchestrator/index.js';

/**
 * Create a mock writable stream that captures output.
 */
function createMockStream(): { stream: Writable; output: string[] } {

    const output: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {

            output.push(String(chunk));
            callback();

        },
    });

    return { stream, output };

}

const TIMESTAMP = '2024-01-15T15:30:00.123Z';

describe('logger: Logger class', () => {

    let observer: PatchworkObserver;

    beforeEach(() => {

        observer = createObserver('logger-test');

        vi.useFakeTimers();
        vi.setSystemTime(new Date('2024-01-15T10:30:00.123-05:00'));

    });

    afterEach(() => {

        vi.useRealTimers();

    });

    describe('construction', () => {

        it('should create logger with default config', () => {

            const { stream } = createMockStream();
            const logger = new Logger({ observer, console: stream });

            expect(logger.level).toBe('info');
            expect(logger.format).toBe('line');
            expect(logger.isEnabled).toBe(true);
            expect(logger.state).toBe('idle');

        });

        it('should respect disabled config', () => {

            const logger = new Logger({
                observer,
                config: { ...DEFAULT_LOGGER_CONFIG, enabled: false },
            });

            expect(logger.isEnabled).toBe(false);

        });

        it('should respect silent level', () => {

            const logger = new Logger({ observer, config: { level: 'silent' } });

            expect(logger.isEnabled).toBe(false);

        });

    });

    describe('start/stop', () => {

        it('should start and announce itself', async () => {

            const { stream, output } = createMockStream();
            const started: unknown[] = [];

            observer.on('logger:started', (data) => started.push(data));

            const logger = new Logger({ observer, console: stream });

            logger.start();

            expect(logger.state).toBe('running');
            expect(started).toEqual([{ level: 'info', format: 'line' }]);

            // Its own lifecycle events are never written
            expect(output).toEqual([]);

            await logger.stop();

            expect(logger.state).toBe('stopped');

        });

        it('should not start if disabled', () => {

            const logger = new Logger({ observer, config: { enabled: false } });

            logger.start();

            expect(logger.state).toBe('idle');

        });

        it('should stop listening after stop', async () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream });

            logger.start();
            await logger.stop();

            observer.emit('run:start', { name: 'default', baseline: 0, candidates: [] });

            expect(output).toEqual([]);

        });

        it('should end the file stream on stop', async () => {

            const { stream } = createMockStream();
            const logger = new Logger({ observer, file: stream });

            logger.start();
            await logger.stop();

            expect(stream.writableEnded).toBe(true);

        });

        it('should ignore stop before start', async () => {

            const logger = new Logger({ observer });

            await logger.stop();

            expect(logger.state).toBe('idle');

        });

    });

    describe('line format', () => {

        it('should write event lines', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream });

            logger.start();

            observer.emit('run:start', { name: 'default', baseline: 0, candidates: [1, 2] });

            expect(output).toEqual([
                `[${TIMESTAMP}] [INFO ] [run:start] Run started from version 0 (2 candidates)\n`,
            ]);

        });

        it('should filter events below the configured level', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream, config: { level: 'warn' } });

            logger.start();

            observer.emit('run:start', { name: 'default', baseline: 0, candidates: [3] });
            observer.emit('patch:before', { name: 'default', version: 3 });
            observer.emit('patch:skip', { name: 'default', version: 3, missing: [1, 2] });

            expect(output).toEqual([
                `[${TIMESTAMP}] [WARN ] [patch:skip] Skipped patch 3: missing 1, 2\n`,
            ]);

        });

        it('should append event data at verbose level', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream, config: { level: 'verbose' } });

            logger.start();

            observer.emit('patch:before', { name: 'default', version: 1 });

            expect(output).toEqual([
                `[${TIMESTAMP}] [DEBUG] [patch:before] Applying patch 1 {"name":"default","version":1}\n`,
            ]);

        });

        it('should write to console and file streams', () => {

            const consoleMock = createMockStream();
            const fileMock = createMockStream();
            const logger = new Logger({
                observer,
                console: consoleMock.stream,
                file: fileMock.stream,
                color: true,
            });

            logger.start();

            observer.emit('error', { source: 'sdk', error: new Error('cannot open log') });

            const expected = `[${TIMESTAMP}] [ERROR] [error] Error in sdk: cannot open log\n`;

            // Color codes never reach the file
            expect(fileMock.output).toEqual([expected]);
            expect(consoleMock.output).toHaveLength(1);
            expect(consoleMock.output[0]?.endsWith('[error] Error in sdk: cannot open log\n')).toBe(true);

        });

    });

    describe('file stream failures', () => {

        it('should drop a failing file stream and keep logging to the console', () => {

            const consoleMock = createMockStream();
            const fileMock = createMockStream();
            const logger = new Logger({
                observer,
                console: consoleMock.stream,
                file: fileMock.stream,
            });

            logger.start();

            fileMock.stream.emit('error', new Error('disk full'));

            observer.emit('run:start', { name: 'default', baseline: 0, candidates: [] });

            expect(fileMock.output).toEqual([]);
            expect(consoleMock.output).toEqual([
                `[${TIMESTAMP}] [ERROR] [error] Error in logger: disk full\n`,
                `[${TIMESTAMP}] [INFO ] [run:start] Run started from version 0 (0 candidates)\n`,
            ]);

        });

        it('should still stop after the file stream failed', async () => {

            const { stream } = createMockStream();
            const logger = new Logger({ observer, file: stream });

            logger.start();
            stream.emit('error', new Error('disk full'));
            await logger.stop();

            expect(logger.state).toBe('stopped');

        });

    });

    describe('json format', () => {

        it('should write one JSON entry per event', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream, config: { format: 'json' } });

            logger.start();

            observer.emit('patch:failed', { name: 'default', version: 2, error: new Error('boom') });

            expect(output).toHaveLength(1);
            expect(output[0]?.endsWith('\n')).toBe(true);
            expect(JSON.parse(output[0] ?? '')).toEqual({
                timestamp: TIMESTAMP,
                level: 'error',
                event: 'patch:failed',
                message: 'Patch 2 failed: boom',
            });

        });

        it('should include context and verbose data', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({
                observer,
                console: stream,
                config: { format: 'json', level: 'verbose' },
                context: { host: 'worker-1' },
            });

            logger.start();

            observer.emit('patch:failed', { name: 'default', version: 2, error: new Error('boom') });

            expect(JSON.parse(output[0] ?? '')).toEqual({
                timestamp: TIMESTAMP,
                level: 'error',
                event: 'patch:failed',
                message: 'Patch 2 failed: boom',
                data: {
                    name: 'default',
                    version: 2,
                    error: { name: 'Error', message: 'boom' },
                },
                context: { host: 'worker-1' },
            });

        });

    });

    describe('context', () => {

        it('should merge and clear context', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream, config: { format: 'json' } });

            logger.setContext({ host: 'worker-1' });
            logger.setContext({ attempt: 2 });
            logger.start();

            observer.emit('run:start', { name: 'default', baseline: 0, candidates: [] });

            logger.clearContext();

            observer.emit('run:start', { name: 'default', baseline: 0, candidates: [] });

            expect(JSON.parse(output[0] ?? '')).toMatchObject({ context: { host: 'worker-1', attempt: 2 } });
            expect(JSON.parse(output[1] ?? '')).not.toHaveProperty('context');

        });

    });

    describe('direct logging', () => {

        it('should write messages at or above the configured level', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream });

            logger.start();

            logger.info('starting import', { files: 3 });
            logger.debug('hidden');
            logger.warn('slow patch');

            expect(output).toEqual([
                `[${TIMESTAMP}] [INFO ] starting import\n`,
                `[${TIMESTAMP}] [WARN ] slow patch\n`,
            ]);

        });

        it('should write nothing before start', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream });

            logger.error('too early');

            expect(output).toEqual([]);

        });

        it('should write JSON entries in json format', () => {

            const { stream, output } = createMockStream();
            const logger = new Logger({ observer, console: stream, config: { format: 'json' } });

            logger.start();
            logger.error('import failed', { error: new Error('boom') });

            expect(JSON.parse(output[0] ?? '')).toEqual({
                timestamp: TIMESTAMP,
                level: 'error',
                event: 'log',
                message: 'import failed',
                data: { error: { name: 'Error', message: 'boom' } },
            });

        });

    });

    describe('with an orchestrator', () => {

        it('should log a rolled-back run at warn level', () => {

            const { stream, output } = createMockStream();
            const orchestrator = new Orchestrator({ observer });

            orchestrator.register({ version: 1, apply: () => undefined, rollback: () => undefined });
            orchestrator.register({
                version: 2,
                apply: () => {

                    throw new Error('boom');

                },
            });

            const logger = new Logger({ observer, console: stream, config: { level: 'warn' } });

            logger.start();
            orchestrator.run();

            expect(output).toEqual([
                `[${TIMESTAMP}] [ERROR] [patch:failed] Patch 2 failed: boom\n`,
                `[${TIMESTAMP}] [WARN ] [rollback:start] Rolling back 1 patches after failure at 2\n`,
                `[${TIMESTAMP}] [WARN ] [rollback:patch] Rollback of patch 1: reverted\n`,
                `[${TIMESTAMP}] [WARN ] [rollback:complete] Rollback complete: 1 reverted, 0 failed, 0 skipped\n`,
                `[${TIMESTAMP}] [ERROR] [error] Error in orchestrator: Patch 2 failed: boom\n`,
                `[${TIMESTAMP}] [WARN ] [run:rolled-back] Run rolled back to version 0 after patch 2 failed\n`,
            ]);

        });

    });

});
