/**
 * Logger
 *
 * Stream-based logger driven by observer events. Every event the core
 * emits is classified, filtered against the configured level, rendered,
 * and written to console and/or file streams.
 *
 * @example
 * ```typescript
 * import { createWriteStream } from 'node:fs'
 *
 * const logger = new Logger({
 *     config: { level: 'info' },
 *     console: process.stderr,
 *     file: createWriteStream('patchwork.log', { flags: 'a' }),
 * })
 *
 * logger.start()
 * orchestrator.run()
 * await logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';
import ansis from 'ansis';

import { observer as sharedObserver, type PatchworkObserver } from '../observer.js';
import { isCi } from '../environment.js';
import { classifyEvent, getEntryLevelPriority, shouldLog } from './classifier.js';
import { generateMessage, formatEntry, sanitizeData, serializeEntry } from './formatter.js';
import type { EntryLevel, LogEntry, LogLevel, LogFormat, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG, LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Level label colors for console output.
 */
const LEVEL_COLORS: Record<EntryLevel, (text: string) => string> = {
    error: (text) => ansis.red(text),
    warn: (text) => ansis.yellow(text),
    info: (text) => ansis.cyan(text),
    debug: (text) => ansis.gray(text),
};

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Context to include with every JSON entry */
    context?: Record<string, unknown>;

    /** File stream to write to */
    file?: Writable;

    /** Console stream to write to (defaults to stdout in CI mode) */
    console?: Writable;

    /** Colorize level labels on the console stream */
    color?: boolean;

    /** Observer to listen on. Defaults to the shared instance. */
    observer?: PatchworkObserver;
}

/**
 * Logger that captures observer events and writes to streams.
 */
export class Logger {

    #config: LoggerConfig;
    #context: Record<string, unknown>;
    #file: Writable | null = null;
    #console: Writable | null = null;
    #color: boolean;
    #observer: PatchworkObserver;
    #state: LoggerState = 'idle';
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#context = options.context ?? {};
        this.#color = options.color ?? false;
        this.#observer = options.observer ?? sharedObserver;

        if (options.console) {

            this.#console = options.console;

        }
        else if (isCi()) {

            this.#console = process.stdout;

        }

        if (options.file) {

            const file = options.file;

            this.#file = file;

            // A failing file sink is dropped; console output carries on
            file.on('error', (error) => this.#dropFile(file, error));

        }

    }

    get state(): LoggerState {

        return this.#state;

    }

    get level(): LogLevel {

        return this.#config.level;

    }

    get format(): LogFormat {

        return this.#config.format;

    }

    get isEnabled(): boolean {

        return this.#config.enabled && this.#config.level !== 'silent';

    }

    /**
     * Update the logging context.
     *
     * Context is included with every JSON entry.
     */
    setContext(context: Record<string, unknown>): void {

        this.#context = { ...this.#context, ...context };

    }

    clearContext(): void {

        this.#context = {};

    }

    /**
     * Start capturing observer events.
     *
     * No-op when disabled or already started.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#cleanup = this.#observer.on(/./, (payload) => {

            const { event, data } = payload as {
                event: string;
                data: Record<string, unknown>;
            };

            this.#handleEvent(event, data);

        });

        this.#state = 'running';

        this.#observer.emit('logger:started', {
            level: this.#config.level,
            format: this.#config.format,
        });

    }

    /**
     * Stop capturing and close the file stream.
     */
    async stop(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#cleanup) {

            this.#cleanup();
            this.#cleanup = null;

        }

        const file = this.#file;

        if (file && file !== process.stdout && file !== process.stderr) {

            await new Promise<void>((resolve) => {

                file.end(() => resolve());

            });

        }

        this.#state = 'stopped';

    }

    #dropFile(file: Writable, error: Error): void {

        if (this.#file !== file) {

            return;

        }

        this.#file = null;

        this.#observer.emit('error', { source: 'logger', error });

    }

    #handleEvent(event: string, data: Record<string, unknown>): void {

        // Skip logger's own events to avoid loops
        if (event.startsWith('logger:')) {

            return;

        }

        if (!shouldLog(event, this.#config.level)) {

            return;

        }

        if (this.#config.format === 'json') {

            const entry = formatEntry(event, data, this.#context, this.#config.level === 'verbose');

            this.#write(serializeEntry(entry));

            return;

        }

        this.#writeLine(classifyEvent(event), `[${event}] ${generateMessage(event, data)}`, data);

    }

    /**
     * Write a compact log line.
     */
    #writeLine(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        const timestamp = new Date().toISOString();
        const label = `[${level.toUpperCase().padEnd(5)}]`;

        let line = message;

        if (this.#config.level === 'verbose' && data && Object.keys(data).length > 0) {

            line += ` ${JSON.stringify(sanitizeData(data))}`;

        }

        if (this.#console) {

            const consoleLabel = this.#color ? LEVEL_COLORS[level](label) : label;

            this.#console.write(`[${timestamp}] ${consoleLabel} ${line}\n`);

        }

        if (this.#file) {

            this.#file.write(`[${timestamp}] ${label} ${line}\n`);

        }

    }

    #write(line: string): void {

        if (this.#console) {

            this.#console.write(line);

        }

        if (this.#file) {

            this.#file.write(line);

        }

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!this.isEnabled || this.#state !== 'running') {

            return;

        }

        if (getEntryLevelPriority(level) > LOG_LEVEL_PRIORITY[this.#config.level]) {

            return;

        }

        if (this.#config.format === 'json') {

            const entry: LogEntry = {
                timestamp: new Date().toISOString(),
                level,
                event: 'log',
                message,
            };

            if (data && Object.keys(data).length > 0) {

                entry.data = sanitizeData(data);

            }

            this.#write(serializeEntry(entry));

            return;

        }

        this.#writeLine(level, message, data);

    }

}
