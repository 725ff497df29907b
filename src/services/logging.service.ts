// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Logger, LoggerOptions, stdTimeFunctions, StreamEntry, DestinationStream } from 'pino';
import pretty from 'pino-pretty';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export type LoggerContext = { service?: string; [key: string]: unknown };

/**
 * Owns the root pino logger. Console output goes to stderr so stdout stays free for command results.
 */
@singleton()
export class LoggingService {
    private rootLoggerInternal?: Logger;
    private fileStream?: ReturnType<typeof pino.destination>;
    private isInitialized = false;

    constructor(@inject(ConfigService) private configService: ConfigService) { }

    /**
     * Builds the root logger from the current configuration. Call after CLI overrides are applied.
     * When `destination` is given it replaces every configured sink (used by tests to capture entries).
     */
    public initialize(destination?: DestinationStream): void {
        if (this.isInitialized) {
            return;
        }

        const level = this.configService.logLevel;
        const pinoOptions: LoggerOptions = {
            level,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base: undefined,
        };

        if (destination) {
            this.rootLoggerInternal = pino(pinoOptions, destination);
            this.isInitialized = true;
            return;
        }

        const streams: StreamEntry[] = [];
        if (this.configService.logToConsole) {
            if (!this.configService.isProduction) {
                streams.push({
                    level: 'trace',
                    stream: pretty({
                        colorize: true,
                        levelFirst: true,
                        translateTime: 'SYS:standard',
                        ignore: 'pid,hostname,service',
                        destination: 2,
                        sync: true,
                    }),
                });
            } else {
                streams.push({ level: 'trace', stream: pino.destination({ dest: 2, sync: true }) });
            }
        }

        const logFilePath = this.configService.logFilePath;
        if (logFilePath) {
            try {
                this.fileStream = pino.destination({ dest: logFilePath, mkdir: true, sync: true });
                streams.push({ level: 'trace', stream: this.fileStream });
            } catch (err) {
                const { message } = getErrorMessageAndStack(err);
                console.error(`[LoggingService] Failed to open log file "${logFilePath}": ${message}. File logging disabled.`);
            }
        }

        this.rootLoggerInternal = streams.length > 0
            ? pino(pinoOptions, pino.multistream(streams))
            : pino({ ...pinoOptions, level: 'silent' });
        this.isInitialized = true;
    }

    /**
     * Returns the root logger, or a child bound to `context`.
     * Falls back to a silent logger when called before `initialize()`.
     */
    public getLogger(context?: LoggerContext): Logger {
        const root = this.rootLoggerInternal ?? pino({ level: 'silent' });
        return context ? root.child(context) : root;
    }

    /**
     * Flushes and closes the file sink, if any.
     */
    public close(): void {
        if (this.fileStream) {
            this.fileStream.flushSync();
            this.fileStream.end();
            this.fileStream = undefined;
        }
        this.isInitialized = false;
        this.rootLoggerInternal = undefined;
    }
}
