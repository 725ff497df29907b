// src/config/app.config.ts
import path from 'path';
import { LevelWithSilent } from 'pino';
import { AppConfig } from './types';

/**
 * Typed view over the validated environment. Paths are resolved against the working directory.
 */
export class AppConfiguration {
    public readonly nodeEnv: 'development' | 'production' | 'test';
    public readonly logLevel: LevelWithSilent;
    public readonly logToConsole: boolean;
    public readonly logFilePath?: string;
    public readonly outputDir: string;
    public readonly outputFilename: string;
    public readonly generatorSeed?: number;

    constructor(appConfig: AppConfig) {
        this.nodeEnv = appConfig.NODE_ENV;
        this.logLevel = appConfig.LOG_LEVEL;
        this.logToConsole = appConfig.LOG_TO_CONSOLE;
        this.logFilePath = appConfig.LOG_FILE_PATH ? path.resolve(appConfig.LOG_FILE_PATH) : undefined;
        this.outputDir = path.resolve(appConfig.OUTPUT_DIR);
        this.outputFilename = appConfig.OUTPUT_FILENAME;
        this.generatorSeed = appConfig.GENERATOR_SEED;
    }
}
