// src/config/config.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { z } from 'zod';
import { LevelWithSilent } from 'pino';

import { envSchema } from './schemas';
import { AppConfig, ConfigOverrides } from './types';
import { AppConfiguration } from './app.config';
import { ConfigurationError } from '../types/errors';

/**
 * Injection token for the raw environment the configuration is parsed from.
 * `container.ts` registers `process.env` under it; tests pass plain objects.
 */
export const ENVIRONMENT = 'ENVIRONMENT';

@singleton()
export class ConfigService {
    public readonly rawConfig: AppConfig;
    public appConfiguration: AppConfiguration;

    private overrides: ConfigOverrides = {};

    constructor(@inject(ENVIRONMENT) env: NodeJS.ProcessEnv) {
        try {
            this.rawConfig = envSchema.parse(env);
        } catch (error) {
            if (error instanceof z.ZodError) {
                const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
                throw new ConfigurationError(`Invalid environment variables: ${issues.join('; ')}`, { issues });
            }
            throw error;
        }
        this.appConfiguration = new AppConfiguration(this.rawConfig);
    }

    /**
     * Applies command-line values on top of the environment. Later calls win per key;
     * `undefined` leaves the current value in place.
     */
    public applyOverrides(overrides: ConfigOverrides): void {
        this.overrides = {
            logLevel: overrides.logLevel ?? this.overrides.logLevel,
            outputDir: overrides.outputDir ?? this.overrides.outputDir,
            outputFilename: overrides.outputFilename ?? this.overrides.outputFilename,
        };
    }

    get nodeEnv() { return this.appConfiguration.nodeEnv; }

    public get isProduction(): boolean {
        return this.appConfiguration.nodeEnv === 'production';
    }

    get logLevel(): LevelWithSilent { return this.overrides.logLevel ?? this.appConfiguration.logLevel; }
    get logToConsole(): boolean { return this.appConfiguration.logToConsole; }
    get logFilePath(): string | undefined { return this.appConfiguration.logFilePath; }

    get outputDir(): string { return this.overrides.outputDir ?? this.appConfiguration.outputDir; }
    get outputFilename(): string { return this.overrides.outputFilename ?? this.appConfiguration.outputFilename; }

    get generatorSeed(): number | undefined { return this.appConfiguration.generatorSeed; }

    /**
     * Loggable snapshot of the effective configuration.
     */
    public describe(): Record<string, unknown> {
        return {
            nodeEnv: this.nodeEnv,
            logLevel: this.logLevel,
            logToConsole: this.logToConsole,
            logFilePath: this.logFilePath ?? null,
            outputDir: this.outputDir,
            outputFilename: this.outputFilename,
            generatorSeed: this.generatorSeed ?? null,
        };
    }
}
