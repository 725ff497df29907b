// src/config/types.ts
import { z } from 'zod';
import { LevelWithSilent } from 'pino';
import { type envSchema } from './schemas';

/**
 * Validated environment, as produced by `envSchema`.
 */
export type AppConfig = z.infer<typeof envSchema>;

/**
 * Values a command-line caller may use to override the environment.
 */
export interface ConfigOverrides {
    logLevel?: LevelWithSilent;
    outputDir?: string;
    outputFilename?: string;
}
