// src/config/schemas.ts
import { z } from 'zod';
import { LevelWithSilent } from 'pino';
import { DEFAULT_OUTPUT_DIR, DEFAULT_OUTPUT_FILENAME } from './constants';

/**
 * Pino levels accepted by `LOG_LEVEL` and by the `--log-level` flag.
 */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LevelWithSilent[];

export const logLevelSchema = z.enum(LOG_LEVELS);

// --- Zod Schema Definition for Environment Variables ---
/**
 * Structure and validation rules for the environment. Each property corresponds to an environment variable.
 */
export const envSchema = z.object({
    /**
     * The current Node.js environment. Outside `production` console logs are pretty-printed.
     * @default 'development'
     */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- Logging Configuration ---
    /**
     * Minimum log level.
     * @default 'info'
     */
    LOG_LEVEL: logLevelSchema.default('info'),
    /**
     * Whether log entries are written to stderr.
     * @default true
     */
    LOG_TO_CONSOLE: z.enum(['true', 'false']).transform(val => val === 'true').default('true'),
    /**
     * Optional file that receives a copy of every log entry as JSON lines.
     */
    LOG_FILE_PATH: z.string().min(1).optional(),

    // --- Output Configuration ---
    /**
     * Directory the CSV is written to; created when missing.
     * @default '/output/tableStructureed'
     */
    OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
    /**
     * Name of the CSV file inside `OUTPUT_DIR`.
     * @default 'calls.csv'
     */
    OUTPUT_FILENAME: z.string().min(1).default(DEFAULT_OUTPUT_FILENAME),

    // --- Synthetic Generator ---
    /**
     * Seed for reproducible synthetic datasets. Unset means a fresh dataset per run.
     */
    GENERATOR_SEED: z.coerce.number().int().nonnegative().optional(),
});
