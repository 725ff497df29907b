// src/commands/optionParsers.ts
import { InvalidArgumentError } from 'commander';
import { LevelWithSilent } from 'pino';
import { logLevelSchema } from '../config/schemas';

export function parseLogLevel(value: string): LevelWithSilent {
    const parsed = logLevelSchema.safeParse(value);
    if (!parsed.success) {
        throw new InvalidArgumentError(`Expected one of ${logLevelSchema.options.join(', ')}.`);
    }
    return parsed.data;
}

export function parseNonNegativeInteger(value: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

export function parseRatio(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !(parsed >= 0 && parsed <= 1)) {
        throw new InvalidArgumentError('Expected a number between 0 and 1.');
    }
    return parsed;
}
