// src/commands/generate.command.ts
import { Command, Option } from 'commander';
import { LevelWithSilent } from 'pino';
import container from '../container';
import { ConfigService } from '../config/config.service';
import { LoggingService } from '../services/logging.service';
import {
    DatasetFormat,
    DatasetResult,
    SyntheticCallGeneratorService,
} from '../services/syntheticCallGenerator.service';
import { parseLogLevel, parseNonNegativeInteger, parseRatio } from './optionParsers';

export interface GenerateOptions {
    count: number;
    format: DatasetFormat;
    seed?: number;
    invalidRatio: number;
    logLevel?: LevelWithSilent;
}

export interface GenerateDependencies {
    configService: ConfigService;
    loggingService: LoggingService;
    generator: SyntheticCallGeneratorService;
}

function resolveGenerateDependencies(): GenerateDependencies {
    return {
        configService: container.resolve(ConfigService),
        loggingService: container.resolve(LoggingService),
        generator: container.resolve(SyntheticCallGeneratorService),
    };
}

/**
 * Writes one synthetic dataset into `outputDir`.
 */
export async function runGenerate(
    outputDir: string,
    options: GenerateOptions,
    deps: GenerateDependencies = resolveGenerateDependencies(),
): Promise<DatasetResult> {
    deps.configService.applyOverrides({ logLevel: options.logLevel });
    deps.loggingService.initialize();
    try {
        return await deps.generator.writeDataset(outputDir, {
            count: options.count,
            format: options.format,
            seed: options.seed,
            invalidRatio: options.invalidRatio,
        });
    } finally {
        deps.loggingService.close();
    }
}

export const generateCommand = new Command('generate')
    .description('Write a synthetic call record dataset for trying out the converter')
    .argument('<outputDir>', 'Directory the dataset file is written to')
    .option('-n, --count <count>', 'Number of entries', parseNonNegativeInteger, 100)
    .addOption(new Option('--format <format>', 'Output format').choices(['jsonl', 'json']).default('jsonl'))
    .option('-s, --seed <seed>', 'Seed for a reproducible dataset (env GENERATOR_SEED)', parseNonNegativeInteger)
    .option('--invalid-ratio <ratio>', 'Share of deliberately broken entries, 0 to 1', parseRatio, 0)
    .option('-l, --log-level <level>', 'Minimum log level (env LOG_LEVEL)', parseLogLevel)
    .action(async (outputDir: string, options: GenerateOptions) => {
        const result = await runGenerate(outputDir, options);
        process.stdout.write(`${result.filePath}\n`);
    });
