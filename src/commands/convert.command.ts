// src/commands/convert.command.ts
import { Command } from 'commander';
import { LevelWithSilent } from 'pino';
import container from '../container';
import { ConfigService } from '../config/config.service';
import { LoggingService } from '../services/logging.service';
import { CallRecordPipelineService } from '../services/callRecordPipeline.service';
import { PipelineRunResult } from '../types/callRecord.types';
import { parseLogLevel } from './optionParsers';

export interface ConvertOptions {
    outputDir?: string;
    outputFilename?: string;
    logLevel?: LevelWithSilent;
}

export interface ConvertDependencies {
    configService: ConfigService;
    loggingService: LoggingService;
    pipeline: CallRecordPipelineService;
}

function resolveConvertDependencies(): ConvertDependencies {
    return {
        configService: container.resolve(ConfigService),
        loggingService: container.resolve(LoggingService),
        pipeline: container.resolve(CallRecordPipelineService),
    };
}

/**
 * Applies the flags on top of the environment, starts logging and runs one conversion.
 */
export async function runConvert(
    inputDir: string,
    options: ConvertOptions,
    deps: ConvertDependencies = resolveConvertDependencies(),
): Promise<PipelineRunResult> {
    deps.configService.applyOverrides(options);
    deps.loggingService.initialize();
    const logger = deps.loggingService.getLogger({ service: 'convert' });
    logger.debug({ config: deps.configService.describe(), event: 'config_loaded' }, 'Configuration loaded.');

    try {
        return await deps.pipeline.run(inputDir, deps.configService.outputDir, deps.configService.outputFilename);
    } catch (error) {
        logger.fatal({ err: error, inputDir, event: 'convert_failed' }, 'Conversion aborted.');
        throw error;
    } finally {
        deps.loggingService.close();
    }
}

export const convertCommand = new Command('convert')
    .description('Convert every .json/.jsonl call record under a directory into one CSV')
    .argument('<inputDir>', 'Directory scanned recursively for .json and .jsonl files')
    .option('-o, --output-dir <dir>', 'Directory the CSV is written to (env OUTPUT_DIR)')
    .option('-f, --output-filename <name>', 'CSV file name (env OUTPUT_FILENAME)')
    .option('-l, --log-level <level>', 'Minimum log level (env LOG_LEVEL)', parseLogLevel)
    .action(async (inputDir: string, options: ConvertOptions) => {
        const result = await runConvert(inputDir, options);
        process.stdout.write(`${result.outputPath}\n`);
    });
