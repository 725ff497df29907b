// src/services/callRecordPipeline.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { FileSystemService } from './fileSystem.service';
import { RecordReaderService } from './recordReader.service';
import { SchemaValidatorService } from './schemaValidator.service';
import { FieldExtractorService } from './fieldExtractor.service';
import { CsvWriterService } from './csvWriter.service';
import {
    FileProcessingResult,
    PipelineRunResult,
    RawRecord,
    RecordOutcome,
    Row,
} from '../types/callRecord.types';
import { CoercionError } from '../types/errors';
import { applyOutcome, createEmptyCounters, mergeCounters } from '../utils/pipelineCounters';

/**
 * Drives discovery, reading, validation, extraction and the single CSV write.
 */
@singleton()
export class CallRecordPipelineService {
    constructor(
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(FileSystemService) private fileSystemService: FileSystemService,
        @inject(RecordReaderService) private recordReader: RecordReaderService,
        @inject(SchemaValidatorService) private schemaValidator: SchemaValidatorService,
        @inject(FieldExtractorService) private fieldExtractor: FieldExtractorService,
        @inject(CsvWriterService) private csvWriter: CsvWriterService,
    ) { }

    private get serviceBaseLogger(): Logger {
        return this.loggingService.getLogger({ service: 'CallRecordPipelineService' });
    }

    /**
     * Validates then extracts one record. Never throws for bad data: rejections come back as outcomes.
     */
    public processRecord(record: RawRecord): RecordOutcome {
        const validation = this.schemaValidator.validate(record);
        if (!validation.valid) {
            return { status: 'rejected', stage: 'validation', reasons: validation.errors };
        }

        try {
            return { status: 'accepted', row: this.fieldExtractor.extract(record) };
        } catch (error) {
            if (error instanceof CoercionError) {
                return { status: 'rejected', stage: 'extraction', reasons: [error.message] };
            }
            throw error;
        }
    }

    /**
     * Runs every record of one file through `processRecord`. The returned counters cover this file only.
     */
    public async processFile(filePath: string, parentLogger?: Logger): Promise<FileProcessingResult> {
        const logger = (parentLogger || this.serviceBaseLogger).child({ file: filePath });
        const rows: Row[] = [];
        let counters = { ...createEmptyCounters(), filesProcessed: 1 };

        const stream = this.recordReader.read(filePath, logger);
        let position = 0;
        let step = await stream.next();
        while (!step.done) {
            position++;
            const outcome = this.processRecord(step.value);
            counters = applyOutcome(counters, outcome);

            if (outcome.status === 'accepted') {
                rows.push(outcome.row);
            } else if (outcome.stage === 'validation') {
                logger.warn(
                    { recordNumber: position, reasons: outcome.reasons, event: 'record_validation_failed' },
                    `${filePath} record ${position}: ${outcome.reasons.join('; ')}`,
                );
            } else {
                logger.error(
                    { recordNumber: position, reasons: outcome.reasons, event: 'record_extraction_failed' },
                    `${filePath} record ${position}: ${outcome.reasons.join('; ')}`,
                );
            }
            step = await stream.next();
        }

        const readSummary = step.value;
        logger.info({
            seen: counters.seen,
            written: counters.written,
            skipped: counters.skipped,
            entriesSkipped: readSummary.entriesSkipped,
            readFailed: readSummary.failed,
            event: 'file_processed',
        }, `Processed ${filePath}: ${counters.written} of ${counters.seen} record(s) kept.`);

        return { filePath, rows, counters };
    }

    /**
     * Converts every `.json` / `.jsonl` file under `inputDir` into one CSV at `<outputDir>/<filename>`.
     * The CSV is always written, header-only when nothing survives.
     *
     * @throws {InputDirectoryNotFoundError} Before any output when `inputDir` is not a directory.
     */
    public async run(inputDir: string, outputDir: string, filename: string): Promise<PipelineRunResult> {
        const logger = this.serviceBaseLogger.child({ serviceMethod: 'CallRecordPipelineService.run' });
        logger.info({ inputDir, outputDir, filename, event: 'pipeline_start' }, `Converting call records from ${inputDir}.`);

        const files = await this.fileSystemService.discoverInputFiles(inputDir, logger);
        logger.info({ fileCount: files.length, event: 'pipeline_files_discovered' }, `Found ${files.length} input file(s).`);

        let counters = createEmptyCounters();
        const rows: Row[] = [];
        for (const filePath of files) {
            const result = await this.processFile(filePath, logger);
            counters = mergeCounters(counters, result.counters);
            rows.push(...result.rows);
        }

        const outputPath = await this.csvWriter.write(rows, outputDir, filename, logger);
        logger.info(
            { ...counters, outputPath, event: 'pipeline_finish' },
            `Wrote ${counters.written} rows (skipped ${counters.skipped} of ${counters.seen}) to ${outputPath}`,
        );

        return { outputPath, counters };
    }
}
