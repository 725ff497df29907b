// src/services/recordReader.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import path from 'path';
import readline from 'readline';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { JSONL_EXTENSION } from '../config/constants';
import { RawRecord } from '../types/callRecord.types';
import { describeValueType } from '../utils/coercion';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * @interface FileReadSummary
 * @description Returned by the reader once a file is exhausted.
 */
export interface FileReadSummary {
    /** Records handed to the caller. */
    recordsRead: number;
    /** Lines or array elements that were dropped before becoming records (bad JSON, non-objects). */
    entriesSkipped: number;
    /** True when the file as a whole could not be read or parsed. */
    failed: boolean;
}

export type RecordStream = AsyncGenerator<RawRecord, FileReadSummary, undefined>;

const isRawRecord = (value: unknown): value is RawRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

@singleton()
export class RecordReaderService {
    constructor(
        @inject(LoggingService) private loggingService: LoggingService,
    ) { }

    private get serviceBaseLogger(): Logger {
        return this.loggingService.getLogger({ service: 'RecordReaderService' });
    }

    /**
     * Lazily yields every JSON object in `filePath`. `.jsonl` files are read line by line;
     * anything else is parsed as one JSON document (an object, or an array of objects).
     * Each call re-opens the file. Bad lines and elements are logged and skipped; a file that
     * cannot be read at all is logged and yields nothing further.
     */
    public read(filePath: string, parentLogger?: Logger): RecordStream {
        const logger = (parentLogger || this.serviceBaseLogger).child({
            serviceMethod: 'RecordReaderService.read',
            file: filePath,
        });
        return path.extname(filePath).toLowerCase() === JSONL_EXTENSION
            ? this.readJsonLines(filePath, logger)
            : this.readJsonDocument(filePath, logger);
    }

    private async *readJsonLines(filePath: string, logger: Logger): RecordStream {
        const summary: FileReadSummary = { recordsRead: 0, entriesSkipped: 0, failed: false };
        let lineNumber = 0;

        try {
            await fs.promises.access(filePath, fs.constants.R_OK);
            const fileStream = fs.createReadStream(filePath, { encoding: 'utf8' });
            const rl = readline.createInterface({ input: fileStream, crlfDelay: Infinity });

            for await (const line of rl) {
                lineNumber++;
                const trimmed = line.trim();
                if (!trimmed) {
                    continue;
                }

                let parsed: unknown;
                try {
                    parsed = JSON.parse(trimmed);
                } catch (parseError: unknown) {
                    summary.entriesSkipped++;
                    logger.error({
                        lineNumber,
                        err: getErrorMessageAndStack(parseError).message,
                        lineContentSubstring: trimmed.substring(0, 100),
                        event: 'jsonl_parse_error',
                    }, `${filePath} line ${lineNumber}: invalid JSON`);
                    continue;
                }

                if (!isRawRecord(parsed)) {
                    summary.entriesSkipped++;
                    logger.warn({
                        lineNumber,
                        actualType: describeValueType(parsed),
                        event: 'jsonl_unexpected_shape',
                    }, `${filePath} line ${lineNumber}: expected JSON object, got ${describeValueType(parsed)}`);
                    continue;
                }

                summary.recordsRead++;
                yield parsed;
            }
        } catch (readError: unknown) {
            summary.failed = true;
            logger.error({ err: readError, lineNumber, event: 'file_read_failed' }, `Failed reading ${filePath}`);
        }

        logger.debug({ ...summary, totalLines: lineNumber, event: 'jsonl_read_finished' }, 'Finished reading JSONL file.');
        return summary;
    }

    private async *readJsonDocument(filePath: string, logger: Logger): RecordStream {
        const summary: FileReadSummary = { recordsRead: 0, entriesSkipped: 0, failed: false };

        let data: unknown;
        try {
            const content = await fs.promises.readFile(filePath, 'utf8');
            data = JSON.parse(content);
        } catch (readError: unknown) {
            summary.failed = true;
            logger.error({ err: readError, event: 'file_read_failed' }, `Failed reading ${filePath}`);
            return summary;
        }

        if (isRawRecord(data)) {
            summary.recordsRead++;
            yield data;
        } else if (Array.isArray(data)) {
            const elements: unknown[] = data;
            for (const [index, element] of elements.entries()) {
                if (!isRawRecord(element)) {
                    summary.entriesSkipped++;
                    logger.warn({
                        index: index + 1,
                        actualType: describeValueType(element),
                        event: 'json_array_unexpected_element',
                    }, `${filePath} idx ${index + 1}: expected JSON object in list, got ${describeValueType(element)}`);
                    continue;
                }
                summary.recordsRead++;
                yield element;
            }
        } else {
            summary.entriesSkipped++;
            logger.warn({
                actualType: describeValueType(data),
                event: 'json_unexpected_top_level',
            }, `${filePath}: top-level JSON is not object or array; skipping`);
        }

        logger.debug({ ...summary, event: 'json_read_finished' }, 'Finished reading JSON file.');
        return summary;
    }
}
