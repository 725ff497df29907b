// src/services/csvWriter.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import path from 'path';
import { Parser } from '@json2csv/plainjs';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { FileSystemService } from './fileSystem.service';
import { CALL_RECORD_SCHEMA, CSV_DELIMITER, CSV_EOL, CSV_QUOTE } from '../config/constants';
import { CellValue, Row } from '../types/callRecord.types';

type CsvRecord = Record<string, CellValue>;

const NEEDS_QUOTING_REGEX = /[",\r\n]/;

/**
 * Minimal RFC 4180 quoting: only fields holding the delimiter, a quote or a line break are
 * wrapped, with embedded quotes doubled.
 */
export function quoteCsvField(value: string): string {
    if (!NEEDS_QUOTING_REGEX.test(value)) {
        return value;
    }
    return `${CSV_QUOTE}${value.split(CSV_QUOTE).join(CSV_QUOTE + CSV_QUOTE)}${CSV_QUOTE}`;
}

/**
 * Float text always carries a fractional part: `3` is written as `3.0`.
 */
export function formatFloatCell(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Pairs a row with the canonical header so json2csv can address cells by column name.
 */
export function rowToCsvRecord(row: Row): CsvRecord {
    const record: CsvRecord = {};
    CALL_RECORD_SCHEMA.forEach((column, index) => {
        const cell = row[index] ?? null;
        record[column.name] = column.kind === 'float' && typeof cell === 'number' ? formatFloatCell(cell) : cell;
    });
    return record;
}

@singleton()
export class CsvWriterService {
    private readonly csvParser: Parser<CsvRecord, CsvRecord>;

    constructor(
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(FileSystemService) private fileSystemService: FileSystemService,
    ) {
        this.csvParser = new Parser<CsvRecord, CsvRecord>({
            fields: CALL_RECORD_SCHEMA.map(column => column.name),
            delimiter: CSV_DELIMITER,
            eol: CSV_EOL,
            header: true,
            includeEmptyRows: true,
            defaultValue: '',
            formatters: {
                header: quoteCsvField,
                string: quoteCsvField,
                number: (value: number) => String(value),
                boolean: (value: boolean) => String(value),
                // null is the only object a row carries
                object: (value: unknown) => (value === null ? '' : quoteCsvField(JSON.stringify(value))),
                undefined: () => '',
            },
        });
    }

    private getMethodLogger(parentLogger: Logger | undefined, methodName: string): Logger {
        const base = parentLogger || this.loggingService.getLogger({ service: 'CsvWriterService' });
        return base.child({ serviceMethod: `CsvWriterService.${methodName}` });
    }

    /**
     * Renders the header and rows as CSV text, each line terminated by CRLF.
     */
    public render(rows: Row[]): string {
        return this.csvParser.parse(rows.map(rowToCsvRecord)) + CSV_EOL;
    }

    /**
     * Writes the header plus `rows` to `<outputDir>/<filename>`, creating the directory when needed.
     * An existing file is overwritten. The write is not atomic.
     *
     * @returns The path of the written file.
     */
    public async write(rows: Row[], outputDir: string, filename: string, parentLogger?: Logger): Promise<string> {
        const logger = this.getMethodLogger(parentLogger, 'write');
        const outputPath = path.join(path.resolve(outputDir), filename);

        logger.debug({ outputPath, rowCount: rows.length, event: 'csv_write_start' }, 'Writing CSV.');
        await this.fileSystemService.ensureDirExists(path.dirname(outputPath), logger);
        await this.fileSystemService.writeFile(outputPath, this.render(rows), logger);
        logger.info({ outputPath, rowCount: rows.length, event: 'csv_write_success' }, `CSV written: ${outputPath}`);

        return outputPath;
    }
}
