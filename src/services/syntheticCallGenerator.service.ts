// src/services/syntheticCallGenerator.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import path from 'path';
import { Faker, en } from '@faker-js/faker';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { FileSystemService } from './fileSystem.service';
import { RawRecord } from '../types/callRecord.types';
import callLookups from '../data/callLookups.json';

export type DatasetFormat = 'jsonl' | 'json';

/**
 * How a faulty entry is broken. `malformed-line` only exists for JSONL output.
 */
export type FaultKind = 'missing-account-id' | 'unrecognised-food-program' | 'malformed-line';

export interface CallQuestion {
    question: string;
    quote: string;
}

export interface CallTheme {
    theme: string;
    emotion: string;
    quote: string;
}

/**
 * One call in the input shape the converter reads.
 */
export interface SyntheticCallRecord {
    callid: string;
    filename: string;
    timestamp: string;
    agent: string;
    account_id: string;
    total_call_time: number;
    primary_reason: string;
    call_type: string;
    call_category: string;
    call_outcome: string;
    questions: CallQuestion[];
    themes: CallTheme[];
    sentiment_score: number;
    food_program: boolean;
}

export interface DatasetOptions {
    count: number;
    format: DatasetFormat;
    /** Falls back to `GENERATOR_SEED`; unseeded runs differ every time. */
    seed?: number;
    /** Share of entries, between 0 and 1, that are deliberately broken. */
    invalidRatio?: number;
    /** Upper bound of the timestamp window. Defaults to now. */
    referenceDate?: Date;
}

export interface DatasetResult {
    filePath: string;
    recordCount: number;
    faultyCount: number;
}

type DatasetEntry =
    | { kind: 'record'; record: RawRecord }
    | { kind: 'malformed'; text: string };

const TIMESTAMP_WINDOW_DAYS = 180;
const UNRECOGNISED_FOOD_PROGRAM = 'maybe';

/**
 * Builds synthetic call records for exercising the converter.
 */
@singleton()
export class SyntheticCallGeneratorService {
    private readonly faker = new Faker({ locale: [en] });

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService,
        @inject(FileSystemService) private fileSystemService: FileSystemService,
    ) { }

    private get serviceBaseLogger(): Logger {
        return this.loggingService.getLogger({ service: 'SyntheticCallGeneratorService' });
    }

    public seed(seed: number): void {
        this.faker.seed(seed);
    }

    private phrase(minWords: number, maxWords: number): string {
        const text = this.faker.helpers.arrayElements(callLookups.wordPool, { min: minWords, max: maxWords }).join(' ');
        return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
    }

    private createQuestions(): CallQuestion[] {
        const count = this.faker.number.int({ min: 1, max: 3 });
        return Array.from({ length: count }, () => ({
            question: this.faker.helpers.arrayElements(callLookups.wordPool, { min: 5, max: 7 }).join(' '),
            quote: this.phrase(6, 10),
        }));
    }

    private createThemes(): CallTheme[] {
        const count = this.faker.number.int({ min: 1, max: 3 });
        const themes: CallTheme[] = [];
        const used = new Set<string>();
        while (themes.length < count) {
            const theme = this.phrase(2, 5);
            if (used.has(theme)) {
                continue;
            }
            used.add(theme);
            themes.push({
                theme,
                emotion: this.faker.helpers.arrayElement(callLookups.emotions),
                quote: this.phrase(6, 12),
            });
        }
        return themes;
    }

    /**
     * Builds one well-formed record with a timestamp in the 180 days before `referenceDate`.
     */
    public createRecord(referenceDate: Date = new Date()): SyntheticCallRecord {
        const callid = this.faker.string.numeric({ length: 12, allowLeadingZeros: false });
        const timestamp = this.faker.date
            .recent({ days: TIMESTAMP_WINDOW_DAYS, refDate: referenceDate })
            .toISOString()
            .replace(/\.\d{3}Z$/, 'Z');

        return {
            callid,
            filename: `${callid}.mp4`,
            timestamp,
            agent: `${this.faker.person.firstName()} ${this.faker.person.lastName().charAt(0)}.`,
            account_id: this.faker.helpers.replaceSymbols('ACC-####-??'),
            total_call_time: this.faker.number.float({ min: 0.5, max: 15, fractionDigits: 2 }),
            primary_reason: this.phrase(10, 15),
            call_type: this.faker.helpers.arrayElement(callLookups.callTypes),
            call_category: this.faker.helpers.arrayElement(callLookups.callCategories),
            call_outcome: this.faker.helpers.arrayElement(callLookups.callOutcomes),
            questions: this.createQuestions(),
            themes: this.createThemes(),
            sentiment_score: this.faker.number.int({ min: 0, max: 10 }),
            food_program: this.faker.datatype.boolean(),
        };
    }

    /**
     * Breaks a freshly built record in one of the ways the converter has to survive.
     */
    private createFaultyEntry(kind: FaultKind, referenceDate: Date): DatasetEntry {
        const record = this.createRecord(referenceDate);
        switch (kind) {
            case 'missing-account-id': {
                const { account_id: _accountId, ...withoutAccount } = record;
                return { kind: 'record', record: withoutAccount };
            }
            case 'unrecognised-food-program':
                return { kind: 'record', record: { ...record, food_program: UNRECOGNISED_FOOD_PROGRAM } };
            case 'malformed-line':
                return { kind: 'malformed', text: JSON.stringify(record).slice(0, -1) };
        }
    }

    private serialize(entries: DatasetEntry[], format: DatasetFormat): string {
        if (format === 'jsonl') {
            return entries
                .map(entry => (entry.kind === 'record' ? JSON.stringify(entry.record) : entry.text))
                .join('\n') + '\n';
        }
        const records = entries.flatMap(entry => (entry.kind === 'record' ? [entry.record] : []));
        return JSON.stringify(records, null, 2) + '\n';
    }

    /**
     * Writes `count` entries to `<outputDir>/calls.jsonl` or `<outputDir>/calls.json` (an array).
     *
     * @throws {RangeError} When `count` is negative or `invalidRatio` is outside [0, 1].
     */
    public async writeDataset(outputDir: string, options: DatasetOptions): Promise<DatasetResult> {
        const logger = this.serviceBaseLogger.child({ serviceMethod: 'SyntheticCallGeneratorService.writeDataset' });
        const invalidRatio = options.invalidRatio ?? 0;
        if (!Number.isInteger(options.count) || options.count < 0) {
            throw new RangeError(`count must be a non-negative integer (got ${options.count})`);
        }
        if (!(invalidRatio >= 0 && invalidRatio <= 1)) {
            throw new RangeError(`invalidRatio must be between 0 and 1 (got ${invalidRatio})`);
        }

        const seed = options.seed ?? this.configService.generatorSeed;
        if (seed !== undefined) {
            this.seed(seed);
        }
        const referenceDate = options.referenceDate ?? new Date();
        const faultKinds: FaultKind[] = options.format === 'jsonl'
            ? ['missing-account-id', 'unrecognised-food-program', 'malformed-line']
            : ['missing-account-id', 'unrecognised-food-program'];

        const entries: DatasetEntry[] = [];
        let faultyCount = 0;
        for (let i = 0; i < options.count; i++) {
            const isFaulty = this.faker.datatype.boolean({ probability: invalidRatio });
            if (isFaulty) {
                faultyCount++;
                entries.push(this.createFaultyEntry(this.faker.helpers.arrayElement(faultKinds), referenceDate));
            } else {
                entries.push({ kind: 'record', record: { ...this.createRecord(referenceDate) } });
            }
        }

        const filePath = path.join(path.resolve(outputDir), `calls.${options.format}`);
        await this.fileSystemService.writeFile(filePath, this.serialize(entries, options.format), logger);
        logger.info(
            { filePath, recordCount: options.count, faultyCount, seed: seed ?? null, event: 'dataset_written' },
            `Generated ${options.count} call record(s) (${faultyCount} faulty) at ${filePath}`,
        );

        return { filePath, recordCount: options.count, faultyCount };
    }
}
