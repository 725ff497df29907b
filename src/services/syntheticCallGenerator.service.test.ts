// src/services/syntheticCallGenerator.service.test.ts
import fs from 'fs';
import path from 'path';
import callLookups from '../data/callLookups.json';
import {
    TestServices,
    createTestServices,
    makeTempDir,
    removeDir,
} from '../testing/testServices';

const REFERENCE_DATE = new Date('2024-06-30T12:00:00Z');
const DAY_MS = 24 * 60 * 60 * 1000;

describe('SyntheticCallGeneratorService', () => {
    let services: TestServices;
    let tempDir: string;

    beforeEach(() => {
        services = createTestServices();
        tempDir = makeTempDir();
    });

    afterEach(() => {
        removeDir(tempDir);
    });

    describe('createRecord', () => {
        it('builds records in the input shape the converter accepts', () => {
            services.generator.seed(3);
            for (let i = 0; i < 25; i++) {
                const record = services.generator.createRecord(REFERENCE_DATE);

                expect(record.callid).toMatch(/^[1-9]\d{11}$/);
                expect(record.filename).toBe(`${record.callid}.mp4`);
                expect(record.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
                const age = REFERENCE_DATE.getTime() - Date.parse(record.timestamp);
                expect(age).toBeGreaterThanOrEqual(0);
                // timestamps drop milliseconds
                expect(age).toBeLessThan(180 * DAY_MS + 1000);
                expect(record.agent).toMatch(/^.+ \p{L}\.$/u);
                expect(record.account_id).toMatch(/^ACC-\d{4}-[A-Z]{2}$/);
                expect(record.total_call_time).toBeGreaterThanOrEqual(0.5);
                expect(record.total_call_time).toBeLessThanOrEqual(15);
                expect(record.primary_reason.split(' ').length).toBeGreaterThanOrEqual(10);
                expect(record.primary_reason.split(' ').length).toBeLessThanOrEqual(15);
                expect(callLookups.callTypes).toContain(record.call_type);
                expect(callLookups.callCategories).toContain(record.call_category);
                expect(callLookups.callOutcomes).toContain(record.call_outcome);
                expect(record.questions.length).toBeGreaterThanOrEqual(1);
                expect(record.questions.length).toBeLessThanOrEqual(3);
                expect(record.themes.length).toBeGreaterThanOrEqual(1);
                expect(record.themes.length).toBeLessThanOrEqual(3);
                expect(new Set(record.themes.map(theme => theme.theme)).size).toBe(record.themes.length);
                expect(Number.isInteger(record.sentiment_score)).toBe(true);
                expect(record.sentiment_score).toBeGreaterThanOrEqual(0);
                expect(record.sentiment_score).toBeLessThanOrEqual(10);
                expect(typeof record.food_program).toBe('boolean');

                expect(services.schemaValidator.validate({ ...record }).valid).toBe(true);
                const row = services.fieldExtractor.extract({ ...record });
                expect(row[10]).toBe(record.themes[record.themes.length - 1].emotion);
            }
        });

        it('repeats itself for the same seed', () => {
            const other = createTestServices();
            services.generator.seed(99);
            other.generator.seed(99);

            expect(services.generator.createRecord(REFERENCE_DATE)).toEqual(other.generator.createRecord(REFERENCE_DATE));
        });
    });

    describe('writeDataset', () => {
        it('writes one JSON object per line', async () => {
            const result = await services.generator.writeDataset(tempDir, {
                count: 5,
                format: 'jsonl',
                seed: 1,
                referenceDate: REFERENCE_DATE,
            });

            expect(result).toEqual({ filePath: path.join(tempDir, 'calls.jsonl'), recordCount: 5, faultyCount: 0 });
            const lines = fs.readFileSync(result.filePath, 'utf8').split('\n');
            expect(lines).toHaveLength(6);
            expect(lines[5]).toBe('');
        });

        it('writes a JSON array the pipeline converts in full', async () => {
            const inputDir = path.join(tempDir, 'input');
            const result = await services.generator.writeDataset(inputDir, {
                count: 4,
                format: 'json',
                seed: 2,
                referenceDate: REFERENCE_DATE,
            });
            expect(result.filePath).toBe(path.join(inputDir, 'calls.json'));

            const run = await services.pipeline.run(inputDir, path.join(tempDir, 'output'), 'calls.csv');

            expect(run.counters.seen).toBe(4);
            expect(run.counters.written).toBe(4);
        });

        it('produces entries the pipeline rejects when every entry is faulty', async () => {
            const inputDir = path.join(tempDir, 'input');
            const result = await services.generator.writeDataset(inputDir, {
                count: 12,
                format: 'jsonl',
                seed: 5,
                invalidRatio: 1,
                referenceDate: REFERENCE_DATE,
            });
            expect(result.faultyCount).toBe(12);

            const run = await services.pipeline.run(inputDir, path.join(tempDir, 'output'), 'calls.csv');

            expect(run.counters.written).toBe(0);
            expect(run.counters.skipped).toBe(run.counters.seen);
        });

        it('uses GENERATOR_SEED when no seed is passed', async () => {
            const first = createTestServices({ GENERATOR_SEED: '11' });
            const second = createTestServices({ GENERATOR_SEED: '11' });
            const options = { count: 3, format: 'jsonl' as const, referenceDate: REFERENCE_DATE };

            const a = await first.generator.writeDataset(path.join(tempDir, 'a'), options);
            const b = await second.generator.writeDataset(path.join(tempDir, 'b'), options);

            expect(fs.readFileSync(a.filePath, 'utf8')).toBe(fs.readFileSync(b.filePath, 'utf8'));
        });

        it('rejects an invalid ratio outside [0, 1]', async () => {
            await expect(
                services.generator.writeDataset(tempDir, { count: 1, format: 'json', invalidRatio: 1.5 }),
            ).rejects.toThrow(RangeError);
        });
    });
});
