// src/services/callRecordPipeline.service.test.ts
import fs from 'fs';
import path from 'path';
import { InputDirectoryNotFoundError } from '../types/errors';
import {
    EXPECTED_HEADER_LINE,
    EXPECTED_VALID_ROW_LINE,
    TestServices,
    createTestServices,
    makeTempDir,
    removeDir,
    validCallRecord,
    withoutField,
    writeFixture,
} from '../testing/testServices';

const toJsonLines = (lines: string[]): string => lines.join('\n') + '\n';

describe('CallRecordPipelineService', () => {
    let services: TestServices;
    let tempDir: string;
    let inputDir: string;
    let outputDir: string;

    beforeEach(() => {
        services = createTestServices();
        tempDir = makeTempDir();
        inputDir = path.join(tempDir, 'input');
        outputDir = path.join(tempDir, 'output');
        fs.mkdirSync(inputDir);
    });

    afterEach(() => {
        removeDir(tempDir);
    });

    describe('processRecord', () => {
        it('accepts a valid record', () => {
            const outcome = services.pipeline.processRecord(validCallRecord());
            expect(outcome.status).toBe('accepted');
        });

        it('rejects at validation with the formatted issues', () => {
            const outcome = services.pipeline.processRecord(withoutField(validCallRecord(), 'agent'));
            expect(outcome).toEqual({
                status: 'rejected',
                stage: 'validation',
                reasons: ['Missing required fields: agent'],
            });
        });

        it('accepts a boolean call time as 1 or 0', () => {
            const outcome = services.pipeline.processRecord(validCallRecord({ total_call_time: true }));
            expect(outcome.status).toBe('accepted');
            if (outcome.status === 'accepted') {
                expect(outcome.row[5]).toBe(1);
            }
        });

        it('rejects at extraction when coercion fails', () => {
            const outcome = services.pipeline.processRecord(validCallRecord({ total_call_time: 'long' }));
            expect(outcome).toEqual({
                status: 'rejected',
                stage: 'extraction',
                reasons: ["Column 'total_call_time': Cannot coerce string long to float"],
            });
        });
    });

    describe('run', () => {
        it('keeps the valid line of a three-line JSONL file', async () => {
            const filePath = writeFixture(inputDir, 'calls.jsonl', toJsonLines([
                JSON.stringify(validCallRecord()),
                '{"callid": "broken"',
                JSON.stringify(withoutField(validCallRecord({ callid: '100000000002' }), 'account_id')),
            ]));

            const result = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            expect(result.outputPath).toBe(path.join(outputDir, 'calls.csv'));
            expect(result.counters).toEqual({
                seen: 2,
                written: 1,
                skipped: 1,
                skippedByStage: { validation: 1, extraction: 0 },
                filesProcessed: 1,
            });
            expect(fs.readFileSync(result.outputPath, 'utf8')).toBe(
                `${EXPECTED_HEADER_LINE}\r\n${EXPECTED_VALID_ROW_LINE}\r\n`,
            );

            const [rejection] = services.logs.withEvent('record_validation_failed');
            expect(rejection.file).toBe(filePath);
            expect(rejection.msg).toBe(`${filePath} record 2: Missing required fields: account_id`);
        });

        it('counts extraction failures separately', async () => {
            writeFixture(inputDir, 'calls.json', JSON.stringify([
                validCallRecord(),
                validCallRecord({ food_program: 'maybe' }),
                validCallRecord({ sentiment_score: {} }),
            ]));

            const { counters } = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            expect(counters.skippedByStage).toEqual({ validation: 1, extraction: 1 });
            expect(counters.seen).toBe(counters.written + counters.skipped);
            expect(services.logs.withEvent('record_extraction_failed')).toHaveLength(1);
        });

        it('writes rows in file discovery order', async () => {
            writeFixture(inputDir, 'b.json', JSON.stringify([
                validCallRecord({ callid: 'b1' }),
                validCallRecord({ callid: 'b2' }),
            ]));
            writeFixture(inputDir, 'a.jsonl', toJsonLines([JSON.stringify(validCallRecord({ callid: 'a1' }))]));
            writeFixture(inputDir, path.join('a', 'nested.json'), JSON.stringify(validCallRecord({ callid: 'n1' })));

            const result = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            const callIds = fs.readFileSync(result.outputPath, 'utf8')
                .split('\r\n')
                .slice(1, -1)
                .map(line => line.split(',')[0]);
            expect(callIds).toEqual(['n1', 'a1', 'b1', 'b2']);
            expect(result.counters.filesProcessed).toBe(3);
        });

        it('writes a boolean call time as a float cell', async () => {
            writeFixture(inputDir, 'calls.jsonl', toJsonLines([JSON.stringify(validCallRecord({ total_call_time: true }))]));

            const result = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            expect(result.counters.written).toBe(1);
            expect(fs.readFileSync(result.outputPath, 'utf8')).toBe(
                `${EXPECTED_HEADER_LINE}\r\n${EXPECTED_VALID_ROW_LINE.replace(',4.25,', ',1.0,')}\r\n`,
            );
        });

        it('carries on past a subdirectory it cannot list', async () => {
            writeFixture(inputDir, 'calls.jsonl', toJsonLines([JSON.stringify(validCallRecord())]));
            writeFixture(inputDir, path.join('locked', 'more.jsonl'), toJsonLines([JSON.stringify(validCallRecord())]));
            const lockedDir = path.join(inputDir, 'locked');
            const listDirectory = services.fileSystemService.listDirectory.bind(services.fileSystemService);
            jest.spyOn(services.fileSystemService, 'listDirectory').mockImplementation(async (dirPath: string) => {
                if (dirPath === lockedDir) {
                    throw new Error('EACCES: permission denied');
                }
                return listDirectory(dirPath);
            });

            const result = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            expect(result.counters.filesProcessed).toBe(1);
            expect(fs.readFileSync(result.outputPath, 'utf8')).toBe(
                `${EXPECTED_HEADER_LINE}\r\n${EXPECTED_VALID_ROW_LINE}\r\n`,
            );
        });

        it('never reads .txt files', async () => {
            writeFixture(inputDir, 'calls.txt', JSON.stringify(validCallRecord()));

            const result = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            expect(result.counters.filesProcessed).toBe(0);
            expect(result.counters.seen).toBe(0);
        });

        it('writes a header-only CSV when nothing survives', async () => {
            writeFixture(inputDir, 'bad.jsonl', toJsonLines(['not json', JSON.stringify({ callid: '1' })]));

            const result = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            expect(result.counters).toEqual({
                seen: 1,
                written: 0,
                skipped: 1,
                skippedByStage: { validation: 1, extraction: 0 },
                filesProcessed: 1,
            });
            expect(fs.readFileSync(result.outputPath, 'utf8')).toBe(`${EXPECTED_HEADER_LINE}\r\n`);
        });

        it('produces byte-identical output on reruns', async () => {
            writeFixture(inputDir, 'calls.json', JSON.stringify([
                validCallRecord(),
                validCallRecord({ primary_reason: 'Asked, twice, about "renewal"', themes: [] }),
            ]));

            const first = await services.pipeline.run(inputDir, outputDir, 'calls.csv');
            const firstBytes = fs.readFileSync(first.outputPath);
            const second = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            expect(fs.readFileSync(second.outputPath).equals(firstBytes)).toBe(true);
        });

        it('logs the run summary', async () => {
            writeFixture(inputDir, 'calls.jsonl', toJsonLines([JSON.stringify(validCallRecord())]));

            const result = await services.pipeline.run(inputDir, outputDir, 'calls.csv');

            const [summary] = services.logs.withEvent('pipeline_finish');
            expect(summary.msg).toBe(`Wrote 1 rows (skipped 0 of 1) to ${result.outputPath}`);
        });

        it('fails before producing output when the input directory is missing', async () => {
            await expect(
                services.pipeline.run(path.join(tempDir, 'nowhere'), outputDir, 'calls.csv'),
            ).rejects.toBeInstanceOf(InputDirectoryNotFoundError);
            expect(fs.existsSync(outputDir)).toBe(false);
        });
    });
});
