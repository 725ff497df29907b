// src/utils/pipelineCounters.ts
import { PipelineCounters, RecordOutcome } from '../types/callRecord.types';

export function createEmptyCounters(): PipelineCounters {
    return {
        seen: 0,
        written: 0,
        skipped: 0,
        skippedByStage: { validation: 0, extraction: 0 },
        filesProcessed: 0,
    };
}

/**
 * Counts one record outcome. Returns a new object; the input is left untouched.
 */
export function applyOutcome(counters: PipelineCounters, outcome: RecordOutcome): PipelineCounters {
    if (outcome.status === 'accepted') {
        return { ...counters, seen: counters.seen + 1, written: counters.written + 1 };
    }
    return {
        ...counters,
        seen: counters.seen + 1,
        skipped: counters.skipped + 1,
        skippedByStage: {
            ...counters.skippedByStage,
            [outcome.stage]: counters.skippedByStage[outcome.stage] + 1,
        },
    };
}

/**
 * Sums two sets of counters field by field.
 */
export function mergeCounters(left: PipelineCounters, right: PipelineCounters): PipelineCounters {
    return {
        seen: left.seen + right.seen,
        written: left.written + right.written,
        skipped: left.skipped + right.skipped,
        skippedByStage: {
            validation: left.skippedByStage.validation + right.skippedByStage.validation,
            extraction: left.skippedByStage.extraction + right.skippedByStage.extraction,
        },
        filesProcessed: left.filesProcessed + right.filesProcessed,
    };
}
