// src/types/callRecord.types.ts

/**
 * @fileoverview Types shared by the call record pipeline: the raw input shape,
 * the canonical output schema, validation and derivation results, and the run counters.
 */

// --------------------- INPUT ---------------------

/**
 * A single JSON object decoded from an input file. Keys and value shapes are not guaranteed.
 */
export type RawRecord = Record<string, unknown>;

// --------------------- SCHEMA ---------------------

/**
 * Target primitive kinds a column value is coerced to.
 */
export type ColumnKind = 'string' | 'integer' | 'float' | 'boolean';

/**
 * Maps each column kind to the TypeScript type of its coerced value.
 */
export interface ColumnKindValueMap {
    string: string;
    integer: number;
    float: number;
    boolean: boolean;
}

/**
 * @interface SchemaColumn
 * @description One column of the canonical output table.
 */
export interface SchemaColumn {
    /** Column name, used both as the input key and as the CSV header label. */
    readonly name: string;
    /** Kind the input value is coerced to. */
    readonly kind: ColumnKind;
}

/**
 * A value that may appear in an output cell. `null` is written as an empty field.
 */
export type CellValue = string | number | boolean | null;

/**
 * Ordered coerced values, one per canonical column.
 */
export type Row = CellValue[];

// --------------------- VALIDATION ---------------------

/**
 * Tagged description of why a record was refused before extraction.
 */
export type ValidationIssue =
    | { kind: 'MissingFields'; fields: string[] }
    | { kind: 'InadmissibleType'; field: string; expected: string; actual: string };

/**
 * @interface ValidationResult
 * @description Outcome of the schema check. `errors` holds one human-readable line per issue, in the same order.
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    issues: ValidationIssue[];
}

// --------------------- DERIVATION ---------------------

/**
 * Why `last_theme_emotion` came out the way it did.
 * - `derived`: the last theme carried a non-null emotion.
 * - `absent`: no `themes` key, or its value is null.
 * - `not-a-sequence`: `themes` is present but not an array.
 * - `empty`: `themes` is an empty array.
 * - `wrong-element-type`: the last theme is not an object.
 * - `missing-key`: the last theme has no `emotion`, or it is null.
 * - `failed`: the value could not be read.
 */
export type ThemeEmotionReason =
    | 'derived'
    | 'absent'
    | 'not-a-sequence'
    | 'empty'
    | 'wrong-element-type'
    | 'missing-key'
    | 'failed';

export type ThemeEmotionDerivation =
    | { value: string; reason: 'derived' }
    | { value: null; reason: Exclude<ThemeEmotionReason, 'derived'> };

// --------------------- PIPELINE ---------------------

/**
 * Stage at which a record was rejected.
 */
export type RejectionStage = 'validation' | 'extraction';

/**
 * @interface PipelineCounters
 * @description Run totals. Invariant: `seen === written + skipped`, and
 * `skipped === skippedByStage.validation + skippedByStage.extraction`.
 */
export interface PipelineCounters {
    /** Records decoded from input files. Lines or elements that never decoded into an object are not counted. */
    seen: number;
    /** Rows that reached the CSV. */
    written: number;
    /** Records rejected by validation or extraction. */
    skipped: number;
    skippedByStage: Record<RejectionStage, number>;
    /** Input files visited, including those that yielded nothing. */
    filesProcessed: number;
}

/**
 * The result of sending one raw record through validation and extraction.
 */
export type RecordOutcome =
    | { status: 'accepted'; row: Row }
    | { status: 'rejected'; stage: 'validation'; reasons: string[] }
    | { status: 'rejected'; stage: 'extraction'; reasons: string[] };

/**
 * @interface FileProcessingResult
 * @description Everything one input file contributed to a run. Results are folded in discovery order.
 */
export interface FileProcessingResult {
    filePath: string;
    rows: Row[];
    counters: PipelineCounters;
}

/**
 * @interface PipelineRunResult
 * @description Returned by a pipeline run: where the CSV landed and what happened on the way.
 */
export interface PipelineRunResult {
    outputPath: string;
    counters: PipelineCounters;
}
