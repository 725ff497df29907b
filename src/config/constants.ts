// src/config/constants.ts
import { SchemaColumn } from '../types/callRecord.types';

// --- Canonical Output Schema ---
/**
 * Output columns in CSV order. The column name doubles as the input key.
 */
export const CALL_RECORD_SCHEMA: readonly SchemaColumn[] = [
    { name: 'callid', kind: 'string' },
    { name: 'filename', kind: 'string' },
    { name: 'timestamp', kind: 'string' },
    { name: 'agent', kind: 'string' },
    { name: 'account_id', kind: 'string' },
    { name: 'total_call_time', kind: 'float' },
    { name: 'primary_reason', kind: 'string' },
    { name: 'call_type', kind: 'string' },
    { name: 'call_category', kind: 'string' },
    { name: 'call_outcome', kind: 'string' },
    { name: 'last_theme_emotion', kind: 'string' },
    { name: 'sentiment_score', kind: 'integer' },
    { name: 'food_program', kind: 'boolean' },
];

/**
 * The only column computed rather than copied. It is read from `themes[-1].emotion`.
 */
export const DERIVED_THEME_EMOTION_COLUMN = 'last_theme_emotion';

/**
 * Optional input array the derived column is read from.
 */
export const THEMES_FIELD = 'themes';

/**
 * Header labels, in CSV order.
 */
export const CSV_HEADER: readonly string[] = CALL_RECORD_SCHEMA.map(column => column.name);

/**
 * Keys a record must carry to be eligible for extraction.
 */
export const REQUIRED_FIELDS: ReadonlySet<string> = new Set(
    CALL_RECORD_SCHEMA
        .map(column => column.name)
        .filter(name => name !== DERIVED_THEME_EMOTION_COLUMN)
);

// --- Input Discovery ---
/**
 * Lower-cased extensions picked up by discovery.
 */
export const JSON_EXTENSION = '.json';
export const JSONL_EXTENSION = '.jsonl';
export const INPUT_FILE_EXTENSIONS: ReadonlySet<string> = new Set([JSON_EXTENSION, JSONL_EXTENSION]);

// --- Output Defaults ---
export const DEFAULT_OUTPUT_DIR = '/output/tableStructureed';
export const DEFAULT_OUTPUT_FILENAME = 'calls.csv';

// --- Boolean Coercion ---
export const TRUTHY_STRINGS: ReadonlySet<string> = new Set(['true', '1', 'yes', 'y']);
export const FALSY_STRINGS: ReadonlySet<string> = new Set(['false', '0', 'no', 'n']);

// --- CSV Format ---
export const CSV_DELIMITER = ',';
export const CSV_QUOTE = '"';
export const CSV_EOL = '\r\n';
