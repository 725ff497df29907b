// src/services/fieldExtractor.service.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import { CALL_RECORD_SCHEMA, DERIVED_THEME_EMOTION_COLUMN, THEMES_FIELD } from '../config/constants';
import { CellValue, RawRecord, Row, ThemeEmotionDerivation } from '../types/callRecord.types';
import { CoercionError } from '../types/errors';
import { coerce, toCanonicalText } from '../utils/coercion';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Reads `emotion` from the last element of `themes`. Best-effort: every failure is
 * reported as a reason with a null value, never thrown.
 */
export function deriveLastThemeEmotion(record: RawRecord): ThemeEmotionDerivation {
    try {
        const themes = record[THEMES_FIELD];
        if (themes === undefined || themes === null) {
            return { value: null, reason: 'absent' };
        }
        if (!Array.isArray(themes)) {
            return { value: null, reason: 'not-a-sequence' };
        }
        if (themes.length === 0) {
            return { value: null, reason: 'empty' };
        }
        const lastTheme: unknown = themes[themes.length - 1];
        if (!isPlainObject(lastTheme)) {
            return { value: null, reason: 'wrong-element-type' };
        }
        const emotion = lastTheme.emotion;
        if (emotion === undefined || emotion === null) {
            return { value: null, reason: 'missing-key' };
        }
        return { value: toCanonicalText(emotion), reason: 'derived' };
    } catch {
        return { value: null, reason: 'failed' };
    }
}

@singleton()
export class FieldExtractorService {

    /**
     * Builds the output row for a record that passed schema validation, in canonical column order.
     *
     * @throws {CoercionError} Naming the first column whose value could not be coerced. No partial row is returned.
     */
    public extract(record: RawRecord): Row {
        const themeEmotion = deriveLastThemeEmotion(record);

        return CALL_RECORD_SCHEMA.map((column): CellValue => {
            if (column.name === DERIVED_THEME_EMOTION_COLUMN) {
                return themeEmotion.value;
            }
            const raw = record[column.name];
            try {
                return coerce(raw, column.kind);
            } catch (error) {
                if (error instanceof CoercionError) {
                    throw error.forColumn(column.name);
                }
                throw error;
            }
        });
    }
}
