// src/services/schemaValidator.service.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import { REQUIRED_FIELDS } from '../config/constants';
import { RawRecord, ValidationIssue, ValidationResult } from '../types/callRecord.types';
import { describeValueType } from '../utils/coercion';

/**
 * Coarse shape checks for the fields most prone to drift. They only reject values no
 * coercion could ever accept (objects, arrays, null); the strict conversion happens later.
 */
interface AdmissibilityRule {
    field: string;
    expected: string;
    admits: (value: unknown) => boolean;
}

const isNumberStringOrBoolean = (value: unknown): boolean =>
    typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';

const isBooleanStringOrInteger = (value: unknown): boolean =>
    typeof value === 'boolean' || typeof value === 'string' || Number.isInteger(value);

const ADMISSIBILITY_RULES: readonly AdmissibilityRule[] = [
    { field: 'total_call_time', expected: 'numeric-like or string', admits: isNumberStringOrBoolean },
    { field: 'sentiment_score', expected: 'numeric-like or string', admits: isNumberStringOrBoolean },
    { field: 'food_program', expected: 'boolean-like', admits: isBooleanStringOrInteger },
];

/**
 * Renders one tagged issue as the line that ends up in the logs.
 */
export function formatValidationIssue(issue: ValidationIssue): string {
    switch (issue.kind) {
        case 'MissingFields':
            return `Missing required fields: ${issue.fields.join(', ')}`;
        case 'InadmissibleType':
            return `${issue.field} must be ${issue.expected} (got ${issue.actual})`;
    }
}

@singleton()
export class SchemaValidatorService {

    /**
     * Checks required keys and coarse value shapes. Never throws; a valid result does not
     * guarantee that extraction will succeed.
     */
    public validate(record: RawRecord): ValidationResult {
        const issues: ValidationIssue[] = [];

        const missing = [...REQUIRED_FIELDS]
            .filter(field => !Object.prototype.hasOwnProperty.call(record, field))
            .sort();
        if (missing.length > 0) {
            issues.push({ kind: 'MissingFields', fields: missing });
        }

        for (const rule of ADMISSIBILITY_RULES) {
            if (!Object.prototype.hasOwnProperty.call(record, rule.field)) {
                continue;
            }
            const value = record[rule.field];
            if (!rule.admits(value)) {
                issues.push({
                    kind: 'InadmissibleType',
                    field: rule.field,
                    expected: rule.expected,
                    actual: describeValueType(value),
                });
            }
        }

        return {
            valid: issues.length === 0,
            errors: issues.map(formatValidationIssue),
            issues,
        };
    }
}
