// src/utils/coercion.ts
import { ColumnKind, ColumnKindValueMap } from '../types/callRecord.types';
import { CoercionError } from '../types/errors';
import { FALSY_STRINGS, TRUTHY_STRINGS } from '../config/constants';

/**
 * Optionally signed decimal literal with optional fraction and exponent ("3", "-0.5", ".5", "1e3", "3.").
 */
const NUMERIC_LITERAL_REGEX = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Short type label used in coercion messages.
 */
export function describeValueType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

/**
 * Canonical text of a decoded JSON value: strings as-is, scalars via `String`, containers as JSON.
 */
export function toCanonicalText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'object' && value !== null) {
        return JSON.stringify(value);
    }
    return String(value);
}

/**
 * Reads a number or a numeric string as a finite float. Returns `null` for anything else.
 */
export function parseFiniteFloat(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        if (!NUMERIC_LITERAL_REGEX.test(trimmed)) return null;
        const parsed = Number(trimmed);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

/**
 * Reads through a float, so magnitudes above 2^53 keep only the nearest double
 * (`'12345678901234567890'` becomes 12345678901234567000).
 */
function coerceToInteger(value: unknown): number {
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    const parsed = parseFiniteFloat(value);
    if (parsed === null) {
        throw new CoercionError(`Cannot coerce ${describeValueType(value)} ${toCanonicalText(value)} to integer`, { value });
    }
    // Math.trunc(-0.5) is -0; normalise so it prints as "0".
    return Math.trunc(parsed) + 0;
}

function coerceToFloat(value: unknown): number {
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    const parsed = parseFiniteFloat(value);
    if (parsed === null) {
        throw new CoercionError(`Cannot coerce ${describeValueType(value)} ${toCanonicalText(value)} to float`, { value });
    }
    return parsed;
}

function coerceToBoolean(value: unknown): boolean {
    if (typeof value === 'boolean') {
        return value;
    }
    if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (TRUTHY_STRINGS.has(normalized)) return true;
        if (FALSY_STRINGS.has(normalized)) return false;
    }
    throw new CoercionError(`Cannot coerce ${describeValueType(value)} ${toCanonicalText(value)} to boolean`, { value });
}

/**
 * Converts a decoded JSON value to the given kind.
 * `null` and `undefined` short-circuit to `null` before any kind logic runs.
 *
 * @throws {CoercionError} When the value has no valid reading as `kind`. String coercion never throws.
 */
export function coerce<K extends ColumnKind>(value: unknown, kind: K): ColumnKindValueMap[K] | null;
export function coerce(value: unknown, kind: ColumnKind): string | number | boolean | null {
    if (value === null || value === undefined) {
        return null;
    }
    switch (kind) {
        case 'string':
            return toCanonicalText(value);
        case 'integer':
            return coerceToInteger(value);
        case 'float':
            return coerceToFloat(value);
        case 'boolean':
            return coerceToBoolean(value);
    }
}
