// src/types/errors.ts

/**
 * Structured context attached to pipeline errors. Every key is optional so each error
 * carries only what it knows (the offending file, line, column or value).
 */
export interface PipelineErrorDetails {
    filePath?: string;
    lineNumber?: number;
    column?: string;
    value?: unknown;
    [key: string]: unknown;
}

/**
 * @class CoercionError
 * @augments {Error}
 * @description A value could not be converted to its column's target kind.
 * Rejects the whole record; never aborts the run.
 */
export class CoercionError extends Error {
    details: PipelineErrorDetails;

    constructor(message: string, details: PipelineErrorDetails = {}) {
        super(message);
        this.name = 'CoercionError';
        this.details = details;
        Object.setPrototypeOf(this, CoercionError.prototype);
    }

    /**
     * Returns a copy that names the column the value came from.
     */
    forColumn(column: string): CoercionError {
        return new CoercionError(`Column '${column}': ${this.message}`, { ...this.details, column });
    }
}

/**
 * @class InputDirectoryNotFoundError
 * @augments {Error}
 * @description The input root is missing or is not a directory. Fatal: raised before any output is produced.
 */
export class InputDirectoryNotFoundError extends Error {
    details: PipelineErrorDetails;

    constructor(directory: string, details: PipelineErrorDetails = {}) {
        super(`Input directory not found or not a directory: ${directory}`);
        this.name = 'InputDirectoryNotFoundError';
        this.details = { filePath: directory, ...details };
        Object.setPrototypeOf(this, InputDirectoryNotFoundError.prototype);
    }
}

/**
 * @class ConfigurationError
 * @augments {Error}
 * @description Environment configuration failed schema validation.
 */
export class ConfigurationError extends Error {
    details: PipelineErrorDetails;

    constructor(message: string, details: PipelineErrorDetails = {}) {
        super(message);
        this.name = 'ConfigurationError';
        this.details = details;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}
