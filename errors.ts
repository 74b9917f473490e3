export type LoadErrorCode = "FILE_NOT_FOUND" | "UNREADABLE" | "EMPTY" | "MISSING_COLUMNS" | "NO_METRICS";

export type ValidationErrorCode =
    | "INSUFFICIENT_DATA"
    | "ZERO_STD"
    | "INVALID_OBSERVED_VALUE"
    | "INVALID_RANGE"
    | "UNKNOWN_METRIC"
    | "INVALID_INPUT";

//fatal at startup: the input file could not be turned into a dataset
export class LoadError extends Error {
    readonly code: LoadErrorCode;
    readonly path: string;

    constructor(code: LoadErrorCode, path: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "LoadError";
        this.code = code;
        this.path = path;
    }
}

//recoverable: shown as a warning, the session keeps going
export class ValidationError extends Error {
    readonly code: ValidationErrorCode;

    constructor(code: ValidationErrorCode, message: string) {
        super(message);
        this.name = "ValidationError";
        this.code = code;
    }
}

export function isValidationError(error: unknown): error is ValidationError {
    return error instanceof ValidationError;
}

export function isLoadError(error: unknown): error is LoadError {
    return error instanceof LoadError;
}
