/**
 * Raised for invalid run options or configuration. This is the only error
 * that makes `run` reject; it is detected before any unit is dispatched.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

/**
 * Raised when shape input handed to one of the `define*` factories is invalid.
 */
export class ShapeDefinitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ShapeDefinitionError";
    }
}

export class QueryError extends Error {
    // HTTP status of the endpoint response, when there was one
    statusCode?: number;

    constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "QueryError";
        this.statusCode = statusCode;
    }
}

export class UnitTimeoutError extends Error {
    timeoutMs: number;

    constructor(timeoutMs: number) {
        super(`Validation unit did not finish within ${timeoutMs}ms`);
        this.name = "UnitTimeoutError";
        this.timeoutMs = timeoutMs;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
