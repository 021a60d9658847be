export type PipelineErrorCode =
    | "SCHEMA"
    | "REFERENCE_NOT_FOUND"
    | "SOURCE_UNAVAILABLE"
    | "DIVISION"
    | "RENDER";

/**
 * Base class for every fatal error raised while loading, deriving or rendering.
 * Remote lookup failures are not errors: they come back as values.
 */
export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Required columns or fields are absent from the input shape. */
export class SchemaError extends PipelineError {
    readonly missing: string[];

    constructor(missing: string[], context = "input") {
        super("SCHEMA", `${context} is missing required fields: ${missing.join(", ")}`);
        this.missing = missing;
    }
}

export class ReferenceNotFoundError extends PipelineError {
    constructor(message: string) {
        super("REFERENCE_NOT_FOUND", message);
    }
}

export class SourceUnavailableError extends PipelineError {
    readonly source: string;

    constructor(source: string, message: string, options?: { cause?: unknown }) {
        super("SOURCE_UNAVAILABLE", `${source}: ${message}`, options);
        this.source = source;
    }
}

export class DivisionError extends PipelineError {
    constructor(message: string) {
        super("DIVISION", message);
    }
}

export class RenderError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("RENDER", message, options);
    }
}

export function isPipelineError(error: unknown): error is PipelineError {
    return error instanceof PipelineError;
}
