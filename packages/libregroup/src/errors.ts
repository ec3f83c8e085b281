// libregroup/src/errors.ts
// Error taxonomy. Every failure aborts the conversion; nothing is retried here.

export type ConvertErrorCode =
    | 'PARSE_ERROR'
    | 'CLASSIFY_ERROR'
    | 'EMIT_ERROR'
    | 'CONFIG_ERROR';

export class ConvertError extends Error {
    readonly code: ConvertErrorCode;

    constructor(code: ConvertErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** The payload is not YAML, or carries no usable `proxies` list. */
export class ParseError extends ConvertError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('PARSE_ERROR', message, options);
    }
}

/** A proxy name cannot be assigned to any bucket. */
export class ClassifyError extends ConvertError {
    constructor(message: string) {
        super('CLASSIFY_ERROR', message);
    }
}

/**
 * The synthesized group graph is inconsistent, or a value cannot be
 * serialized. Indicates a defect in synthesis rather than bad input.
 */
export class EmitError extends ConvertError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('EMIT_ERROR', message, options);
    }
}

/** Invalid registry or option value, detected before any conversion runs. */
export class ConfigError extends ConvertError {
    constructor(message: string) {
        super('CONFIG_ERROR', message);
    }
}

export function isConvertError(err: unknown): err is ConvertError {
    return err instanceof ConvertError;
}
