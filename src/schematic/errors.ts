export type SchematicErrorKind = 'transport' | 'truncated' | 'schema' | 'malformed-length' | 'parser-state';

export abstract class SchematicError extends Error {
    abstract readonly kind: SchematicErrorKind;

    constructor(message: string, public readonly offset?: number, options?: { cause?: unknown }) {
        super(offset === undefined ? message : `${message} (at offset ${offset})`, options);
        this.name = 'SchematicError';
    }
}

/**
 * The byte source or its compression envelope could not be opened.
 */
export class TransportError extends SchematicError {
    readonly kind = 'transport';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, undefined, options);
        this.name = 'TransportError';
    }
}

export class TruncatedInputError extends SchematicError {
    readonly kind = 'truncated';

    constructor(message: string, offset?: number) {
        super(message, offset);
        this.name = 'TruncatedInputError';
    }
}

export interface SchemaViolationContext {
    offset?: number;
    tagName?: string;
    tagKind?: number;
}

/**
 * Well-framed tag data that does not match the Schematic document shape.
 */
export class SchemaViolationError extends SchematicError {
    readonly kind: 'schema' | 'malformed-length' = 'schema';
    readonly tagName?: string;
    readonly tagKind?: number;

    constructor(message: string, context: SchemaViolationContext = {}) {
        super(message, context.offset);
        this.name = 'SchemaViolationError';
        this.tagName = context.tagName;
        this.tagKind = context.tagKind;
    }
}

export class MalformedLengthError extends SchemaViolationError {
    override readonly kind = 'malformed-length';

    constructor(message: string, offset?: number) {
        super(message, { offset });
        this.name = 'MalformedLengthError';
    }
}

/**
 * A parser was asked to parse again after it finished or failed.
 */
export class ParserStateError extends SchematicError {
    readonly kind = 'parser-state';

    constructor(message: string) {
        super(message);
        this.name = 'ParserStateError';
    }
}
