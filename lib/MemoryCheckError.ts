// CLASS DEFINITIONS
// ================================================================================================
export type ErrorCode =
    | 'ShapeMismatch'
    | 'SizeMismatch'
    | 'DegreeViolation'
    | 'TraceOutOfBounds'
    | 'IndexOutOfBounds'
    | 'UnsupportedSize'
    | 'ProofGeneration';

export class MemoryCheckError extends Error {

    readonly code: ErrorCode;

    constructor(message: string, cause?: unknown, code: ErrorCode = 'ProofGeneration') {
        if (cause instanceof Error) {
            super(`${message}: ${cause.message}`);
        }
        else {
            super(message);
        }
        this.name = new.target.name;
        this.code = code;
    }
}

/** A point, evaluation table or index list does not have the dimensions an MLE requires */
export class ShapeMismatchError extends MemoryCheckError {
    constructor(message: string) {
        super(message, undefined, 'ShapeMismatch');
    }
}

/** A polynomial's variable count does not match the commitment key it is used with */
export class SizeMismatchError extends MemoryCheckError {
    constructor(message: string) {
        super(message, undefined, 'SizeMismatch');
    }
}

export class DegreeViolationError extends MemoryCheckError {
    constructor(message: string) {
        super(message, undefined, 'DegreeViolation');
    }
}

export class TraceOutOfBoundsError extends MemoryCheckError {
    constructor(message: string) {
        super(message, undefined, 'TraceOutOfBounds');
    }
}

export class IndexOutOfBoundsError extends MemoryCheckError {
    constructor(message: string) {
        super(message, undefined, 'IndexOutOfBounds');
    }
}

export class UnsupportedSizeError extends MemoryCheckError {
    constructor(message: string) {
        super(message, undefined, 'UnsupportedSize');
    }
}
